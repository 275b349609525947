import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export function runGit(args: string[], cwd: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const p = spawn('git', args, { cwd });
    let stdout = '';
    let stderr = '';
    p.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
    p.stderr.on('data', (d: Buffer) => (stderr += d.toString()));
    p.on('close', (code) => {
      if (code === 0) resolve(stdout.trim());
      else reject(new Error(`git ${args.join(' ')} failed with code ${code}: ${stderr}`));
    });
    p.on('error', reject);
  });
}

export interface BareRemote {
  /** Directory holding `<owner>/<name>.git` bare repositories */
  root: string;
  /** Absolute path of the bare repository */
  url: string;
  /** Remote URL template resolving to this remote */
  template: string;
  /** Commits `files` on `branch` of the remote through a scratch clone */
  commitFiles(branch: string, files: Record<string, string>, message?: string): Promise<void>;
  /** Branch names present on the remote */
  branches(): Promise<string[]>;
  /** Commit subjects of `branch`, newest first */
  log(branch: string): Promise<string[]>;
  /** File contents on `branch` */
  show(branch: string, filePath: string): Promise<string>;
  cleanup(): Promise<void>;
}

/**
 * Creates a bare repository under a temp directory that stands in for the
 * hosted remote, seeded with `files` on `main`.
 */
export async function createBareRemote(
  repoFullname: string,
  files: Record<string, string>,
): Promise<BareRemote> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'northstar-remote-'));
  const url = path.join(root, `${repoFullname}.git`);
  await fs.mkdir(url, { recursive: true });
  await runGit(['init', '--quiet', '--bare', '--initial-branch=main'], url);

  const identity = ['-c', 'user.name=Seed', '-c', 'user.email=seed@example.com'];

  const commitFiles = async (branch: string, toWrite: Record<string, string>, message = 'seed') => {
    const scratch = await fs.mkdtemp(path.join(os.tmpdir(), 'northstar-seed-'));
    try {
      await runGit(['init', '--quiet', '--initial-branch=main'], scratch);
      await runGit(['remote', 'add', 'origin', url], scratch);
      const remoteBranches = await runGit(['ls-remote', '--heads', 'origin'], scratch);
      if (remoteBranches.includes(`refs/heads/${branch}`)) {
        await runGit(['fetch', '--quiet', 'origin', branch], scratch);
        await runGit(['checkout', '--quiet', '-B', branch, 'FETCH_HEAD'], scratch);
      } else if (remoteBranches.includes('refs/heads/main')) {
        await runGit(['fetch', '--quiet', 'origin', 'main'], scratch);
        await runGit(['checkout', '--quiet', '-B', branch, 'FETCH_HEAD'], scratch);
      } else {
        await runGit(['checkout', '--quiet', '-B', branch], scratch);
      }
      for (const [file, content] of Object.entries(toWrite)) {
        const target = path.join(scratch, file);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content);
      }
      await runGit(['add', '-A'], scratch);
      await runGit([...identity, 'commit', '--quiet', '--allow-empty', '-m', message], scratch);
      await runGit(['push', '--quiet', 'origin', `${branch}:refs/heads/${branch}`], scratch);
    } finally {
      await fs.rm(scratch, { recursive: true, force: true });
    }
  };

  await commitFiles('main', files, 'Initial commit');

  return {
    root,
    url,
    template: path.join(root, '{repo}.git'),
    commitFiles,
    branches: async () => {
      const out = await runGit(['for-each-ref', '--format=%(refname:short)', 'refs/heads'], url);
      return out ? out.split('\n').sort() : [];
    },
    log: async (branch) => (await runGit(['log', '--format=%s', branch], url)).split('\n'),
    show: (branch, filePath) => runGit(['show', `${branch}:${filePath}`], url),
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
