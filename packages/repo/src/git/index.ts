import { spawn } from 'child_process';
import {
  GitCommandError,
  PushRejectedError,
  TimeoutError,
  linkAbort,
  redactText,
} from '@northstar/shared';

export interface GitServiceOptions {
  repoRoot: string;
  /** Per-command ceiling in milliseconds */
  timeoutMs?: number;
  /** Identity used for commits made by the pipeline */
  author?: { name: string; email: string };
  /** Cancels every command run by this service */
  signal?: AbortSignal;
}

export interface GitResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface ExecOptions {
  /** Resolve with the exit code instead of rejecting on failure */
  allowFailure?: boolean;
}

const PUSH_REJECTED = /\[rejected\]|\[remote rejected\]|non-fast-forward|fetch first/;

/**
 * Thin wrapper over the git CLI. Commands are spawned without a shell;
 * failures raise GitCommandError with credentials redacted.
 */
export class GitService {
  readonly repoRoot: string;
  private readonly timeoutMs?: number;
  private readonly author?: { name: string; email: string };
  private readonly signal?: AbortSignal;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.timeoutMs = options.timeoutMs;
    this.author = options.author;
    this.signal = options.signal;
  }

  async exec(args: string[], options: ExecOptions = {}): Promise<GitResult> {
    const linked = linkAbort(this.signal, this.timeoutMs);
    const command = redactText(`git ${args.join(' ')}`);

    try {
      const result = await new Promise<GitResult>((resolve, reject) => {
        const child = spawn('git', args, {
          cwd: this.repoRoot,
          signal: linked.signal,
          env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        });
        let stdout = '';
        let stderr = '';

        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });

        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });

        child.on('close', (code) => {
          resolve({ stdout: stdout.trim(), stderr: redactText(stderr.trim()), exitCode: code ?? -1 });
        });

        child.on('error', (err) => {
          reject(err);
        });
      });

      if (result.exitCode !== 0 && !options.allowFailure) {
        throw new GitCommandError(`Git command failed: ${command}\n${result.stderr}`, {
          exitCode: result.exitCode,
          stderr: result.stderr,
        });
      }
      return result;
    } catch (error) {
      if (linked.signal.aborted) {
        throw new TimeoutError(`Git command aborted: ${command}`, { cause: error });
      }
      if (error instanceof GitCommandError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new GitCommandError(`Failed to start git process: ${message}`, { cause: error });
    } finally {
      linked.dispose();
    }
  }

  private async run(args: string[]): Promise<string> {
    return (await this.exec(args)).stdout;
  }

  /** Clones `remoteUrl` into the (empty) repository root. */
  async clone(remoteUrl: string): Promise<void> {
    await this.run(['clone', '--quiet', remoteUrl, '.']);
  }

  async checkout(ref: string): Promise<void> {
    await this.run(['checkout', '--quiet', ref]);
  }

  async refExists(branch: string): Promise<boolean> {
    const { exitCode } = await this.exec(['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`], {
      allowFailure: true,
    });
    return exitCode === 0;
  }

  async remoteBranchExists(branch: string, remote = 'origin'): Promise<boolean> {
    const { exitCode } = await this.exec(
      ['rev-parse', '--verify', '--quiet', `refs/remotes/${remote}/${branch}`],
      { allowFailure: true },
    );
    return exitCode === 0;
  }

  async createAndCheckoutBranch(branchName: string): Promise<void> {
    await this.run(['checkout', '--quiet', '-b', branchName]);
  }

  async renameCurrentBranch(branchName: string): Promise<void> {
    await this.run(['branch', '-m', branchName]);
  }

  async stageAll(): Promise<void> {
    await this.run(['add', '-A']);
  }

  async getStatusPorcelain(): Promise<string> {
    return this.run(['status', '--porcelain']);
  }

  async isDirty(): Promise<boolean> {
    return (await this.getStatusPorcelain()) !== '';
  }

  async commit(message: string): Promise<void> {
    const identity = this.author
      ? ['-c', `user.name=${this.author.name}`, '-c', `user.email=${this.author.email}`]
      : [];
    await this.run([...identity, 'commit', '--quiet', '-m', message]);
  }

  /**
   * Pushes `branch` to the remote and sets its upstream.
   * @throws PushRejectedError when the remote refuses the update
   */
  async push(branch: string, remote = 'origin'): Promise<void> {
    const result = await this.exec(['push', '--set-upstream', remote, branch], { allowFailure: true });
    if (result.exitCode === 0) return;

    const cause = new GitCommandError(`Git command failed: git push ${remote} ${branch}\n${result.stderr}`, {
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
    if (PUSH_REJECTED.test(result.stderr)) {
      throw new PushRejectedError(branch, { cause, details: { stderr: result.stderr } });
    }
    throw cause;
  }

  async fetch(remote = 'origin'): Promise<void> {
    await this.run(['fetch', '--quiet', '--prune', remote]);
  }

  async currentBranch(): Promise<string> {
    return this.run(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async getHeadSha(): Promise<string> {
    return this.run(['rev-parse', 'HEAD']);
  }

  async setRemoteUrl(url: string, remote = 'origin'): Promise<void> {
    await this.run(['remote', 'set-url', remote, url]);
  }
}
