import { dir } from 'tmp-promise';
import {
  AppError,
  CloneFailedError,
  noopLogger,
  type GitConfig,
  type GitHubConfig,
  type Logger,
} from '@northstar/shared';
import { GitService } from '../git';

export interface CloneContext {
  /** Root of the checkout */
  dir: string;
  git: GitService;
}

export interface WorkspaceOptions {
  github: Pick<GitHubConfig, 'remoteUrlTemplate' | 'token'>;
  git: Pick<GitConfig, 'timeoutMs' | 'authorName' | 'authorEmail'>;
  logger?: Logger;
}

/**
 * Resolves the clone URL for a repository, embedding `x-access-token`
 * credentials for https remotes when a token is configured.
 */
export function remoteUrlFor(template: string, repoFullname: string, token?: string): string {
  const url = template.replace('{repo}', repoFullname);
  if (!token || !url.startsWith('https://')) return url;
  return url.replace('https://', `https://x-access-token:${encodeURIComponent(token)}@`);
}

/**
 * Runs work against a fresh clone in a temporary directory. The directory is
 * removed on every exit path, including failures and aborts.
 */
export class TemporaryCloneWorkspace {
  private readonly options: WorkspaceOptions;
  private readonly logger: Logger;

  constructor(options: WorkspaceOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  async withClone<T>(
    repoFullname: string,
    fn: (clone: CloneContext) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const tmp = await dir({ prefix: 'northstar-', unsafeCleanup: true });
    const git = new GitService({
      repoRoot: tmp.path,
      timeoutMs: this.options.git.timeoutMs,
      author: { name: this.options.git.authorName, email: this.options.git.authorEmail },
      signal,
    });

    try {
      const url = remoteUrlFor(this.options.github.remoteUrlTemplate, repoFullname, this.options.github.token);
      try {
        await git.clone(url);
      } catch (error) {
        // Aborts surface as TimeoutError and keep their identity.
        if (error instanceof AppError && error.code === 'Timeout') throw error;
        throw new CloneFailedError(repoFullname, { cause: error, details: { repo: repoFullname } });
      }
      await this.logger.debug(`Cloned ${repoFullname} into ${tmp.path}`);
      return await fn({ dir: tmp.path, git });
    } finally {
      await tmp.cleanup();
      await this.logger.debug(`Removed clone of ${repoFullname}`);
    }
  }
}
