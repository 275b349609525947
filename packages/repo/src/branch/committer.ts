import { NoChangeDetectedError, PushRejectedError, noopLogger, type Logger } from '@northstar/shared';
import type { GitService } from '../git';
import type { BranchAllocator } from './allocator';

export interface CommitRequest {
  branch: string;
  /** Base name re-probed when the push is rejected */
  slug: string;
  message: string;
  /** Called with the re-probed name after a rejected push, before it is pushed */
  onRenamed?: (renamed: string, rejected: string) => void | Promise<void>;
}

export interface CommitResult {
  /** Branch that reached the remote; differs from the request after a retry */
  branch: string;
  sha: string;
  /** Branch whose push was rejected, when a retry happened */
  rejectedBranch?: string;
}

/**
 * Commits the working tree and pushes it. A rejected push (another execution
 * took the name first) is retried exactly once under a freshly probed name.
 */
export class Committer {
  private readonly logger: Logger;

  constructor(
    private readonly git: GitService,
    private readonly allocator: BranchAllocator,
    logger?: Logger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  async commitAndPush({ branch, slug, message, onRenamed }: CommitRequest): Promise<CommitResult> {
    await this.git.stageAll();
    if (!(await this.git.isDirty())) {
      throw new NoChangeDetectedError({ details: { branch } });
    }

    await this.git.commit(message);
    const sha = await this.git.getHeadSha();

    try {
      await this.git.push(branch);
      return { branch, sha };
    } catch (error) {
      if (!(error instanceof PushRejectedError)) throw error;
      await this.logger.warn(`Push of ${branch} was rejected; re-probing the branch name`);
    }

    const { branch: renamed } = await this.allocator.reallocate(branch, slug);
    await onRenamed?.(renamed, branch);
    await this.git.push(renamed);
    return { branch: renamed, sha, rejectedBranch: branch };
  }
}
