import {
  BaseBranchMissingError,
  BranchAllocationExhaustedError,
  GitCommandError,
  noopLogger,
  type Logger,
} from '@northstar/shared';
import type { GitService } from '../git';

export interface BranchAllocation {
  branch: string;
  /** Names tried, including the one that was free */
  probes: number;
}

export interface BranchAllocatorOptions {
  /** Highest suffix probed before giving up. Default: 50 */
  maxProbes?: number;
  logger?: Logger;
}

/**
 * `slug`, then `slug-v2`, `slug-v3`, ...
 */
export function candidateName(slug: string, attempt: number): string {
  return attempt === 1 ? slug : `${slug}-v${attempt}`;
}

/**
 * Picks branch names that collide with neither local branches nor the
 * remote-tracking branches of `origin`.
 */
export class BranchAllocator {
  private readonly maxProbes: number;
  private readonly logger: Logger;

  constructor(
    private readonly git: GitService,
    options: BranchAllocatorOptions = {},
  ) {
    this.maxProbes = options.maxProbes ?? 50;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Checks out `base`, then creates and checks out the first unused name
   * derived from `slug`.
   */
  async allocate(base: string, slug: string): Promise<BranchAllocation> {
    try {
      await this.git.checkout(base);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new BaseBranchMissingError(base, { cause: error, details: { branch: base } });
      }
      throw error;
    }

    const allocation = await this.findFree(slug);
    await this.git.createAndCheckoutBranch(allocation.branch);
    await this.logger.debug(`Allocated ${allocation.branch} from ${base} after ${allocation.probes} probe(s)`);
    return allocation;
  }

  /**
   * Refreshes remote-tracking refs and renames the current branch to the next
   * unused name. Used after the remote rejected a push of `current`.
   */
  async reallocate(current: string, slug: string): Promise<BranchAllocation> {
    await this.git.fetch();
    const allocation = await this.findFree(slug);
    await this.git.renameCurrentBranch(allocation.branch);
    await this.logger.info(`Renamed ${current} to ${allocation.branch} after a rejected push`);
    return allocation;
  }

  private async findFree(slug: string): Promise<BranchAllocation> {
    for (let attempt = 1; attempt <= this.maxProbes; attempt++) {
      const branch = candidateName(slug, attempt);
      if (!(await this.git.refExists(branch)) && !(await this.git.remoteBranchExists(branch))) {
        return { branch, probes: attempt };
      }
    }
    throw new BranchAllocationExhaustedError(slug, this.maxProbes, { details: { slug } });
  }
}
