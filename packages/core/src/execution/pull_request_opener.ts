import { InvalidRefsError } from '@northstar/shared';
import type { AdapterContext, PullRequestProvider } from '@northstar/adapters';

export interface OpenPullRequest {
  repoFullname: string;
  head: string;
  base: string;
  title: string;
  body: string;
}

export interface OpenedPullRequest {
  url: string;
  number: number;
  /** False when an already-open pull request was returned */
  created: boolean;
}

const REPO_FULLNAME = /^[^/\s]+\/[^/\s]+$/;

/**
 * Opens a pull request at most once per head/base pair: an open pull request
 * for the same refs is returned instead of creating another.
 */
export class PullRequestOpener {
  constructor(private readonly provider: PullRequestProvider) {}

  async open(request: OpenPullRequest, ctx: AdapterContext): Promise<OpenedPullRequest> {
    const { repoFullname, head, base } = request;
    const details = { repo: repoFullname, head, base };

    if (!REPO_FULLNAME.test(repoFullname)) {
      throw new InvalidRefsError(`Repository '${repoFullname}' is not in owner/name form`, { details });
    }
    if (!head || !base) {
      throw new InvalidRefsError('Both head and base branches are required', { details });
    }
    if (head === base) {
      throw new InvalidRefsError(`Head branch '${head}' is the same as the base branch`, { details });
    }

    const existing = await this.provider.findOpenByHead(repoFullname, head, base, ctx);
    if (existing) {
      await ctx.logger.debug(`Reusing open pull request ${existing.url}`);
      return { ...existing, created: false };
    }

    const created = await this.provider.create(request, ctx);
    return { ...created, created: true };
  }
}
