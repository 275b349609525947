import { InvalidRefsError, TimeoutError, type AppError } from '@northstar/shared';
import type {
  AdapterContext,
  CreatePullRequest,
  PullRequestProvider,
  PullRequestRef,
} from '../types';

export interface FakePullRequest extends CreatePullRequest, PullRequestRef {
  state: 'open' | 'closed';
}

/**
 * In-memory pull request host. URLs follow GitHub's
 * `https://github.com/<owner>/<name>/pull/<n>` form.
 */
export class FakePullRequestProvider implements PullRequestProvider {
  readonly pullRequests: FakePullRequest[] = [];
  createCalls = 0;
  listCalls = 0;
  /** When set, the next `create` call fails with this error */
  failNextCreate: AppError | null = null;
  private nextNumber = 1;

  async findOpenByHead(
    repoFullname: string,
    head: string,
    base: string,
    ctx: AdapterContext,
  ): Promise<PullRequestRef | null> {
    this.checkAborted(ctx);
    this.listCalls++;
    const found = this.pullRequests.find(
      (pr) => pr.state === 'open' && pr.repoFullname === repoFullname && pr.head === head && pr.base === base,
    );
    return found ? { url: found.url, number: found.number } : null;
  }

  async create(request: CreatePullRequest, ctx: AdapterContext): Promise<PullRequestRef> {
    this.checkAborted(ctx);
    this.createCalls++;

    if (this.failNextCreate) {
      const error = this.failNextCreate;
      this.failNextCreate = null;
      throw error;
    }
    if (request.head === request.base) {
      throw new InvalidRefsError(`No commits between ${request.base} and ${request.head}`);
    }
    const duplicate = this.pullRequests.some(
      (pr) =>
        pr.state === 'open' &&
        pr.repoFullname === request.repoFullname &&
        pr.head === request.head &&
        pr.base === request.base,
    );
    if (duplicate) {
      throw new InvalidRefsError(`A pull request already exists for ${request.head}`);
    }

    const number = this.nextNumber++;
    const url = `https://github.com/${request.repoFullname}/pull/${number}`;
    this.pullRequests.push({ ...request, number, url, state: 'open' });
    return { url, number };
  }

  private checkAborted(ctx: AdapterContext): void {
    if (ctx.abortSignal?.aborted) {
      throw new TimeoutError('Pull request call aborted');
    }
  }
}
