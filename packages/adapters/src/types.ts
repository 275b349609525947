import type { Logger } from '@northstar/shared';

/**
 * Context passed to adapter methods for each request.
 * Provides access to logging, cancellation, and the request timeout.
 */
export interface AdapterContext {
  /** Identifier of the experiment the request belongs to */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Overrides the adapter's configured timeout, in milliseconds */
  timeoutMs?: number;
}

/**
 * Merges a Fast-Apply update block into a file's full contents.
 * The merge is an opaque text transform performed by an external service.
 */
export interface MergeGateway {
  /**
   * @returns the full merged file contents
   * @throws MergeServiceError on non-2xx, connection failure or timeout
   * @throws EmptyMergeResultError when the service answers with no content
   */
  merge(request: MergeRequest, ctx: AdapterContext): Promise<string>;
}

export interface MergeRequest {
  instruction: string;
  original: string;
  updateBlock: string;
}

export interface PullRequestRef {
  url: string;
  number: number;
}

export interface CreatePullRequest {
  repoFullname: string;
  head: string;
  base: string;
  title: string;
  body: string;
}

/**
 * Pull-request hosting. Errors are mapped to UnauthorizedError,
 * RepoNotFoundError, InvalidRefsError or UpstreamError.
 */
export interface PullRequestProvider {
  /** The open pull request from `head` into `base`, if any */
  findOpenByHead(
    repoFullname: string,
    head: string,
    base: string,
    ctx: AdapterContext,
  ): Promise<PullRequestRef | null>;

  create(request: CreatePullRequest, ctx: AdapterContext): Promise<PullRequestRef>;
}
