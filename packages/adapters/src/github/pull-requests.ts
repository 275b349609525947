import { Octokit } from '@octokit/rest';
import {
  AppError,
  InvalidRefsError,
  RepoNotFoundError,
  TimeoutError,
  UnauthorizedError,
  UpstreamError,
  linkAbort,
  type GitHubConfig,
} from '@northstar/shared';
import { BaseAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import type {
  AdapterContext,
  CreatePullRequest,
  PullRequestProvider,
  PullRequestRef,
} from '../types';

export interface GitHubPullRequestProviderOptions {
  /** Replaces the global fetch; used by tests */
  fetch?: typeof fetch;
}

export function splitRepoFullname(repoFullname: string): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(repoFullname);
  if (!match) {
    throw new InvalidRefsError(`Repository '${repoFullname}' is not in owner/name form`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Pull request provider backed by the GitHub REST API.
 */
export class GitHubPullRequestProvider extends BaseAdapter implements PullRequestProvider {
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike =>
      error instanceof Error && 'status' in error && typeof error.status === 'number',
    isTimeoutError: (error: unknown) => error instanceof Error && error.name === 'AbortError',
  };

  constructor(config: GitHubConfig, options: GitHubPullRequestProviderOptions = {}) {
    super();
    this.timeoutMs = config.timeoutMs;
    this.octokit = new Octokit({
      auth: config.token,
      baseUrl: config.apiBaseUrl,
      userAgent: 'northstar',
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  async findOpenByHead(
    repoFullname: string,
    head: string,
    base: string,
    ctx: AdapterContext,
  ): Promise<PullRequestRef | null> {
    const { owner, repo } = splitRepoFullname(repoFullname);
    const { data } = await this.call(repoFullname, ctx, (signal) =>
      this.octokit.pulls.list({
        owner,
        repo,
        state: 'open',
        head: `${owner}:${head}`,
        base,
        per_page: 1,
        request: { signal },
      }),
    );
    const [existing] = data;
    return existing ? { url: existing.html_url, number: existing.number } : null;
  }

  async create(request: CreatePullRequest, ctx: AdapterContext): Promise<PullRequestRef> {
    const { owner, repo } = splitRepoFullname(request.repoFullname);
    const { data } = await this.call(request.repoFullname, ctx, (signal) =>
      this.octokit.pulls.create({
        owner,
        repo,
        title: request.title,
        body: request.body,
        head: request.head,
        base: request.base,
        request: { signal },
      }),
    );
    return { url: data.html_url, number: data.number };
  }

  private async call<T>(
    repoFullname: string,
    ctx: AdapterContext,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const linked = linkAbort(ctx.abortSignal, ctx.timeoutMs ?? this.timeoutMs);
    try {
      return await fn(linked.signal);
    } catch (error) {
      // fetch rejects with the abort reason, which Octokit re-wraps as a 500.
      if (linked.signal.aborted) {
        throw this.fromTimeout(String(linked.signal.reason), error, { repo: repoFullname });
      }
      throw this.mapError(error, { repo: repoFullname });
    } finally {
      linked.dispose();
    }
  }

  protected fromStatus(
    error: APIErrorLike & { status: number },
    cause: unknown,
    context: Record<string, unknown>,
  ): AppError {
    const details = { ...context, status: error.status };
    switch (error.status) {
      case 401:
        return new UnauthorizedError(`GitHub rejected the credentials: ${error.message}`, { cause, details });
      case 403:
        if (/bad credentials/i.test(error.message)) {
          return new UnauthorizedError(`GitHub rejected the credentials: ${error.message}`, { cause, details });
        }
        break;
      case 404:
        return new RepoNotFoundError(String(context.repo), { cause, details });
      case 422:
        return new InvalidRefsError(
          `GitHub could not create the pull request: ${error.message}\nHint: the base and head branches may be identical or missing.`,
          { cause, details },
        );
    }
    return new UpstreamError(`GitHub API error (${error.status}): ${error.message}`, {
      status: error.status,
      cause,
      details,
    });
  }

  protected fromTimeout(message: string, cause: unknown, context: Record<string, unknown>): AppError {
    return new TimeoutError(`GitHub request aborted: ${message}`, { cause, details: context });
  }

  protected fromUnknown(message: string, cause: unknown, context: Record<string, unknown>): AppError {
    return new UpstreamError(`GitHub request failed: ${message}`, { cause, details: context });
  }
}
