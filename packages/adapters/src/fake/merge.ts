import { TimeoutError } from '@northstar/shared';
import type { AdapterContext, MergeGateway, MergeRequest } from '../types';

export type MergeResponder = (request: MergeRequest) => string | Error | Promise<string>;

/**
 * In-process merge gateway for tests and dry runs. Answers from a responder
 * function or a fixed queue of results, and records every request.
 */
export class FakeMergeGateway implements MergeGateway {
  readonly calls: MergeRequest[] = [];
  private readonly responder: MergeResponder;

  constructor(responder: MergeResponder) {
    this.responder = responder;
  }

  /**
   * Answers successive calls with the given results; errors are thrown.
   * Once the queue is exhausted the last result repeats.
   */
  static returning(...results: Array<string | Error>): FakeMergeGateway {
    const queue = [...results];
    return new FakeMergeGateway(() => {
      const next = queue.length > 1 ? queue.shift() : queue[0];
      return next ?? new Error('FakeMergeGateway has no scripted result');
    });
  }

  async merge(request: MergeRequest, ctx: AdapterContext): Promise<string> {
    if (ctx.abortSignal?.aborted) {
      throw new TimeoutError('Merge request aborted');
    }
    this.calls.push(request);
    const result = await this.responder(request);
    if (result instanceof Error) throw result;
    return result;
  }
}
