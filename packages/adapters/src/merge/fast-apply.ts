import OpenAI, { APIError, APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import {
  AppError,
  ConfigError,
  EmptyMergeResultError,
  MergeServiceError,
  TimeoutError,
  type MergeConfig,
} from '@northstar/shared';
import { BaseAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import type { AdapterContext, MergeGateway, MergeRequest } from '../types';

/**
 * Builds the single user message the Fast-Apply model expects.
 */
export function buildMergePrompt({ instruction, original, updateBlock }: MergeRequest): string {
  return `<instruction>${instruction}</instruction>\n<code>${original}</code>\n<update>${updateBlock}</update>`;
}

/**
 * Merge gateway over an OpenAI-compatible chat completions endpoint serving a
 * Fast-Apply model. SDK retries are disabled; callers decide whether to retry.
 */
export class FastApplyMergeGateway extends BaseAdapter implements MergeGateway {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  constructor(config: MergeConfig) {
    super();
    if (!config.apiKey) {
      throw new ConfigError(
        `Missing API key for the merge service. Checked merge.apiKey and env var ${config.apiKeyEnv}`,
      );
    }
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  async merge(request: MergeRequest, ctx: AdapterContext): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: buildMergePrompt(request) }],
        },
        {
          signal: ctx.abortSignal,
          timeout: ctx.timeoutMs ?? this.timeoutMs,
          maxRetries: 0,
        },
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw this.mapError(error);
    }

    if (!content || content.trim() === '') {
      throw new EmptyMergeResultError({ details: { model: this.model } });
    }

    await ctx.logger.debug(
      `Merge service returned ${content.length} chars for ${request.original.length} chars of input`,
    );
    return content;
  }

  protected fromStatus(error: APIErrorLike & { status: number }, cause: unknown): AppError {
    const body = cause instanceof APIError && cause.error !== undefined ? JSON.stringify(cause.error) : undefined;
    return new MergeServiceError(`Merge service request failed: ${error.message}`, {
      status: error.status,
      body,
      cause,
    });
  }

  protected fromTimeout(message: string, cause: unknown): AppError {
    return new MergeServiceError(`Merge service timed out: ${message}`, { timedOut: true, cause });
  }

  protected fromUnknown(message: string, cause: unknown): AppError {
    if (cause instanceof APIUserAbortError) {
      return new TimeoutError('Merge request aborted', { cause });
    }
    return new MergeServiceError(`Merge service unreachable: ${message}`, { cause });
  }
}
