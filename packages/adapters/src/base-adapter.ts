import { AppError } from '@northstar/shared';

/**
 * Interface for API error types that have a status code.
 * Used by the base adapter to handle common error mapping.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in adapters.
 * Each SDK supplies its own error class checks.
 */
export interface ErrorTypeConfig {
  /** Check if the error is an API error with status code */
  isAPIError: (error: unknown) => error is APIErrorLike;
  /** Check if the error is a connection timeout error */
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for adapters over third-party SDKs that maps SDK failures onto
 * the pipeline's error taxonomy. Subclasses configure the SDK error checks and
 * decide what each kind of failure becomes.
 */
export abstract class BaseAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected abstract fromStatus(
    error: APIErrorLike & { status: number },
    cause: unknown,
    context: Record<string, unknown>,
  ): AppError;
  protected abstract fromTimeout(message: string, cause: unknown, context: Record<string, unknown>): AppError;
  protected abstract fromUnknown(message: string, cause: unknown, context: Record<string, unknown>): AppError;

  /**
   * Maps SDK errors to AppErrors:
   * - AppErrors pass through
   * - timeout errors -> fromTimeout
   * - API errors with a status -> fromStatus
   * - anything else -> fromUnknown
   *
   * `context` (repository, branch, ...) is handed to each hook for error details.
   */
  protected mapError(error: unknown, context: Record<string, unknown> = {}): AppError {
    if (error instanceof AppError) return error;

    const message = error instanceof Error ? error.message : String(error);

    // Timeouts are checked first: some SDKs model them as status-less API errors.
    if (this.errorConfig.isTimeoutError(error)) {
      return this.fromTimeout(message, error, context);
    }

    if (this.errorConfig.isAPIError(error)) {
      const { status } = error;
      if (status !== undefined) {
        return this.fromStatus({ status, message: error.message }, error, context);
      }
    }

    return this.fromUnknown(message, error, context);
  }
}
