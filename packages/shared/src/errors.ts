/**
 * Error codes used throughout the pipeline.
 * Input-shape errors are terminal for an extraction attempt; upstream errors
 * may be retried by the caller; nothing is retried internally.
 */
export const ERROR_CODES = [
  // Configuration
  'ConfigError',
  // Input shape (extraction)
  'RefusedByModel',
  'NoJsonFound',
  'UnrepairableJson',
  // Upstream services
  'MergeServiceError',
  'EmptyMergeResult',
  'Timeout',
  // Version control
  'GitCommandError',
  'CloneFailed',
  'BaseBranchMissing',
  'BranchAllocationExhausted',
  'PushRejected',
  'TargetFileNotFound',
  // Execution
  'NoChangeDetected',
  // Pull request provider
  'Unauthorized',
  'RepoNotFound',
  'InvalidRefs',
  'UpstreamError',
  // Lifecycle
  'InvalidTransition',
  'RecordNotFound',
  'DuplicateRecord',
  'StoreCorrupted',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all pipeline errors.
 * Provides consistent error handling with codes, causes, details and a retry hint.
 *
 * @example
 * ```typescript
 * throw new MergeServiceError('Merge request failed', {
 *   status: 502,
 *   body: '{"error":"bad gateway"}',
 *   details: { repo: 'acme/web', instruction: 'increase button contrast' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;
  /** Whether a caller may reasonably retry the failed operation */
  public readonly retryable: boolean = false;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Base class for failures to recover a proposal from model output.
 * Carries a truncated snippet of the raw text to aid diagnosis.
 */
export class ExtractionError extends AppError {
  /** Leading portion of the raw model output */
  public readonly snippet: string;

  constructor(
    code: 'RefusedByModel' | 'NoJsonFound' | 'UnrepairableJson',
    message: string,
    options: AppErrorOptions & { snippet?: string } = {},
  ) {
    super(code, message, options);
    this.snippet = options.snippet ?? '';
  }
}

/**
 * The model declined to answer (apology or refusal text).
 */
export class RefusedByModelError extends ExtractionError {
  constructor(options: AppErrorOptions & { snippet?: string } = {}) {
    super('RefusedByModel', `Model refused to produce a proposal: "${options.snippet ?? ''}"`, options);
  }
}

/**
 * No JSON object could be located in the model output.
 */
export class NoJsonFoundError extends ExtractionError {
  constructor(options: AppErrorOptions & { snippet?: string } = {}) {
    super('NoJsonFound', `No JSON object found in model output: "${options.snippet ?? ''}"`, options);
  }
}

/**
 * A JSON candidate was found but could not be parsed even after repair.
 */
export class UnrepairableJsonError extends ExtractionError {
  /** Message of the last parse failure */
  public readonly lastError: string;

  constructor(lastError: string, options: AppErrorOptions & { snippet?: string } = {}) {
    super(
      'UnrepairableJson',
      `Failed to parse JSON from model output: ${lastError} (output: "${options.snippet ?? ''}")`,
      options,
    );
    this.lastError = lastError;
  }
}

/**
 * The merge service returned a non-2xx response, timed out, or could not be reached.
 */
export class MergeServiceError extends AppError {
  public readonly retryable = true;
  /** Upstream HTTP status, when a response was received */
  public readonly status?: number;
  /** Upstream response body, when available */
  public readonly body?: string;
  /** Whether the request was abandoned after the timeout elapsed */
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options: AppErrorOptions & { status?: number; body?: string; timedOut?: boolean } = {},
  ) {
    super('MergeServiceError', message, options);
    this.status = options.status;
    this.body = options.body;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * The merge service answered successfully with no content.
 */
export class EmptyMergeResultError extends AppError {
  constructor(options: AppErrorOptions = {}) {
    super('EmptyMergeResult', 'Merge service returned empty content', options);
  }
}

/**
 * Error thrown when an operation exceeds its deadline.
 */
export class TimeoutError extends AppError {
  public readonly retryable = true;

  constructor(message: string, options: AppErrorOptions = {}) {
    super('Timeout', message, options);
  }
}

/**
 * A git subprocess exited unsuccessfully.
 * Includes the process exit code when available.
 */
export class GitCommandError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;
  /** Captured (redacted) standard error */
  public readonly stderr: string;

  constructor(
    message: string,
    options: AppErrorOptions & { exitCode?: number; stderr?: string } = {},
  ) {
    super('GitCommandError', message, options);
    this.exitCode = options.exitCode;
    this.stderr = options.stderr ?? '';
  }
}

export class CloneFailedError extends AppError {
  public readonly retryable = true;

  constructor(repoFullname: string, options: AppErrorOptions = {}) {
    super(
      'CloneFailed',
      `Failed to clone repository '${repoFullname}'. Verify the repository exists and is accessible.`,
      options,
    );
  }
}

/**
 * The configured base branch does not exist in the clone.
 */
export class BaseBranchMissingError extends AppError {
  public readonly branch: string;

  constructor(branch: string, options: AppErrorOptions = {}) {
    super(
      'BaseBranchMissing',
      `Failed to checkout base branch '${branch}'. Verify that it exists in the repository.`,
      options,
    );
    this.branch = branch;
  }
}

export class BranchAllocationExhaustedError extends AppError {
  constructor(slug: string, probes: number, options: AppErrorOptions = {}) {
    super(
      'BranchAllocationExhausted',
      `No free branch name for '${slug}' after ${probes} probes`,
      options,
    );
  }
}

/**
 * The remote refused a push, typically because a concurrent execution
 * created the same branch name first.
 */
export class PushRejectedError extends AppError {
  public readonly retryable = true;
  public readonly branch: string;

  constructor(branch: string, options: AppErrorOptions = {}) {
    super('PushRejected', `Push of branch '${branch}' was rejected by the remote`, options);
    this.branch = branch;
  }
}

export class TargetFileNotFoundError extends AppError {
  constructor(filePath: string, options: AppErrorOptions = {}) {
    super('TargetFileNotFound', `File ${filePath} not found in repository`, options);
  }
}

/**
 * The merged file is identical to the original; there is nothing to commit.
 */
export class NoChangeDetectedError extends AppError {
  constructor(options: AppErrorOptions = {}) {
    super(
      'NoChangeDetected',
      'No changes detected - nothing to commit (merged code is identical to original)',
      options,
    );
  }
}

/**
 * The PR provider rejected the credential.
 */
export class UnauthorizedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('Unauthorized', `${message}\nHint: the GitHub token may be invalid or expired.`, options);
  }
}

export class RepoNotFoundError extends AppError {
  constructor(repoFullname: string, options: AppErrorOptions = {}) {
    super(
      'RepoNotFound',
      `Repository '${repoFullname}' not found or you don't have access.`,
      options,
    );
  }
}

/**
 * Head/base refs are unusable: identical, missing, or malformed.
 */
export class InvalidRefsError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidRefs', message, options);
  }
}

/**
 * Any other failure reported by an upstream provider.
 */
export class UpstreamError extends AppError {
  public readonly retryable = true;
  /** Upstream HTTP status, when known */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('UpstreamError', message, options);
    this.status = options.status;
  }
}

export class InvalidTransitionError extends AppError {
  constructor(entity: string, from: string, to: string, options: AppErrorOptions = {}) {
    super('InvalidTransition', `${entity} cannot move from '${from}' to '${to}'`, options);
  }
}

export class RecordNotFoundError extends AppError {
  constructor(entity: string, id: string, options: AppErrorOptions = {}) {
    super('RecordNotFound', `${entity} '${id}' not found`, options);
  }
}

export class DuplicateRecordError extends AppError {
  constructor(entity: string, id: string, options: AppErrorOptions = {}) {
    super('DuplicateRecord', `${entity} '${id}' already exists`, options);
  }
}

/**
 * Error thrown when the persisted lifecycle document is unreadable.
 */
export class StoreCorruptedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreCorrupted', message, options);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}

/**
 * Normalizes anything thrown into an AppError so that every failure
 * crossing a component boundary is typed.
 */
export function toAppError(error: unknown, details?: Record<string, unknown>): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(message, { cause: error, details });
}
