/**
 * Error taxonomy for prompt learning.
 *
 * Every error thrown by the engine is a `PromptLearningError`. Precondition
 * failures surface as `DatasetError` before any model call is made.
 */

export class PromptLearningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PromptLearningError';
  }
}

/** Missing or invalid input data. */
export class DatasetError extends PromptLearningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetError';
  }
}

/** Token accounting failures. */
export class TokenLimitError extends PromptLearningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenLimitError';
  }
}

/** Retry exhaustion or batch-processing failure. */
export class OptimizationError extends PromptLearningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OptimizationError';
  }
}

/** Setup or environment problems. */
export class ConfigurationError extends PromptLearningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export type ProviderErrorCategory = 'timeout' | 'rate_limited' | 'api_error';

/**
 * Language-model call failure. Only timeouts and rate limiting are retryable.
 */
export class ProviderError extends PromptLearningError {
  readonly category: ProviderErrorCategory;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      category: ProviderErrorCategory;
      statusCode?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.category = options.category;
    this.retryable = options.category !== 'api_error';
    this.statusCode = options.statusCode;
  }
}

const TIMEOUT_STATUS_CODES = new Set([408, 504]);
const RATE_LIMIT_STATUS_CODES = new Set([429]);

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Classify a raw SDK error. SDK classes are not matched with instanceof so
 * that any client exposing `status` or a timeout-named error is understood.
 */
export function classifyProviderError(error: unknown): ProviderErrorCategory {
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    if (RATE_LIMIT_STATUS_CODES.has(statusCode)) return 'rate_limited';
    if (TIMEOUT_STATUS_CODES.has(statusCode)) return 'timeout';
    return 'api_error';
  }

  if (error instanceof Error) {
    const name = error.name.toLowerCase();
    const message = error.message.toLowerCase();
    if (name.includes('timeout') || message.includes('timed out') || message.includes('timeout')) {
      return 'timeout';
    }
    if (message.includes('rate limit')) return 'rate_limited';
  }

  return 'api_error';
}

/**
 * Wrap a raw SDK error in a ProviderError, keeping an existing one as is.
 */
export function toProviderError(error: unknown, model: string): ProviderError {
  if (error instanceof ProviderError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`LLM call failed (${model}): ${message}`, {
    category: classifyProviderError(error),
    statusCode: statusCodeOf(error),
    cause: error,
  });
}

/**
 * Timeouts and rate limits are worth retrying. Raw errors from a caller's own
 * model are classified the same way as SDK errors; this library's other
 * errors never are.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  if (error instanceof PromptLearningError) return false;
  return classifyProviderError(error) !== 'api_error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
