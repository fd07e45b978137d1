// Error types for chat model providers

/**
 * Base error for everything that goes wrong talking to the model
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Missing or rejected model API key (401) */
export class LLMAuthenticationError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'LLMAuthenticationError';
  }
}

/** Key is valid but not allowed to use the model (403) */
export class LLMPermissionError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'LLMPermissionError';
  }
}

/** Rate limit exceeded (429); `retryAfter` is in milliseconds */
export class LLMRateLimitError extends LLMError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'LLMRateLimitError';
  }
}

/** Unknown or unavailable model (404) */
export class ModelNotFoundError extends LLMError {
  constructor(
    message: string,
    public readonly model: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ModelNotFoundError';
  }
}

export class ContextLengthError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ContextLengthError';
  }
}

export class ContentFilterError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ContentFilterError';
  }
}

/** Provider-side failure (5xx) */
export class LLMServerError extends LLMError {
  constructor(
    message: string,
    public readonly statusCode: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'LLMServerError';
  }
}

/** Request rejected locally before reaching the provider */
export class LLMValidationError extends LLMError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'LLMValidationError';
  }
}

export class LLMConfigurationError extends LLMError {
  constructor(message: string) {
    super(message);
    this.name = 'LLMConfigurationError';
  }
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

/**
 * Wrap unknown errors in an LLMError
 */
export function wrapLLMError(error: unknown, message: string): LLMError {
  if (error instanceof LLMError) {
    return error;
  }
  if (error instanceof Error) {
    return new LLMError(message, error);
  }
  return new LLMError(`${message}: ${String(error)}`);
}
