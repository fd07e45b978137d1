// Custom error types for the Data Commons client

/**
 * Base error for all Data Commons errors
 */
export class DataCommonsError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DataCommonsError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the request never produced an HTTP response
 * (DNS failure, refused connection, reset socket)
 */
export class DataCommonsTransportError extends DataCommonsError {
  constructor(
    message: string,
    public readonly endpoint: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'DataCommonsTransportError';
  }
}

/**
 * Thrown when the API key is missing or rejected (401/403)
 */
export class DataCommonsAuthenticationError extends DataCommonsError {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DataCommonsAuthenticationError';
  }
}

/**
 * Thrown for any other non-2xx response
 */
export class DataCommonsRequestError extends DataCommonsError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly endpoint: string,
  ) {
    super(message);
    this.name = 'DataCommonsRequestError';
  }
}

/**
 * Thrown when the response body is not JSON or does not match the expected shape
 */
export class MalformedResponseError extends DataCommonsError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Thrown when caller input is rejected before any request is made
 */
export class DataCommonsValidationError extends DataCommonsError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'DataCommonsValidationError';
  }
}

/**
 * Check if an error is a DataCommonsError or subclass
 */
export function isDataCommonsError(error: unknown): error is DataCommonsError {
  return error instanceof DataCommonsError;
}

/**
 * Wrap unknown errors in a DataCommonsError
 */
export function wrapDataCommonsError(
  error: unknown,
  message: string,
): DataCommonsError {
  if (error instanceof DataCommonsError) {
    return error;
  }
  if (error instanceof Error) {
    return new DataCommonsError(message, error);
  }
  return new DataCommonsError(`${message}: ${String(error)}`);
}
