// Server error types for datcom
// Follows the same pattern as core package errors

import {
  DataCommonsAuthenticationError,
  type DataCommonsError,
  DataCommonsRequestError,
  DataCommonsTransportError,
  DataCommonsValidationError,
  isDataCommonsError,
  isLLMError,
  MalformedResponseError,
} from '@datcom/core';

/**
 * Base error class for all server-related errors
 */
export class ServerError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ServerError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set cause for error chaining
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when server configuration is invalid
 */
export class ServerConfigError extends ServerError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ServerConfigError';
  }
}

/**
 * Thrown when HTTP transport configuration is invalid
 */
export class TransportConfigError extends ServerError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'TransportConfigError';
  }
}

export class ServerStartError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStartError';
  }
}

export class ServerStopError extends ServerError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ServerStopError';
  }
}

/**
 * Type guard to check if an error is a ServerError
 */
export function isServerError(error: unknown): error is ServerError {
  return error instanceof ServerError;
}

/**
 * Wrap an unknown error as a ServerError
 */
export function wrapServerError(error: unknown, message: string): ServerError {
  if (error instanceof ServerError) {
    return error;
  }
  if (error instanceof Error) {
    return new ServerError(message, error);
  }
  return new ServerError(`${message}: ${String(error)}`);
}

/**
 * Format error for MCP tool response
 */
export function formatToolError(
  error: unknown,
  toolName: string,
): {
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
} {
  let errorMessage: string;

  if (isDataCommonsError(error)) {
    errorMessage = formatDataCommonsError(error, toolName);
  } else if (isLLMError(error)) {
    errorMessage = `Model error in ${toolName}: ${error.message}`;
  } else if (error instanceof Error) {
    errorMessage = `Error in ${toolName}: ${error.message}`;
  } else {
    errorMessage = `Unknown error in ${toolName}: ${String(error)}`;
  }

  return {
    content: [{ type: 'text' as const, text: errorMessage }],
    isError: true,
  };
}

/**
 * Format Data Commons errors with user-friendly messages
 */
function formatDataCommonsError(
  error: DataCommonsError,
  toolName: string,
): string {
  if (error instanceof DataCommonsValidationError) {
    const field = error.field ? ` (${error.field})` : '';
    return `Invalid input to ${toolName}${field}: ${error.message}`;
  }

  if (error instanceof DataCommonsAuthenticationError) {
    return `Data Commons authentication failed: ${error.message}`;
  }

  if (error instanceof DataCommonsTransportError) {
    return `Could not reach Data Commons: ${error.message}`;
  }

  if (error instanceof DataCommonsRequestError) {
    return `Data Commons request failed (${error.statusCode}): ${error.message}`;
  }

  if (error instanceof MalformedResponseError) {
    return `Unexpected response from Data Commons: ${error.message}`;
  }

  return `Data Commons error in ${toolName}: ${error.message}`;
}
