import type { PayPalErrorBody } from './models/common.js';

/**
 * Base error class for all paypal-rest errors.
 */
export class PayPalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayPalError';
    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Error thrown when an API request fails with an error status code.
 *
 * `body` holds PayPal's parsed error payload when the response carried one.
 */
export class APIError extends PayPalError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: PayPalErrorBody
  ) {
    super(message);
    this.name = 'APIError';
  }

  /** PayPal's symbolic error name, e.g. `INVALID_REQUEST`. */
  get errorName(): string | undefined {
    return this.body?.name;
  }
}

/**
 * Error thrown when PayPal rejects our credentials (HTTP 401), including
 * after the single token refresh has been tried.
 */
export class AuthenticationError extends APIError {
  constructor(message: string = 'Authentication failed', body?: PayPalErrorBody) {
    super(message, 401, body);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when the credentials lack permission for a resource (HTTP 403).
 */
export class AuthorizationError extends APIError {
  constructor(message: string = 'Permission denied', body?: PayPalErrorBody) {
    super(message, 403, body);
    this.name = 'AuthorizationError';
  }
}

/**
 * Error thrown when a requested resource is not found (HTTP 404).
 */
export class NotFoundError extends APIError {
  constructor(message: string = 'Resource not found', body?: PayPalErrorBody) {
    super(message, 404, body);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when PayPal rejects the request parameters (HTTP 400/422).
 * `issues` lists each `{ issue, location }` detail from the response.
 */
export class ValidationError extends APIError {
  constructor(message: string, status: number, body?: PayPalErrorBody) {
    super(message, status, body);
    this.name = 'ValidationError';
  }

  get issues(): ReadonlyArray<{ issue: string; location?: string }> {
    return this.body?.details ?? [];
  }
}

/**
 * Error thrown when PayPal is failing or unavailable (HTTP 5xx).
 */
export class ServerError extends APIError {
  constructor(message: string, status: number, body?: PayPalErrorBody) {
    super(message, status, body);
    this.name = 'ServerError';
  }
}

/**
 * Error thrown when a network request fails (connection errors, timeouts).
 */
export class NetworkError extends PayPalError {
  constructor(
    message: string = 'Network request failed',
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

// =============================================================================
// Response Model Errors
// =============================================================================

/**
 * Error thrown when code reads a field group that was not loaded.
 *
 * PayPal only returns the top-level groups named in the `fields` parameter.
 * For example, reading a payer's email from a Transaction that was fetched
 * without `TransactionFields.PAYER` raises this error. Fetch again with
 * broader fields to recover.
 */
export class MissingFieldError extends PayPalError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'MissingFieldError';
  }
}

/**
 * Error thrown when a loaded field group lacks a specific key.
 */
export class MissingKeyError extends PayPalError {
  constructor(
    message: string,
    public readonly path: readonly string[]
  ) {
    super(message);
    this.name = 'MissingKeyError';
  }
}

/**
 * Error thrown when a transaction search exhausts its date range.
 */
export class TransactionNotFoundError extends PayPalError {
  constructor(public readonly transactionId: string) {
    super(`transaction '${transactionId}' not found`);
    this.name = 'TransactionNotFoundError';
  }
}

/**
 * Error thrown when a field selector name is not recognized.
 */
export class UnknownFieldError extends PayPalError {
  constructor(
    public readonly fieldType: string,
    public readonly value: string
  ) {
    super(`unknown ${fieldType} '${value}'`);
    this.name = 'UnknownFieldError';
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when client configuration is missing or invalid.
 */
export class ConfigError extends PayPalError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
