/**
 * Errors raised by the warmbox client. Every failure from the management
 * API maps to one class by HTTP status, and 503s split further by code.
 */

/**
 * Base error class for all warmbox client errors
 */
export class WarmboxError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'WarmboxError';
  }
}

/**
 * Error for network-level failures (connection, timeout, etc.)
 */
export class NetworkError extends WarmboxError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NETWORK_ERROR', 0);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * Error when a sandbox or route is not found (404)
 */
export class NotFoundError extends WarmboxError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for rejected requests (400), including unknown sandbox types
 */
export class ValidationError extends WarmboxError {
  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, code, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error for authentication failures (401)
 */
export class AuthenticationError extends WarmboxError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Every port in the manager's range is reserved (503)
 */
export class ExhaustionError extends WarmboxError {
  constructor(message: string) {
    super(message, 'PORTS_EXHAUSTED', 503);
    this.name = 'ExhaustionError';
  }
}

/**
 * The backend or shared state is unavailable, or the manager is shutting down (503)
 */
export class ServiceUnavailableError extends WarmboxError {
  constructor(message: string, code = 'SERVICE_UNAVAILABLE') {
    super(message, code, 503);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Error for server-side failures (5xx)
 */
export class ServerError extends WarmboxError {
  constructor(message: string, status = 500, code = 'SERVER_ERROR') {
    super(message, code, status);
    this.name = 'ServerError';
  }
}

/**
 * Error body carried in a failed response envelope
 */
export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Map a failed response to the matching error class.
 */
export function errorFromResponse(status: number, body: ApiErrorBody): WarmboxError {
  switch (status) {
    case 400:
      return new ValidationError(body.message, body.details, body.code);
    case 401:
      return new AuthenticationError(body.message);
    case 404:
      return new NotFoundError(body.message);
    case 503:
      return body.code === 'PORTS_EXHAUSTED'
        ? new ExhaustionError(body.message)
        : new ServiceUnavailableError(body.message, body.code);
    default:
      return status >= 500
        ? new ServerError(body.message, status, body.code)
        : new WarmboxError(body.message, body.code, status, body.details);
  }
}
