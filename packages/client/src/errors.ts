/**
 * Valohai Client Error Classes
 */

/**
 * Base error class for all client errors
 */
export class ValohaiError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ValohaiError';
  }
}

/**
 * Error for network-level failures (connection, timeout, etc.)
 */
export class NetworkError extends ValohaiError {
  constructor(message: string, cause?: Error) {
    super(message, 'NETWORK_ERROR', 0);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * Error for a response body that is not JSON or does not have the expected shape
 */
export class ResponseFormatError extends ValohaiError {
  constructor(message: string, status = 0, details?: unknown) {
    super(message, 'INVALID_RESPONSE', status, details);
    this.name = 'ResponseFormatError';
  }
}

/**
 * Error for validation failures (400)
 */
export class ValidationError extends ValohaiError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error for authentication failures (401)
 */
export class AuthenticationError extends ValohaiError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for a token without access to the resource (403)
 */
export class PermissionDeniedError extends ValohaiError {
  constructor(message = 'Permission denied') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Error when a resource is not found (404)
 */
export class NotFoundError extends ValohaiError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for rate limiting (429)
 */
export class RateLimitError extends ValohaiError {
  constructor(message: string, public retryAfter?: number) {
    super(message, 'RATE_LIMIT', 429);
    this.name = 'RateLimitError';
  }
}

/**
 * Error for server-side failures (5xx)
 */
export class ServerError extends ValohaiError {
  constructor(message: string, status = 500) {
    super(message, 'SERVER_ERROR', status);
    this.name = 'ServerError';
  }
}
