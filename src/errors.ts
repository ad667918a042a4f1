/**
 * Error kinds surfaced by the sync client
 */

import type { AuthMode, CollectionName, EntityType } from './types';

/**
 * Base class for every error this package throws.
 */
export class SyncClientError extends Error {
  /**
   * @param message - The error message.
   * @param code - Stable error code callers can switch on.
   * @param originalError - The error that caused this one (if any).
   */
  constructor(message: string, public code: string, public originalError?: unknown) {
    super(message);
    this.name = 'SyncClientError';
  }
}

/**
 * Network or HTTP failure. Never retried here; local state is left as it was.
 */
export class TransportError extends SyncClientError {
  constructor(message: string, originalError?: unknown, code: string = 'TRANSPORT_ERROR') {
    super(message, code, originalError);
    this.name = 'TransportError';
  }
}

/**
 * The server answered with a non-2xx status.
 */
export class ApiError extends TransportError {
  constructor(
    public status: number,
    public errorCode: string = '',
    public errorMessage: string = '',
    originalError?: unknown
  ) {
    super(`HTTP ${status}: ${errorCode} - ${errorMessage}`, originalError, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class AuthError extends ApiError {
  constructor(errorMessage: string, originalError?: unknown) {
    super(401, 'unauthorized', errorMessage, originalError);
    this.name = 'AuthError';
  }
}

export class ForbiddenError extends ApiError {
  constructor(errorMessage: string, originalError?: unknown) {
    super(403, 'forbidden', errorMessage, originalError);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends ApiError {
  constructor(errorMessage: string, originalError?: unknown) {
    super(404, 'not_found', errorMessage, originalError);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends ApiError {
  /**
   * @param retryAfter - Seconds suggested by the Retry-After header, if sent.
   */
  constructor(public retryAfter: number | null, originalError?: unknown) {
    super(429, 'rate_limited', 'Rate limited', originalError);
    this.name = 'RateLimitError';
  }
}

/**
 * A response did not have the shape the sync or write protocol expects.
 * Thrown before any local state is touched.
 */
export class ProtocolError extends SyncClientError {
  constructor(message: string, public field?: string, originalError?: unknown) {
    super(message, 'PROTOCOL_ERROR', originalError);
    this.name = 'ProtocolError';
  }
}

/**
 * The entity type cannot be written under the current authentication mode.
 * Permanent for the session; do not retry.
 */
export class WriteRejected extends SyncClientError {
  constructor(public entityType: EntityType, public authMode: AuthMode, originalError?: unknown) {
    super(
      `Writes to "${entityType}" are not available under ${authMode} authentication`,
      'WRITE_REJECTED',
      originalError
    );
    this.name = 'WriteRejected';
  }
}

/**
 * A complete list was requested from delta data that does not carry it.
 */
export class IncompleteDataError extends SyncClientError {
  constructor(public collection: CollectionName) {
    super(
      `Collection "${collection}" was not part of the delta response; run a full sync to read the complete list`,
      'INCOMPLETE_DATA'
    );
    this.name = 'IncompleteDataError';
  }
}

export class UnsupportedOperationError extends SyncClientError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_OPERATION');
    this.name = 'UnsupportedOperationError';
  }
}
