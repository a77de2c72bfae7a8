/**
 * Error types for the Docker Engine client.
 * @module errors
 */

import type { ServiceCreateResponse } from './types/service.js';

/**
 * Error kinds for categorizing Engine errors.
 */
export enum EngineErrorKind {
  // Client-side errors
  /** Image reference could not be parsed. */
  InvalidReference = 'invalid_reference',
  /** Encoded registry credentials are malformed. */
  InvalidCredentials = 'invalid_credentials',

  // Request errors
  /** Engine rejected a request parameter (400). */
  InvalidParameter = 'invalid_parameter',
  /** Authentication required or rejected (401). */
  Unauthorized = 'unauthorized',
  /** Operation not permitted (403). */
  Forbidden = 'forbidden',
  /** Object not found (404). */
  NotFound = 'not_found',
  /** Name or state conflict (409). */
  Conflict = 'conflict',

  // Server errors
  /** Engine internal error (500). */
  InternalError = 'internal_error',
  /** Engine unavailable, e.g. node is not a swarm manager (503). */
  ServiceUnavailable = 'service_unavailable',

  // Transport errors
  /** Connection to the Engine failed. */
  ConnectionFailed = 'connection_failed',
  /** Request timed out. */
  Timeout = 'timeout',
  /** Request aborted by the caller. */
  Cancelled = 'cancelled',
  /** Response body could not be decoded. */
  DeserializationError = 'deserialization_error',

  /** Unknown error. */
  Unknown = 'unknown',
}

/**
 * Docker Engine API error.
 */
export class EngineError extends Error {
  /** Error kind. */
  public readonly kind: EngineErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** Additional error details. */
  public readonly details?: string;

  constructor(
    kind: EngineErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      cause?: Error;
      details?: string;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'EngineError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  /**
   * Returns true if this error is retryable.
   */
  isRetryable(): boolean {
    switch (this.kind) {
      case EngineErrorKind.ConnectionFailed:
      case EngineErrorKind.Timeout:
      case EngineErrorKind.InternalError:
      case EngineErrorKind.ServiceUnavailable:
        return true;
      default:
        return false;
    }
  }

  /**
   * Creates an error from an HTTP status code and Engine error message.
   */
  static fromResponse(status: number, message: string, details?: string): EngineError {
    return new EngineError(EngineError.kindFromStatus(status), message, {
      statusCode: status,
      details,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): EngineErrorKind {
    switch (status) {
      case 400:
        return EngineErrorKind.InvalidParameter;
      case 401:
        return EngineErrorKind.Unauthorized;
      case 403:
        return EngineErrorKind.Forbidden;
      case 404:
        return EngineErrorKind.NotFound;
      case 409:
        return EngineErrorKind.Conflict;
      case 500:
        return EngineErrorKind.InternalError;
      case 503:
        return EngineErrorKind.ServiceUnavailable;
      default:
        return EngineErrorKind.Unknown;
    }
  }

  static invalidReference(message: string): EngineError {
    return new EngineError(EngineErrorKind.InvalidReference, message);
  }

  static invalidCredentials(message: string, cause?: Error): EngineError {
    return new EngineError(EngineErrorKind.InvalidCredentials, message, { cause });
  }

  static connectionFailed(message: string, cause?: Error): EngineError {
    return new EngineError(EngineErrorKind.ConnectionFailed, message, { cause });
  }

  static timeout(message: string, cause?: Error): EngineError {
    return new EngineError(EngineErrorKind.Timeout, message, { cause });
  }

  static cancelled(message: string, cause?: Error): EngineError {
    return new EngineError(EngineErrorKind.Cancelled, message, { cause });
  }

  static deserialization(message: string, cause?: Error): EngineError {
    return new EngineError(EngineErrorKind.DeserializationError, message, { cause });
  }
}

/**
 * Raised when a service creation response cannot be decoded.
 *
 * The request reached the Engine, so the service may exist. `partial` holds
 * what is known: an empty ID plus any warnings produced client-side.
 */
export class ResponseDecodeError extends EngineError {
  public readonly partial: ServiceCreateResponse;

  constructor(message: string, partial: ServiceCreateResponse, cause?: Error) {
    super(EngineErrorKind.DeserializationError, message, { cause });
    this.name = 'ResponseDecodeError';
    this.partial = partial;
  }
}

/**
 * Type guard for EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
