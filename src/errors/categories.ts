import { PineconeError } from './error.js';

/**
 * Error thrown when the client is misconfigured (e.g., missing API key, empty environment)
 */
export class ConfigurationError extends PineconeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the HTTP call itself could not complete
 * (DNS resolution, refused connection, TLS failure, aborted request)
 */
export class TransportError extends PineconeError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super({
      type: 'transport_error',
      message,
      isRetryable: true,
      details: {
        ...details,
        cause: cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : undefined,
      },
      cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when the service answers with a status other than the one
 * the operation expects. `type` holds the service's error code when the body
 * carries one, otherwise the response content type.
 */
export class ApiError extends PineconeError {
  constructor(status: number, type: string, message: string, details?: Record<string, unknown>) {
    super({
      type,
      message,
      status,
      isRetryable: status === 429 || status >= 500,
      details,
    });
    this.name = 'ApiError';
  }

  /** True for 4xx responses. */
  isClientError(): boolean {
    const status = this.status ?? 0;
    return status >= 400 && status < 500;
  }

  /** True for 5xx responses. */
  isServerError(): boolean {
    return (this.status ?? 0) >= 500;
  }
}

/**
 * Error thrown when the status matched but the body could not be decoded
 * into the expected shape
 */
export class DecodeError extends PineconeError {
  constructor(message: string, status?: number, details?: Record<string, unknown>, cause?: unknown) {
    super({
      type: 'decode_error',
      message,
      status,
      isRetryable: false,
      details,
      cause,
    });
    this.name = 'DecodeError';
  }
}

/**
 * Error thrown when an index handle is used after `delete()` was called on it
 */
export class UseAfterDeleteError extends PineconeError {
  constructor(indexName: string) {
    super({
      type: 'use_after_delete',
      message: `Index handle "${indexName}" was deleted and can no longer be used`,
      isRetryable: false,
      details: { indexName },
    });
    this.name = 'UseAfterDeleteError';
  }
}
