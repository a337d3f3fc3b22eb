export interface PineconeErrorOptions {
  /** Error category, or the service's own error code for API errors */
  type: string;
  message: string;
  /** Set when the service answered */
  status?: number;
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Root of every error the client raises. `isRetryable` is a hint for
 * callers; the client itself sends each request once.
 */
export class PineconeError extends Error {
  public readonly type: string;
  public readonly status?: number;
  public readonly isRetryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(options: PineconeErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PineconeError';
    this.type = options.type;
    this.status = options.status;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
