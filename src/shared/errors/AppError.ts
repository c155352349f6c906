/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON
   */
  toJSON(): ErrorResponse {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      details: this.details
    };
  }
}

/**
 * Error response interface
 */
export interface ErrorResponse {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: Date;
  details?: Record<string, unknown>;
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

/**
 * Invalid or missing API key
 */
export class AuthenticationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', 401, true, details);
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, details?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, true, details);
  }
}

/**
 * Rate limit error
 */
export class RateLimitError extends AppError {
  constructor(message: string = 'Rate limit exceeded', details?: Record<string, unknown>) {
    super(message, 'RATE_LIMIT_EXCEEDED', 429, true, details);
  }
}

/**
 * Non-success HTTP status that has no more specific error
 */
export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'HTTP_ERROR', 502, true, { status, ...details });
  }
}

/**
 * Upstream payload could not be decoded
 */
export class ResponseParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', 502, true, details);
  }
}

/**
 * Network error
 */
export class NetworkError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', 503, true, details);
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends AppError {
  constructor(operation: string, timeout: number) {
    super(
      `Operation '${operation}' timed out after ${timeout}ms`,
      'TIMEOUT',
      504,
      true,
      { operation, timeout }
    );
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', 500, false, details);
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, false, details);
  }
}

/**
 * Search attempted with no provider registered
 */
export class NoProvidersError extends AppError {
  constructor() {
    super('No media providers are registered', 'NO_PROVIDERS', 400, true);
  }
}

/**
 * Name-routed call that matched no registered provider
 */
export class UnknownProviderError extends AppError {
  constructor(public readonly providerName: string) {
    super(`Unknown provider: ${providerName}`, 'UNKNOWN_PROVIDER', 404, true, { provider: providerName });
  }
}

/**
 * Every provider in a fan-out search failed.
 *
 * The individual provider errors are not carried; they are logged by the
 * aggregator as they occur.
 */
export class AllProvidersFailedError extends AppError {
  constructor(attempted: number) {
    super(
      `All ${attempted} provider(s) failed; check that API keys are set and valid`,
      'ALL_PROVIDERS_FAILED',
      502,
      true,
      { attempted }
    );
  }
}

/**
 * Transfer of a single media item failed
 */
export class DownloadError extends AppError {
  constructor(
    public readonly itemId: string,
    public readonly itemTitle: string,
    message: string,
    cause?: unknown
  ) {
    super(
      `Download of '${itemId}' failed: ${message}`,
      'DOWNLOAD_ERROR',
      502,
      true,
      {
        itemId,
        itemTitle,
        ...(cause instanceof Error && { cause: cause.message })
      }
    );
  }
}
