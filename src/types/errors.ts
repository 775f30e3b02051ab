// Standardized error types and handling
export interface ErrorDetails {
  error: string;
  message: string;
  code: string;
  details?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  toErrorDetails(): ErrorDetails {
    return {
      error: this.name,
      message: this.message,
      code: this.code,
      details: this.details
    };
  }
}

// Specific error classes
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required', details?: unknown) {
    super(message, 'AUTHENTICATION_ERROR', details);
    this.name = 'AuthenticationError';
  }
}

export class ExternalServiceError extends AppError {
  public readonly status?: number;

  constructor(service: string, message: string, status?: number, code: string = 'EXTERNAL_SERVICE_ERROR') {
    super(`External service error (${service}): ${message}`, code, status === undefined ? undefined : { status });
    this.name = 'ExternalServiceError';
    this.status = status;
  }
}

export class RateLimitError extends ExternalServiceError {
  public readonly retryAfterSeconds: number;

  constructor(service: string, message: string, retryAfterSeconds: number) {
    super(service, message, 429, 'RATE_LIMIT_ERROR');
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

// Error handler utility
export function handleError(error: unknown): ErrorDetails {
  if (error instanceof AppError) {
    return error.toErrorDetails();
  }

  if (error instanceof Error) {
    return {
      error: error.name,
      message: error.message,
      code: 'INTERNAL_ERROR'
    };
  }

  return {
    error: 'UnknownError',
    message: 'An unknown error occurred',
    code: 'UNKNOWN_ERROR'
  };
}

export function describeError(error: unknown): string {
  return handleError(error).message;
}
