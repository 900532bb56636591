export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      isOperational?: boolean;
      cause?: Error;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      ...options,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 404,
      code: 'NOT_FOUND',
      ...options,
    });
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfter: number;

  constructor(
    message = 'Rate limit exceeded',
    options: { retryAfter?: number; cause?: Error } = {},
  ) {
    super(message, {
      statusCode: 429,
      code: 'RATE_LIMIT_ERROR',
      cause: options.cause,
    });
    this.retryAfter = options.retryAfter ?? 60;
  }
}

/**
 * Raised when the report cannot be produced, typically because the
 * underlying storage failed. The report is never returned partially.
 */
export class ReportError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 500,
      code: 'REPORT_ERROR',
      ...options,
    });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
