export interface AppErrorOptions {
  code?: string | undefined;
  statusCode?: number | undefined;
  isOperational?: boolean | undefined;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

/** Options accepted by the fixed-status subclasses. */
export type SubclassErrorOptions = Pick<
  AppErrorOptions,
  "code" | "cause" | "context"
>;

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.statusCode = options.statusCode ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

/**
 * Raised when caller-supplied data (template banks, lexicons, list sizes)
 * breaks a structural rule.
 */
export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    options: SubclassErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "VALIDATION_ERROR",
      statusCode: 400,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Raised when an environment variable is set to a value that cannot be used.
 * Not operational: the process is misconfigured and should fail fast.
 */
export class ConfigurationError extends AppError {
  constructor(
    message = "Invalid configuration",
    options: SubclassErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "CONFIGURATION_ERROR",
      statusCode: 500,
      isOperational: false,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class ExternalServiceError extends AppError {
  constructor(
    message = "External service failure",
    options: SubclassErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      statusCode: 502,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}
