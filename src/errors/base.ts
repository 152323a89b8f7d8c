/**
 * Base error classes for instance-forest
 *
 * Every error raised by the package carries the module it came from, the
 * operation in progress and a free-form context bag for logging.
 */

/**
 * Base error class for all instance-forest errors
 */
export abstract class ForestError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  /**
   * Timestamp when error occurred
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a generic copy of this error with additional context. The copy keeps
   * message, module and operation; subclass-specific fields stay on the original.
   */
  withContext(additionalContext: Record<string, unknown>): ForestError {
    return new GenericError(this.message, this.module, this.operation, {
      ...this.context,
      ...additionalContext,
    });
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Generic error for wrapping unknown errors
 */
class GenericError extends ForestError {}

/**
 * Helper function to wrap unknown errors with module context
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): ForestError {
  if (error instanceof ForestError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GenericError(message, module, operation, { ...context, cause });
}

/**
 * Type guard to check if an error is a ForestError
 */
export function isForestError(error: unknown): error is ForestError {
  return error instanceof ForestError;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
} {
  if (error instanceof ForestError) {
    return {
      message: error.message,
      module: error.module,
      operation: error.operation,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
