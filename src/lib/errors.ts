/**
 * Base error class for all readme-synth errors
 */
export class SynthError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SynthError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends SynthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for unreadable metadata, partials or sample files
 */
export class ParseError extends SynthError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    context?: Record<string, unknown>
  ) {
    super(message, "PARSE_ERROR", { ...context, filePath, line });
    this.name = "ParseError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends SynthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error for failed Maven repository lookups
 */
export class FetchError extends SynthError {
  constructor(
    message: string,
    public readonly url: string,
    context?: Record<string, unknown>
  ) {
    super(message, "FETCH_ERROR", { ...context, url });
    this.name = "FetchError";
  }
}
