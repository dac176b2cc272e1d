/**
 * Base error class for all callfmt errors
 */
export class CallfmtError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CallfmtError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or API responses
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
 * Error for invalid arguments passed to the public API
 */
export class ValidationError extends CallfmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for invalid template options
 */
export class ConfigError extends CallfmtError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Base class for everything that can fail a compile call
 */
export class TemplateCompileError extends CallfmtError {
  constructor(
    message: string,
    code: string,
    public readonly offset: number,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, offset });
    this.name = "TemplateCompileError";
  }
}

/**
 * A placeholder names a formatter the registry does not have
 */
export class UnknownPlaceholderError extends TemplateCompileError {
  constructor(
    public readonly placeholder: string,
    offset: number
  ) {
    super(`Unknown placeholder '${placeholder}'`, "UNKNOWN_PLACEHOLDER", offset, { placeholder });
    this.name = "UnknownPlaceholderError";
  }
}

/**
 * Input ended (or another opening marker appeared) inside a placeholder
 */
export class UnterminatedPlaceholderError extends TemplateCompileError {
  constructor(offset: number) {
    super("Unterminated placeholder", "UNTERMINATED_PLACEHOLDER", offset);
    this.name = "UnterminatedPlaceholderError";
  }
}

export class EmptyPlaceholderNameError extends TemplateCompileError {
  constructor(offset: number) {
    super("Empty placeholder name", "EMPTY_PLACEHOLDER_NAME", offset);
    this.name = "EmptyPlaceholderNameError";
  }
}

/**
 * A closing marker that neither closes a placeholder nor is doubled
 */
export class UnmatchedClosingMarkerError extends TemplateCompileError {
  constructor(
    public readonly marker: string,
    offset: number
  ) {
    super(`Unmatched closing marker '${marker}'`, "UNMATCHED_CLOSING_MARKER", offset, { marker });
    this.name = "UnmatchedClosingMarkerError";
  }
}

/**
 * Base class for errors raised while rendering a compiled template
 */
export class TemplateRenderError extends CallfmtError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "TemplateRenderError";
  }
}

/**
 * A formatter returned no value for the context being rendered
 */
export class MissingValueError extends TemplateRenderError {
  constructor(public readonly placeholder: string) {
    super(`No data for placeholder '${placeholder}'`, "MISSING_VALUE", { placeholder });
    this.name = "MissingValueError";
  }
}

/**
 * A batch render stopped at the first record that failed
 */
export class BatchAbortedError extends CallfmtError {
  constructor(
    public readonly index: number,
    public readonly failure: TemplateRenderError
  ) {
    super(`Batch aborted at record ${index}: ${failure.message}`, "BATCH_ABORTED", {
      index,
      failure: failure.toJSON(),
    });
    this.name = "BatchAbortedError";
  }
}
