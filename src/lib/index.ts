// Error classes
export {
  CallfmtError,
  ValidationError,
  ConfigError,
  TemplateCompileError,
  UnknownPlaceholderError,
  UnterminatedPlaceholderError,
  EmptyPlaceholderNameError,
  UnmatchedClosingMarkerError,
  TemplateRenderError,
  MissingValueError,
  BatchAbortedError,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr, map, andThen } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { Logger, logger } from "./logger.js";
export type { LogLevel, LoggerConfig } from "./logger.js";
