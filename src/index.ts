/**
 * callfmt - compile a format string once against named callbacks, render it
 * against many contexts
 *
 * @packageDocumentation
 */

// Registry
export { FormatterRegistry, createRegistry } from "./formatters/index.js";
export type { FormatterCallback, FormatterEntry } from "./formatters/index.js";

// Compile and render
export {
  TemplateCompiler,
  createCompiler,
  compileTemplate,
  CompiledTemplate,
  describePiece,
  piecesEqual,
  render,
  renderOrThrow,
  renderPieces,
  TemplateOptionsSchema,
  DEFAULT_OPTIONS,
  resolveOptions,
} from "./templates/index.js";

export type {
  TemplateOptions,
  TemplateOptionsInput,
  Piece,
  LiteralPiece,
  PlaceholderPiece,
  PieceDescriptor,
} from "./templates/index.js";

// Batch rendering
export { renderBatch } from "./batch/index.js";
export type {
  BatchOptions,
  BatchResult,
  MissingValuePolicy,
  RenderedRecord,
  SkippedRecord,
} from "./batch/index.js";

// Library utilities
export {
  // Errors
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
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  andThen,
  // Logger
  Logger,
  logger,
} from "./lib/index.js";

export type { Result, LogLevel, LoggerConfig } from "./lib/index.js";
