/**
 * Template Module
 *
 * Two-stage pipeline over a formatter registry:
 * - Compile a template string once into literal and placeholder pieces
 * - Render the compiled pieces against any number of contexts
 *
 * @example
 * ```typescript
 * import { FormatterRegistry } from "@/formatters";
 * import { compileTemplate } from "@/templates";
 *
 * const registry = FormatterRegistry.fromRecord<Track>({
 *   artist: (track) => track.artist,
 *   title: (track) => track.title,
 * });
 *
 * const compiled = compileTemplate("{artist} - {title}.mp3", registry);
 * if (compiled.success) {
 *   for (const track of tracks) {
 *     const name = compiled.data.render(track);
 *   }
 * }
 * ```
 */

export {
  TemplateCompiler,
  createCompiler,
  compileTemplate,
} from "./compiler.js";

export { CompiledTemplate, describePiece, piecesEqual } from "./compiled.js";

export { render, renderOrThrow, renderPieces } from "./renderer.js";

export {
  TemplateOptionsSchema,
  DEFAULT_OPTIONS,
  resolveOptions,
  type TemplateOptions,
  type TemplateOptionsInput,
} from "./options.js";

export type { Piece, LiteralPiece, PlaceholderPiece, PieceDescriptor } from "./types.js";
