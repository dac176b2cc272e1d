import { MissingValueError } from "../lib/errors.js";
import { ok, err, unwrap, type Result } from "../lib/result.js";
import type { CompiledTemplate } from "./compiled.js";
import type { Piece } from "./types.js";

/**
 * Walk a piece sequence and concatenate its output for one context
 *
 * Literal pieces are appended as-is; each placeholder calls its captured
 * formatter. The first formatter that returns no value fails the whole render.
 * Exceptions thrown by a formatter are not caught.
 */
export function renderPieces<T>(
  pieces: readonly Piece<T>[],
  context: T
): Result<string, MissingValueError> {
  let out = "";
  for (const piece of pieces) {
    if (piece.kind === "literal") {
      out += piece.text;
      continue;
    }
    const { callback } = piece;
    const value = callback(context);
    if (value === undefined || value === null) {
      return err(new MissingValueError(piece.name));
    }
    out += value;
  }
  return ok(out);
}

export function render<T>(
  compiled: CompiledTemplate<T>,
  context: T
): Result<string, MissingValueError> {
  return renderPieces(compiled.pieces, context);
}

/**
 * Render, throwing MissingValueError instead of returning it
 */
export function renderOrThrow<T>(compiled: CompiledTemplate<T>, context: T): string {
  return unwrap(render(compiled, context));
}
