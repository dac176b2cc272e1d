import { renderPieces } from "./renderer.js";
import type { Result } from "../lib/result.js";
import type { MissingValueError } from "../lib/errors.js";
import type { TemplateOptions } from "./options.js";
import type { Piece, PieceDescriptor } from "./types.js";

/**
 * The parsed form of one template: an immutable sequence of literal and
 * placeholder pieces, rendered any number of times against different contexts.
 *
 * Placeholder pieces hold the callback captured from the registry when the
 * template was compiled, so the registry can change or go away afterwards.
 */
export class CompiledTemplate<T> {
  readonly pieces: readonly Piece<T>[];

  constructor(
    pieces: readonly Piece<T>[],
    private readonly markers: Readonly<TemplateOptions>
  ) {
    this.pieces = Object.freeze(pieces.map((piece) => Object.freeze({ ...piece })));
  }

  /**
   * Render against one context
   *
   * Fails with MissingValueError naming the first placeholder whose formatter
   * returned no value. No partial output is produced.
   */
  render(context: T): Result<string, MissingValueError> {
    return renderPieces(this.pieces, context);
  }

  /**
   * Placeholder names in template order, repeats included
   */
  get placeholders(): string[] {
    const names: string[] = [];
    for (const piece of this.pieces) {
      if (piece.kind === "placeholder") {
        names.push(piece.name);
      }
    }
    return names;
  }

  /**
   * Template text rebuilt from the pieces, with literal markers escaped again
   */
  get source(): string {
    const { open, close } = this.markers;
    let out = "";
    for (const piece of this.pieces) {
      if (piece.kind === "literal") {
        out += piece.text.split(open).join(open + open).split(close).join(close + close);
      } else {
        out += `${open}${piece.name}${close}`;
      }
    }
    return out;
  }

  toJSON(): PieceDescriptor[] {
    return this.pieces.map(describePiece);
  }
}

export function describePiece<T>(piece: Piece<T>): PieceDescriptor {
  return piece.kind === "literal"
    ? { kind: "literal", text: piece.text }
    : { kind: "placeholder", name: piece.name };
}

/**
 * Compare two piece sequences by structure only. Placeholders are equal when
 * their names match, whichever callbacks they hold.
 */
export function piecesEqual<A, B>(a: readonly Piece<A>[], b: readonly Piece<B>[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((piece, i) => {
    const other = b[i];
    if (other === undefined || piece.kind !== other.kind) {
      return false;
    }
    if (piece.kind === "literal" && other.kind === "literal") {
      return piece.text === other.text;
    }
    return piece.kind === "placeholder" && other.kind === "placeholder" && piece.name === other.name;
  });
}
