import type { FormatterCallback } from "../formatters/registry.js";

/**
 * Text copied verbatim to the output
 */
export interface LiteralPiece {
  readonly kind: "literal";
  readonly text: string;
}

/**
 * A placeholder resolved at compile time to the formatter it names
 */
export interface PlaceholderPiece<T> {
  readonly kind: "placeholder";
  readonly name: string;
  readonly callback: FormatterCallback<T>;
}

export type Piece<T> = LiteralPiece | PlaceholderPiece<T>;

/**
 * Callback-free view of a piece, used for inspection and comparison
 */
export type PieceDescriptor =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; name: string };
