import { z } from "zod";

import { ConfigError } from "../lib/errors.js";

/**
 * A marker is exactly one character (one code point, so astral symbols work)
 */
const MarkerSchema = z
  .string()
  .refine((value) => [...value].length === 1, "Marker must be exactly one character");

/**
 * Schema for compile options
 */
export const TemplateOptionsSchema = z
  .object({
    /** Opening marker of a placeholder */
    open: MarkerSchema.default("{"),
    /** Closing marker of a placeholder */
    close: MarkerSchema.default("}"),
  })
  .strict()
  .refine((options) => options.open !== options.close, {
    message: "Opening and closing markers must differ",
    path: ["close"],
  });

export type TemplateOptions = z.infer<typeof TemplateOptionsSchema>;
export type TemplateOptionsInput = z.input<typeof TemplateOptionsSchema>;

/**
 * Merge user options with defaults and validate them
 *
 * @throws ConfigError when a marker is not a single character or both markers are equal
 */
export function resolveOptions(options: TemplateOptionsInput = {}): Readonly<TemplateOptions> {
  const result = TemplateOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid template options: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { issues }
    );
  }
  return Object.freeze(result.data);
}

/**
 * The markers used when no options are given
 */
export const DEFAULT_OPTIONS: Readonly<TemplateOptions> = resolveOptions();
