import {
  EmptyPlaceholderNameError,
  TemplateCompileError,
  UnknownPlaceholderError,
  UnmatchedClosingMarkerError,
  UnterminatedPlaceholderError,
} from "../lib/errors.js";
import { ok, err, unwrap, type Result } from "../lib/result.js";
import { CompiledTemplate } from "./compiled.js";
import { resolveOptions, type TemplateOptions, type TemplateOptionsInput } from "./options.js";
import type { FormatterRegistry } from "../formatters/registry.js";
import type { Piece } from "./types.js";

/**
 * Compiles template strings against a formatter registry
 *
 * Template syntax:
 * - `{name}` is replaced by the output of the formatter registered as `name`
 * - `{{` and `}}` produce a literal `{` and `}`
 *
 * The markers can be changed through the options; the doubling rule applies
 * to whichever markers are configured.
 *
 * @example
 * ```typescript
 * const registry = FormatterRegistry.fromRecord<string>({
 *   foo: (data) => `foo: ${data}`,
 * });
 * const compiler = createCompiler();
 *
 * const result = compiler.compile("{foo}!", registry);
 * if (result.success) {
 *   result.data.render("X"); // { success: true, data: "foo: X!" }
 * }
 * ```
 */
export class TemplateCompiler {
  readonly options: Readonly<TemplateOptions>;

  constructor(options: TemplateOptionsInput = {}) {
    this.options = resolveOptions(options);
  }

  /**
   * Parse `template` and resolve every placeholder against `registry`
   *
   * @returns The compiled template, or the first syntax or lookup error found
   */
  compile<T>(
    template: string,
    registry: FormatterRegistry<T>
  ): Result<CompiledTemplate<T>, TemplateCompileError> {
    const { open, close } = this.options;
    const pieces: Piece<T>[] = [];
    let literal = "";
    // Start of the literal run not yet copied into `literal`
    let runStart = 0;
    // Offset of the opening marker while inside a placeholder, -1 otherwise
    let nameStart = -1;
    let i = 0;

    while (i < template.length) {
      if (nameStart >= 0) {
        if (template.startsWith(close, i)) {
          const name = template.slice(nameStart + open.length, i);
          if (name.length === 0) {
            return err(new EmptyPlaceholderNameError(nameStart));
          }
          const callback = registry.get(name);
          if (callback === undefined) {
            return err(new UnknownPlaceholderError(name, nameStart));
          }
          if (literal.length > 0) {
            pieces.push({ kind: "literal", text: literal });
            literal = "";
          }
          pieces.push({ kind: "placeholder", name, callback });
          nameStart = -1;
          i += close.length;
          runStart = i;
        } else if (template.startsWith(open, i)) {
          // Names cannot contain a marker, so this placeholder can never close
          return err(new UnterminatedPlaceholderError(nameStart));
        } else {
          i += 1;
        }
        continue;
      }

      if (template.startsWith(open, i)) {
        literal += template.slice(runStart, i);
        if (template.startsWith(open, i + open.length)) {
          literal += open;
          i += open.length * 2;
          runStart = i;
        } else {
          nameStart = i;
          i += open.length;
        }
      } else if (template.startsWith(close, i)) {
        if (!template.startsWith(close, i + close.length)) {
          return err(new UnmatchedClosingMarkerError(close, i));
        }
        literal += template.slice(runStart, i) + close;
        i += close.length * 2;
        runStart = i;
      } else {
        i += 1;
      }
    }

    if (nameStart >= 0) {
      return err(new UnterminatedPlaceholderError(nameStart));
    }

    literal += template.slice(runStart);
    if (literal.length > 0) {
      pieces.push({ kind: "literal", text: literal });
    }

    return ok(new CompiledTemplate(pieces, this.options));
  }

  /**
   * Compile, throwing the compile error instead of returning it
   */
  compileOrThrow<T>(template: string, registry: FormatterRegistry<T>): CompiledTemplate<T> {
    return unwrap(this.compile(template, registry));
  }
}

/**
 * Factory function to create a TemplateCompiler
 */
export function createCompiler(options?: TemplateOptionsInput): TemplateCompiler {
  return new TemplateCompiler(options);
}

/**
 * One-shot compile with the given (or default) markers
 */
export function compileTemplate<T>(
  template: string,
  registry: FormatterRegistry<T>,
  options?: TemplateOptionsInput
): Result<CompiledTemplate<T>, TemplateCompileError> {
  return new TemplateCompiler(options).compile(template, registry);
}
