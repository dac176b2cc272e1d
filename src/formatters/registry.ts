import { ValidationError } from "../lib/errors.js";

/**
 * Produces the text for one placeholder given the render context.
 * Returning `undefined` (or `null`) means there is no value for this context.
 */
export type FormatterCallback<T> = (context: T) => string | null | undefined;

/**
 * A `[name, callback]` pair accepted by {@link FormatterRegistry.from}
 */
export type FormatterEntry<T> = readonly [name: string, callback: FormatterCallback<T>];

/**
 * Mapping from placeholder name to the formatter that fills it.
 *
 * Registering a name that already exists replaces the previous callback
 * (last registration wins). Templates compiled before the replacement keep
 * the callback they captured.
 *
 * @example
 * ```typescript
 * const registry = new FormatterRegistry<FileInfo>()
 *   .register("stem", (file) => file.stem)
 *   .register("ext", (file) => file.extension);
 * ```
 */
export class FormatterRegistry<T> {
  private readonly formatters = new Map<string, FormatterCallback<T>>();

  /**
   * Build a registry from ordered pairs; later duplicates overwrite earlier ones
   */
  static from<T>(entries: Iterable<FormatterEntry<T>>): FormatterRegistry<T> {
    const registry = new FormatterRegistry<T>();
    for (const [name, callback] of entries) {
      registry.register(name, callback);
    }
    return registry;
  }

  /**
   * Build a registry from a plain object keyed by placeholder name
   */
  static fromRecord<T>(record: Readonly<Record<string, FormatterCallback<T>>>): FormatterRegistry<T> {
    return FormatterRegistry.from(Object.entries(record));
  }

  /**
   * Add or replace the formatter for `name`
   *
   * @throws ValidationError if `name` is empty or `callback` is not a function
   */
  register(name: string, callback: FormatterCallback<T>): this {
    if (typeof name !== "string" || name.length === 0) {
      throw new ValidationError("Formatter name must be a non-empty string", { name });
    }
    if (typeof callback !== "function") {
      throw new ValidationError(`Formatter '${name}' must be a function`, { name });
    }
    this.formatters.set(name, callback);
    return this;
  }

  get(name: string): FormatterCallback<T> | undefined {
    return this.formatters.get(name);
  }

  has(name: string): boolean {
    return this.formatters.has(name);
  }

  /**
   * Registered names in insertion order
   */
  names(): string[] {
    return [...this.formatters.keys()];
  }

  get size(): number {
    return this.formatters.size;
  }
}

/**
 * Factory function for an empty registry
 */
export function createRegistry<T>(): FormatterRegistry<T> {
  return new FormatterRegistry<T>();
}
