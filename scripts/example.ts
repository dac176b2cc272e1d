#!/usr/bin/env npx tsx
/**
 * Compile one template and render it against two contexts.
 *
 * Usage:
 *   npx tsx scripts/example.ts
 */

import { FormatterRegistry } from "../src/formatters/index.js";
import { compileTemplate } from "../src/templates/index.js";
import { logger } from "../src/lib/logger.js";

const registry = FormatterRegistry.from<string>([
  ["foo", (data) => `foo: ${data}`],
  ["bar", (data) => `bar: ${data}`],
  ["baz", (data) => `baz: ${data}`],
]);

const compiled = compileTemplate("{foo}, {bar}", registry);
if (!compiled.success) {
  logger.error(compiled.error.message);
  process.exit(1);
}

// The second render reuses the compiled pieces; nothing is parsed again
for (const data of ["some data", "other data"]) {
  const result = compiled.data.render(data);
  if (result.success) {
    logger.info(result.data);
  } else {
    logger.error(result.error.message);
  }
}
