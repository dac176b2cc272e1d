#!/usr/bin/env npx tsx
/**
 * Benchmark runner script.
 *
 * Builds a template with one placeholder per registered formatter, then
 * times compilation and rendering.
 *
 * Usage:
 *   npx tsx scripts/benchmark.ts               # 1000 placeholders
 *   npx tsx scripts/benchmark.ts --size 100000 # custom size
 */

import chalk from "chalk";

import { FormatterRegistry } from "../src/formatters/index.js";
import { createCompiler } from "../src/templates/index.js";
import { logger } from "../src/lib/logger.js";

const args = process.argv.slice(2);
const sizeFlag = args.indexOf("--size");
const size = sizeFlag >= 0 ? Number(args[sizeFlag + 1]) : 1000;
const iterations = 200;

if (!Number.isInteger(size) || size < 1) {
  logger.error(`Invalid --size: ${args[sizeFlag + 1] ?? ""}`);
  process.exit(1);
}

const registry = new FormatterRegistry<string>();
let template = "";
for (let i = 1; i <= size; i++) {
  registry.register(String(i), (data) => `_${data}_`);
  template += `{${i}}`;
}

function time(label: string, fn: () => void): void {
  const timings: number[] = [];
  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    fn();
    timings.push(performance.now() - start);
  }
  timings.sort((a, b) => a - b);
  const avg = timings.reduce((a, b) => a + b, 0) / timings.length;
  const p95 = timings[Math.floor(timings.length * 0.95)] ?? 0;
  logger.info(`  ${chalk.bold(label)}: avg=${avg.toFixed(3)}ms, p95=${p95.toFixed(3)}ms`);
}

logger.info(`Running benchmarks with ${size} placeholders...\n`);

const compiler = createCompiler();
time("compile", () => {
  compiler.compileOrThrow(template, registry);
});

const compiled = compiler.compileOrThrow(template, registry);
time("render", () => {
  compiled.render("data");
});

const output = compiled.render("bar");
const expected = "_bar_".repeat(size);
if (output.success && output.data === expected) {
  logger.success("\nOutput matches expected");
} else {
  logger.error("\nOutput does not match expected");
  process.exit(1);
}
