import { BatchAbortedError, TemplateRenderError } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { ok, err, type Result } from "../lib/result.js";
import type { CompiledTemplate } from "../templates/compiled.js";

/**
 * What to do when a record cannot be rendered
 */
export type MissingValuePolicy = "skip" | "abort";

export interface BatchOptions {
  /** Skip failing records (default) or stop at the first one */
  onMissing?: MissingValuePolicy;
  /** Logger for skipped records and the summary (default: shared logger) */
  logger?: Logger;
}

export interface RenderedRecord {
  index: number;
  output: string;
}

export interface SkippedRecord {
  index: number;
  error: TemplateRenderError;
}

export interface BatchResult {
  rendered: RenderedRecord[];
  skipped: SkippedRecord[];
}

/**
 * Render one compiled template over many contexts
 *
 * With `onMissing: "skip"` every record is attempted and failures are
 * reported alongside the outputs. With `"abort"` the first failure ends the
 * batch and nothing rendered so far is returned.
 */
export function renderBatch<T>(
  compiled: CompiledTemplate<T>,
  contexts: Iterable<T>,
  options: BatchOptions = {}
): Result<BatchResult, BatchAbortedError> {
  const policy = options.onMissing ?? "skip";
  const log = (options.logger ?? rootLogger).child("[batch]");
  const rendered: RenderedRecord[] = [];
  const skipped: SkippedRecord[] = [];

  let index = 0;
  for (const context of contexts) {
    const result = compiled.render(context);
    if (result.success) {
      rendered.push({ index, output: result.data });
    } else if (policy === "abort") {
      log.debug(`Aborting at record ${index}: ${result.error.message}`);
      return err(new BatchAbortedError(index, result.error));
    } else {
      log.debug(`Skipping record ${index}: ${result.error.message}`);
      skipped.push({ index, error: result.error });
    }
    index++;
  }

  log.debug(`Rendered ${rendered.length} of ${index} records (${skipped.length} skipped)`);
  return ok({ rendered, skipped });
}
