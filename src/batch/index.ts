export {
  renderBatch,
  type BatchOptions,
  type BatchResult,
  type MissingValuePolicy,
  type RenderedRecord,
  type SkippedRecord,
} from "./batch.js";
