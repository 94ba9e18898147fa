export { AppError } from "./app-error.js";
export type { AppErrorOptions, PipelineStage } from "./app-error.js";

export {
  UnsupportedFileTypeError,
  ExtractionError,
  EmptyContentError,
  EmbeddingError,
  FileRoutingError,
  toFailureReason,
} from "./errors.js";
