export { processFile } from "./ingestion-pipeline.js";
export type { FileProcessingDependencies, TextEmbedder } from "./ingestion-pipeline.js";

export { runIngestion, listIntakeFiles } from "./run.js";
export type { RunDependencies } from "./run.js";

export { buildStoryRecord } from "./story-record.js";
export {
  generateStoryId,
  getCurrentTimestamp,
  formatCompactTimestamp,
  StoryIdAllocator,
  DEFAULT_TIME_ZONE,
} from "./story-identity.js";

export { FileRouter } from "./file-router.js";
export type { FileRouterOptions, IFileRouter } from "./file-router.js";
