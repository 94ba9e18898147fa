export type {
  FileType,
  SupportedFileType,
  ProcessedFlag,
  StoryRecord,
  StoryRecordInput,
} from "./story.js";

export type {
  ExtractResult,
  EmbeddingResult,
  FileOutcomeStatus,
  SucceededOutcome,
  FailedOutcome,
  FileOutcome,
  FailedFile,
  RunSummary,
} from "./pipeline.js";

export type {
  NodeEnv,
  LogLevel,
  EmbeddingProviderType,
  CollisionPolicy,
  IngestConfig,
  PathsConfig,
  LanceDbConfig,
  EmbeddingConfig,
  CohereConfig,
  BgeM3Config,
  RoutingConfig,
} from "./config.js";
