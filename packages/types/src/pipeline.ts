import type { StoryRecord } from "./story.js";

export interface ExtractResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type FileOutcomeStatus = "succeeded" | "failed";

export interface SucceededOutcome {
  status: "succeeded";
  record: StoryRecord;
  preview: string;
}

export interface FailedOutcome {
  status: "failed";
  reason: string;
  error: unknown;
}

export type FileOutcome = SucceededOutcome | FailedOutcome;

export interface FailedFile {
  fileName: string;
  reason: string;
}

export interface RunSummary {
  inserted: number;
  succeeded: string[];
  failed: FailedFile[];
}
