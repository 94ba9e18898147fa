import path from "node:path";
import type { FileOutcome } from "@storyvault/types";
import { toFailureReason } from "@storyvault/errors";
import { DEFAULT_EXTRACTORS, extractText, type ExtractorRegistry } from "@storyvault/extractor";
import { createChildLogger, createSilentLogger, type Logger } from "@storyvault/logger";
import { StoryIdAllocator, getCurrentTimestamp } from "./story-identity.js";
import { buildStoryRecord } from "./story-record.js";

const DEFAULT_PREVIEW_CHARS = 300;

/**
 * The embedding capability the pipeline needs. `Embedder` from
 * `@storyvault/embeddings` satisfies it.
 */
export interface TextEmbedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface FileProcessingDependencies {
  embedder: TextEmbedder;
  ids: StoryIdAllocator;
  timeZone: string;
  extractors?: ExtractorRegistry;
  clock?: () => Date;
  previewChars?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Per-file pipeline: Classify -> Extract -> Embed -> Record
 *
 * Decides the outcome only. Moving the file and writing the table belong to
 * the caller, which interprets the returned variant.
 */
export async function processFile(
  filePath: string,
  deps: FileProcessingDependencies,
): Promise<FileOutcome> {
  const fileName = path.basename(filePath);
  const logger = createChildLogger(deps.logger ?? createSilentLogger(), { fileName });

  try {
    // Classify + Extract (unknown types are rejected before the file is opened)
    const extracted = await extractText(filePath, deps.extractors ?? DEFAULT_EXTRACTORS);
    logger.debug({ pageCount: extracted.pageCount, ...extracted.metadata }, "text extracted");

    // Embed
    const vector = await deps.embedder.embed(extracted.text, deps.signal);
    const now = (deps.clock ?? (() => new Date()))();

    // Record
    const record = buildStoryRecord({
      storyId: deps.ids.next(fileName, now),
      vector,
      fileName,
      timestamp: getCurrentTimestamp(deps.timeZone, now),
    });

    return {
      status: "succeeded",
      record,
      preview: extracted.text.slice(0, deps.previewChars ?? DEFAULT_PREVIEW_CHARS),
    };
  } catch (err) {
    return { status: "failed", reason: toFailureReason(err), error: err };
  }
}
