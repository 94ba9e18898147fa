import type { IngestConfig, RunSummary } from "@storyvault/types";
import { FileRouter, StoryIdAllocator, runIngestion, type TextEmbedder } from "@storyvault/core";
import { createEmbedder } from "@storyvault/embeddings";
import { createChildLogger, type Logger } from "@storyvault/logger";
import { LanceDbStoryTable } from "@storyvault/vector-store";

export interface IngestOptions {
  logger: Logger;
  /** Replaces the configured provider; used by tests. */
  embedder?: TextEmbedder;
  signal?: AbortSignal;
  clock?: () => Date;
}

/**
 * Wire the run's dependencies from configuration and process the intake
 * directory once. The table is closed whether or not the run succeeds.
 */
export async function ingestOnce(config: IngestConfig, options: IngestOptions): Promise<RunSummary> {
  const { logger } = options;

  const router = new FileRouter({
    successDir: config.paths.successDir,
    failureDir: config.paths.failureDir,
    collisionPolicy: config.routing.collisionPolicy,
    logger: createChildLogger(logger, { component: "file-router" }),
  });
  await router.ensureDirectories([config.paths.intakeDir, config.lancedb.uri]);

  const table = await LanceDbStoryTable.connect(
    config.lancedb.uri,
    config.lancedb.tableName,
    createChildLogger(logger, { component: "vector-store" }),
  );

  try {
    const embedder =
      options.embedder ??
      createEmbedder(config.embedding, createChildLogger(logger, { component: "embedder" }));

    return await runIngestion({
      intakeDir: config.paths.intakeDir,
      router,
      table,
      embedder,
      ids: new StoryIdAllocator(config.timeZone),
      timeZone: config.timeZone,
      previewChars: config.previewChars,
      clock: options.clock,
      signal: options.signal,
      logger,
    });
  } finally {
    await table.close();
  }
}
