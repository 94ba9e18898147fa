import { readdir } from "node:fs/promises";
import path from "node:path";
import type { FailedFile, RunSummary, StoryRecord } from "@storyvault/types";
import { UnsupportedFileTypeError, toFailureReason } from "@storyvault/errors";
import type { IStoryTable } from "@storyvault/vector-store";
import type { Logger } from "@storyvault/logger";
import type { IFileRouter } from "./file-router.js";
import { processFile, type FileProcessingDependencies } from "./ingestion-pipeline.js";

export interface RunDependencies extends FileProcessingDependencies {
  intakeDir: string;
  router: IFileRouter;
  table: IStoryTable;
  logger: Logger;
}

/**
 * Regular files directly inside the intake directory, sorted by name.
 * Listing errors propagate: without an intake listing there is no run.
 */
export async function listIntakeFiles(intakeDir: string): Promise<string[]> {
  const entries = await readdir(intakeDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(intakeDir, name));
}

/**
 * One pass over the intake directory.
 *
 * Files are processed one at a time. Each one ends in the success or failure
 * directory; a failure never stops the run. Records of successful files are
 * appended to the table in a single write after the loop, and only when
 * there is at least one.
 */
export async function runIngestion(deps: RunDependencies): Promise<RunSummary> {
  const { logger, router, table } = deps;
  const files = await listIntakeFiles(deps.intakeDir);
  logger.info({ intakeDir: deps.intakeDir, files: files.length }, "starting ingestion run");

  const batch: StoryRecord[] = [];
  const succeeded: string[] = [];
  const failed: FailedFile[] = [];

  const routeToFailure = async (filePath: string, fileName: string): Promise<void> => {
    try {
      await router.route(filePath, "failed");
    } catch (err) {
      logger.error({ fileName, err }, "could not move file to the failure directory");
    }
  };

  for (const filePath of files) {
    const fileName = path.basename(filePath);
    const outcome = await processFile(filePath, deps);

    if (outcome.status === "failed") {
      if (outcome.error instanceof UnsupportedFileTypeError) {
        logger.warn({ fileName }, "skipping unsupported file");
      } else {
        logger.warn({ fileName, reason: outcome.reason }, "failed to process file");
      }
      failed.push({ fileName, reason: outcome.reason });
      await routeToFailure(filePath, fileName);
      continue;
    }

    const { record, preview } = outcome;
    try {
      await router.route(filePath, "succeeded");
    } catch (err) {
      const reason = toFailureReason(err);
      logger.error({ fileName, reason }, "could not move file to the success directory");
      failed.push({ fileName, reason });
      await routeToFailure(filePath, fileName);
      continue;
    }

    batch.push(record);
    succeeded.push(fileName);
    logger.info({ fileName, storyId: record.story_id, preview }, "file processed");
  }

  let inserted = 0;
  if (batch.length > 0) {
    inserted = await table.append(batch);
    logger.info({ table: table.name, inserted }, `${String(inserted)} files inserted`);
  } else {
    logger.warn({ table: table.name }, "no new files inserted");
  }

  return { inserted, succeeded, failed };
}
