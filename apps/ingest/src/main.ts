import { parseEnv } from "@storyvault/config";
import { createLogger } from "@storyvault/logger";
import { ingestOnce } from "./ingest.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    service: "storyvault-ingest",
    pretty: config.nodeEnv === "development",
  });

  // Stop waiting on the embedding provider when interrupted; remaining files fail and are routed.
  const controller = new AbortController();
  const interrupt = (): void => {
    logger.warn("interrupted, aborting pending embedding requests");
    controller.abort();
  };
  process.once("SIGTERM", interrupt);
  process.once("SIGINT", interrupt);

  const summary = await ingestOnce(config, { logger, signal: controller.signal });

  logger.info(
    {
      inserted: summary.inserted,
      succeeded: summary.succeeded.length,
      failed: summary.failed,
    },
    "ingestion run finished",
  );
}

main().catch((err) => {
  console.error("[ingest] Fatal error:", err);
  process.exit(1);
});
