// Loggers for the ingestion job. One JSON line per event unless pretty output is asked for.

import pino, { type Logger as PinoLogger } from "pino";
import type { LogLevel } from "@storyvault/types";
import { REDACT_PATHS, REDACTED } from "./redaction.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Emitted as `name` on every line. */
  service?: string;
  /** Human-readable output for a terminal. */
  pretty?: boolean;
  /** Tests pass a stream here to read the lines back; `pretty` is ignored. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

/**
 * Root logger for a run. API keys and other secret-bearing fields in log
 * objects are replaced with `[REDACTED]`.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "storyvault";

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(loggerOptions, options.destination);
  }

  const pretty = options?.pretty ?? isDevelopment();
  return pino(pretty ? { ...loggerOptions, transport: PRETTY_TRANSPORT } : loggerOptions);
}

/** Per-component or per-file logger, e.g. `{ component: "file-router" }`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Default for components constructed without a logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
