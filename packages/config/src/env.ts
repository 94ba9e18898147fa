import path from "node:path";
import { z } from "zod";
import type { IngestConfig } from "@storyvault/types";

export const INTAKE_DIR_NAME = "uploaded_docs";
export const SUCCESS_DIR_NAME = "success";
export const FAILURE_DIR_NAME = "failure";

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Zod schema for the ingestion job's environment variables.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed IngestConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    STORY_TIMEZONE: z
      .string()
      .default("Asia/Kolkata")
      .refine(isValidTimeZone, { message: "STORY_TIMEZONE must be a valid IANA time zone" }),
    PREVIEW_CHARS: z.string().default("300").transform(Number).pipe(z.number().int().nonnegative()),

    // ---------- Directories ----------
    INGEST_BASE_DIR: z.string().min(1).default("UserStories"),
    LANCEDB_DIR: z.string().min(1).default("my_lance_db"),
    LANCEDB_TABLE: z
      .string()
      .default("user_stories")
      .refine((name) => /^[A-Za-z0-9_.-]+$/.test(name), {
        message: "LANCEDB_TABLE may only contain letters, digits, '_', '-' and '.'",
      }),
    COLLISION_POLICY: z.enum(["rename", "overwrite", "fail"]).default("rename"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: z
      .string()
      .default("1024")
      .transform(Number)
      .pipe(z.number().int().positive()),
    EMBEDDING_TIMEOUT_MS: z
      .string()
      .default("30000")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-english-v3.0"),
    BGE_M3_URL: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link IngestConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): IngestConfig {
  const parsed = envSchema.parse(env);
  const baseDir = parsed.INGEST_BASE_DIR;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    timeZone: parsed.STORY_TIMEZONE,
    previewChars: parsed.PREVIEW_CHARS,

    paths: {
      baseDir,
      intakeDir: path.join(baseDir, INTAKE_DIR_NAME),
      successDir: path.join(baseDir, SUCCESS_DIR_NAME),
      failureDir: path.join(baseDir, FAILURE_DIR_NAME),
    },

    lancedb: {
      uri: path.join(baseDir, parsed.LANCEDB_DIR),
      tableName: parsed.LANCEDB_TABLE,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
      cohere: parsed.COHERE_API_KEY
        ? { apiKey: parsed.COHERE_API_KEY, model: parsed.COHERE_EMBED_MODEL }
        : undefined,
      bgeM3: parsed.BGE_M3_URL ? { baseUrl: parsed.BGE_M3_URL } : undefined,
    },

    routing: {
      collisionPolicy: parsed.COLLISION_POLICY,
    },
  };
}
