import path from "node:path";
import { describe, it, expect } from "vitest";
import { parseEnv, isValidTimeZone } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    STORY_TIMEZONE: "Asia/Kolkata",
    INGEST_BASE_DIR: "UserStories",
    LANCEDB_DIR: "my_lance_db",
    LANCEDB_TABLE: "user_stories",
    EMBEDDING_PROVIDER: "cohere",
    EMBEDDING_DIMENSIONS: "1024",
    EMBEDDING_TIMEOUT_MS: "30000",
    COHERE_API_KEY: "test-cohere-key",
    COHERE_EMBED_MODEL: "embed-v4.0",
    COLLISION_POLICY: "rename",
    PREVIEW_CHARS: "300",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns IngestConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("info");
    expect(config.timeZone).toBe("Asia/Kolkata");
    expect(config.previewChars).toBe(300);
    expect(config.paths).toEqual({
      baseDir: "UserStories",
      intakeDir: path.join("UserStories", "uploaded_docs"),
      successDir: path.join("UserStories", "success"),
      failureDir: path.join("UserStories", "failure"),
    });
    expect(config.lancedb).toEqual({
      uri: path.join("UserStories", "my_lance_db"),
      tableName: "user_stories",
    });
    expect(config.embedding).toEqual({
      provider: "cohere",
      dimensions: 1024,
      timeoutMs: 30000,
      cohere: { apiKey: "test-cohere-key", model: "embed-v4.0" },
      bgeM3: undefined,
    });
    expect(config.routing.collisionPolicy).toBe("rename");
  });

  it("uses defaults for optional fields", () => {
    const config = parseEnv({ COHERE_API_KEY: "test-cohere-key" });

    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("info");
    expect(config.timeZone).toBe("Asia/Kolkata");
    expect(config.paths.intakeDir).toBe(path.join("UserStories", "uploaded_docs"));
    expect(config.lancedb.tableName).toBe("user_stories");
    expect(config.embedding.dimensions).toBe(1024);
    expect(config.embedding.timeoutMs).toBe(30000);
    expect(config.routing.collisionPolicy).toBe("rename");
    expect(config.embedding.cohere).toEqual({ apiKey: "test-cohere-key", model: "embed-english-v3.0" });
  });

  it("resolves the directory layout under a custom base", () => {
    const config = parseEnv(makeValidEnv({ INGEST_BASE_DIR: "/data/stories", LANCEDB_DIR: "db" }));

    expect(config.paths.failureDir).toBe(path.join("/data/stories", "failure"));
    expect(config.lancedb.uri).toBe(path.join("/data/stories", "db"));
  });

  it("configures bge-m3 without a Cohere key", () => {
    const env = makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", BGE_M3_URL: "http://localhost:8080" });
    delete env["COHERE_API_KEY"];

    const config = parseEnv(env);

    expect(config.embedding.provider).toBe("bge-m3");
    expect(config.embedding.bgeM3).toEqual({ baseUrl: "http://localhost:8080" });
    expect(config.embedding.cohere).toBeUndefined();
  });

  it("accepts a zero timeout", () => {
    expect(parseEnv(makeValidEnv({ EMBEDDING_TIMEOUT_MS: "0" })).embedding.timeoutMs).toBe(0);
  });

  it("rejects missing COHERE_API_KEY for the cohere provider", () => {
    const env = makeValidEnv();
    delete env["COHERE_API_KEY"];
    expect(() => parseEnv(env)).toThrow("COHERE_API_KEY is required");
  });

  it("rejects missing BGE_M3_URL for the bge-m3 provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(
      "BGE_M3_URL is required",
    );
  });

  it("rejects an unknown time zone", () => {
    expect(() => parseEnv(makeValidEnv({ STORY_TIMEZONE: "Mars/Olympus" }))).toThrow();
  });

  it("rejects an invalid table name", () => {
    expect(() => parseEnv(makeValidEnv({ LANCEDB_TABLE: "user stories" }))).toThrow();
  });

  it("rejects non-numeric dimensions", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_DIMENSIONS: "many" }))).toThrow();
  });

  it("rejects a negative timeout", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_TIMEOUT_MS: "-1" }))).toThrow();
  });

  it("rejects an unknown collision policy", () => {
    expect(() => parseEnv(makeValidEnv({ COLLISION_POLICY: "skip" }))).toThrow();
  });
});

describe("isValidTimeZone", () => {
  it("accepts IANA names and rejects junk", () => {
    expect(isValidTimeZone("Asia/Kolkata")).toBe(true);
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("Not/AZone")).toBe(false);
  });
});
