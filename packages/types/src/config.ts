export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderType = "cohere" | "bge-m3";

export type CollisionPolicy = "rename" | "overwrite" | "fail";

export interface IngestConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  timeZone: string;
  previewChars: number;
  paths: PathsConfig;
  lancedb: LanceDbConfig;
  embedding: EmbeddingConfig;
  routing: RoutingConfig;
}

export interface PathsConfig {
  baseDir: string;
  intakeDir: string;
  successDir: string;
  failureDir: string;
}

export interface LanceDbConfig {
  uri: string;
  tableName: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  /** 0 disables the timeout. */
  timeoutMs: number;
  cohere?: CohereConfig;
  bgeM3?: BgeM3Config;
}

export interface CohereConfig {
  apiKey: string;
  model: string;
}

export interface BgeM3Config {
  baseUrl: string;
}

export interface RoutingConfig {
  collisionPolicy: CollisionPolicy;
}
