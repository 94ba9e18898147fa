import type { EmbeddingConfig } from "@storyvault/types";
import type { Logger } from "@storyvault/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import { Embedder } from "./embedder.js";

export type EmbeddingFactoryConfig = Pick<
  EmbeddingConfig,
  "provider" | "cohere" | "bgeM3"
> & { dimensions?: number };

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({ ...config.cohere, dimensions: config.dimensions });
    case "bge-m3":
      if (!config.bgeM3) {
        throw new Error("BGE-M3 config is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider({ ...config.bgeM3, dimensions: config.dimensions });
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}

/**
 * Build the embedder from configuration. Credentials come from `config` only.
 */
export function createEmbedder(config: EmbeddingConfig, logger?: Logger): Embedder {
  return new Embedder(createEmbeddingProvider(config), { timeoutMs: config.timeoutMs, logger });
}
