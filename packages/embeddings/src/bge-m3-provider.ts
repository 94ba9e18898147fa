import type { EmbeddingResult } from "@storyvault/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
}

interface BgeM3Response {
  embeddings: number[][];
  tokens_used: number;
}

/**
 * Embeds story text on a self-hosted BGE-M3 server: `POST {baseUrl}/embed`
 * with one text per request. Non-2xx responses throw; `Embedder` wraps them.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private readonly baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts: [text], dimensions: this.dimensions }),
      signal: options?.signal,
    });

    if (!response.ok) {
      throw new Error(`BGE-M3 embedding failed: ${response.status} ${response.statusText}`);
    }

    const data = (await response.json()) as BgeM3Response;

    return {
      embeddings: data.embeddings,
      model: "bge-m3",
      tokensUsed: data.tokens_used,
      dimensions: this.dimensions,
    };
  }
}
