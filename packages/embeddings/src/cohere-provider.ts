import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@storyvault/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-english-v3.0";
const DEFAULT_DIMENSIONS = 1024;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    // Retries stay off: a failed document is routed to the failure folder instead
    const response = await this.client.v2.embed(
      {
        texts: [text],
        model: this.model,
        inputType: "search_document",
        embeddingTypes: ["float"],
      },
      { abortSignal: options?.signal, maxRetries: 0 },
    );

    return {
      embeddings: response.embeddings.float ?? [],
      model: this.model,
      tokensUsed: response.meta?.billedUnits?.inputTokens ?? 0,
      dimensions: this.dimensions,
    };
  }
}
