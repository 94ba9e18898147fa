import type { EmbeddingResult } from "@storyvault/types";

export interface EmbedOptions {
  /** Aborts the provider call (timeout or caller cancellation). */
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
}
