export type { IEmbeddingProvider, EmbedOptions } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { Embedder } from "./embedder.js";
export type { EmbedderOptions } from "./embedder.js";
export { createEmbeddingProvider, createEmbedder } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
