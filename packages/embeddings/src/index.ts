export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig, OpenAIEmbeddingsClient } from "./openai-provider.js";
export { CohereEmbeddingProvider, COHERE_OUTPUT_DIMENSIONS } from "./cohere-provider.js";
export type { CohereProviderConfig, CohereEmbedClient } from "./cohere-provider.js";
export { toProviderError } from "./provider-errors.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
export { EmbeddingBatcher } from "./embedding-batcher.js";
export type {
  EmbeddingBatcherOptions,
  EmbeddingProgressListener,
  BatchProgress,
  BatchEmbeddingOutcome,
  BatchCounts,
} from "./embedding-batcher.js";
