import type { EmbeddingProviderName } from "@voicekb/types";
import type { RetryOptions } from "@voicekb/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider, type OpenAIProviderConfig } from "./openai-provider.js";
import { CohereEmbeddingProvider, type CohereProviderConfig } from "./cohere-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  dimensions?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  openai?: OpenAIProviderConfig;
  cohere?: CohereProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const shared = {
    dimensions: config.dimensions,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
  };

  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider({ ...shared, ...config.openai });
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({ ...shared, ...config.cohere });
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
