import OpenAI from "openai";
import type { EmbeddingResult } from "@voicekb/types";
import { ExternalServiceError, MissingCredentialsError, withRetry, type RetryOptions } from "@voicekb/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "text-embedding-3-large";
const DEFAULT_DIMENSIONS = 3072;

/** The part of the OpenAI SDK this provider calls. */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(body: {
      model: string;
      input: string[];
      encoding_format: "float";
      dimensions?: number;
    }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
      usage: { prompt_tokens: number };
    }>;
  };
}

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  /** Sent to the API only when set; text-embedding-3 models can shorten vectors. */
  dimensions?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  /** Use this client instead of constructing one from `apiKey`. */
  client?: OpenAIEmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;
  private readonly model: string;
  private readonly requestDimensions?: number;
  private readonly retry?: RetryOptions;
  private readonly client: OpenAIEmbeddingsClient | null;

  constructor(config: OpenAIProviderConfig) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.requestDimensions = config.dimensions;
    this.retry = config.retry;

    // A missing key is reported per call so the worker can still boot.
    if (config.client) {
      this.client = config.client;
    } else if (config.apiKey.length > 0) {
      this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
    } else {
      this.client = null;
    }
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const client = this.client;
    if (!client) {
      throw new MissingCredentialsError("openai", "OPENAI_API_KEY is not configured");
    }
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }

    const response = await withRetry(async () => {
      try {
        return await client.embeddings.create({
          model: this.model,
          input: texts,
          encoding_format: "float",
          ...(this.requestDimensions !== undefined && { dimensions: this.requestDimensions }),
        });
      } catch (err) {
        throw toProviderError("openai", err);
      }
    }, this.retry);

    const embeddings = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);

    if (embeddings.length !== texts.length) {
      throw new ExternalServiceError(
        `openai returned ${String(embeddings.length)} embeddings for ${String(texts.length)} inputs`,
        "openai",
      );
    }

    return {
      embeddings,
      model: this.model,
      tokensUsed: response.usage.prompt_tokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
