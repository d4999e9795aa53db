import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@voicekb/types";
import { MissingCredentialsError, withRetry, type RetryOptions } from "@voicekb/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

/** Output sizes embed-v4.0 can return. */
export const COHERE_OUTPUT_DIMENSIONS = [256, 512, 1024, 1536] as const;

type CohereInputType = "search_document" | "search_query";

/** The part of the Cohere SDK this provider calls. */
export interface CohereEmbedClient {
  v2: {
    embed(
      request: {
        texts: string[];
        model: string;
        inputType: CohereInputType;
        embeddingTypes: "float"[];
        outputDimension?: number;
      },
      requestOptions?: { timeoutInSeconds?: number; maxRetries?: number },
    ): Promise<{
      embeddings: { float?: number[][] };
      meta?: { billedUnits?: { inputTokens?: number } };
    }>;
  };
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  client?: CohereEmbedClient;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private readonly client: CohereEmbedClient | null;
  private readonly model: string;
  private readonly timeoutInSeconds?: number;
  private readonly retry?: RetryOptions;

  constructor(config: CohereProviderConfig) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    if (!COHERE_OUTPUT_DIMENSIONS.some((d) => d === this.dimensions)) {
      throw new Error(
        `Cohere cannot embed at ${String(this.dimensions)} dimensions (supported: ${COHERE_OUTPUT_DIMENSIONS.join(", ")})`,
      );
    }
    this.timeoutInSeconds =
      config.timeoutMs !== undefined ? Math.ceil(config.timeoutMs / 1000) : undefined;
    this.retry = config.retry;

    if (config.client) {
      this.client = config.client;
    } else if (config.apiKey.length > 0) {
      this.client = new CohereClient({ token: config.apiKey });
    } else {
      this.client = null;
    }
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.request([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.request(texts, "search_document");
  }

  private async request(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const client = this.client;
    if (!client) {
      throw new MissingCredentialsError("cohere", "COHERE_API_KEY is not configured");
    }

    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(async () => {
        try {
          return await client.v2.embed(
            {
              texts: batch,
              model: this.model,
              inputType,
              embeddingTypes: ["float"],
              outputDimension: this.dimensions,
            },
            { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
          );
        } catch (err) {
          throw toProviderError("cohere", err);
        }
      }, this.retry);

      allEmbeddings.push(...(response.embeddings.float ?? []));
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
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
