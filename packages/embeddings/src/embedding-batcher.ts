import type { Logger } from "@voicekb/logger";
import {
  ExternalServiceError,
  MissingCredentialsError,
  errorMessage,
  isRetryable,
  sleep,
} from "@voicekb/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingBatcherOptions {
  /** Chunks per provider call. Default: 10 */
  batchSize?: number;
  /** Chunks beyond this are dropped with a warning. Default: 1000 */
  maxChunksPerDocument?: number;
  /** Pause between provider calls. Default: 100 */
  batchDelayMs?: number;
  logger?: Logger;
}

export interface BatchProgress {
  /** 1-based index of the batch that just finished. */
  batch: number;
  totalBatches: number;
  chunksDone: number;
  totalChunks: number;
}

export interface EmbeddingProgressListener {
  onBatchEmbedded(progress: BatchProgress): void | Promise<void>;
}

export interface BatchCounts {
  /** Chunks handed in before the per-document cap. */
  originalChunkCount: number;
  /** Chunks actually sent for embedding. */
  chunkCount: number;
  truncated: boolean;
  totalBatches: number;
}

export type BatchEmbeddingOutcome =
  | (BatchCounts & {
      success: true;
      embeddings: number[][];
      tokensUsed: number;
    })
  | (BatchCounts & {
      success: false;
      error: string;
      /** Vectors for the batches that finished before the failure. */
      embeddings: number[][];
      failedBatch: number;
      credentialsMissing: boolean;
      retryable: boolean;
    });

/**
 * Splits a document's chunks into fixed-size provider calls, paced by a
 * short delay, and caps how many chunks one document may embed.
 */
export class EmbeddingBatcher {
  private provider: IEmbeddingProvider;
  private readonly batchSize: number;
  private readonly maxChunksPerDocument: number;
  private readonly batchDelayMs: number;
  private readonly logger?: Logger;

  constructor(provider: IEmbeddingProvider, options: EmbeddingBatcherOptions = {}) {
    this.provider = provider;
    this.batchSize = options.batchSize ?? 10;
    this.maxChunksPerDocument = options.maxChunksPerDocument ?? 1000;
    this.batchDelayMs = options.batchDelayMs ?? 100;
    this.logger = options.logger;

    if (this.batchSize < 1 || this.maxChunksPerDocument < 1 || this.batchDelayMs < 0) {
      throw new Error("EmbeddingBatcher: batch size and chunk cap must be positive, delay non-negative");
    }
  }

  get providerName(): string {
    return this.provider.name;
  }

  /** How `chunkCount` chunks would be capped and split, without calling the provider. */
  planBatches(chunkCount: number): BatchCounts {
    const truncated = chunkCount > this.maxChunksPerDocument;
    const selected = truncated ? this.maxChunksPerDocument : chunkCount;
    return {
      originalChunkCount: chunkCount,
      chunkCount: selected,
      truncated,
      totalBatches: Math.ceil(selected / this.batchSize),
    };
  }

  async embedBatches(
    texts: readonly string[],
    listener?: EmbeddingProgressListener,
  ): Promise<BatchEmbeddingOutcome> {
    const counts = this.planBatches(texts.length);
    const selected = texts.slice(0, counts.chunkCount);

    if (counts.truncated) {
      this.logger?.warn(
        { originalChunkCount: counts.originalChunkCount, maxChunksPerDocument: this.maxChunksPerDocument },
        "Document exceeds chunk cap; embedding the first chunks only",
      );
    }

    const embeddings: number[][] = [];
    let tokensUsed = 0;

    for (let b = 0; b < counts.totalBatches; b++) {
      const batch = selected.slice(b * this.batchSize, (b + 1) * this.batchSize);

      try {
        const result = await this.provider.batchEmbed(batch);
        if (result.embeddings.length !== batch.length) {
          throw new Error(
            `Embedding count mismatch: expected ${String(batch.length)}, got ${String(result.embeddings.length)}`,
          );
        }
        this.assertDimensions(result.embeddings);
        embeddings.push(...result.embeddings);
        tokensUsed += result.tokensUsed;
      } catch (err) {
        const credentialsMissing = err instanceof MissingCredentialsError;
        this.logger?.error(
          { err, batch: b + 1, totalBatches: counts.totalBatches, provider: this.provider.name },
          "Embedding batch failed",
        );
        return {
          ...counts,
          success: false,
          error: errorMessage(err),
          embeddings,
          failedBatch: b + 1,
          credentialsMissing,
          retryable: !credentialsMissing && isRetryable(err),
        };
      }

      await this.notify(listener, {
        batch: b + 1,
        totalBatches: counts.totalBatches,
        chunksDone: embeddings.length,
        totalChunks: selected.length,
      });

      if (b < counts.totalBatches - 1 && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    this.logger?.debug(
      { chunks: selected.length, batches: counts.totalBatches, tokensUsed },
      "Embedded document chunks",
    );

    return { ...counts, success: true, embeddings, tokensUsed };
  }

  /** One index holds one vector size; a mismatched vector can never be stored. */
  private assertDimensions(vectors: readonly number[][]): void {
    const expected = this.provider.dimensions;
    const wrong = vectors.find((v) => v.length !== expected);
    if (wrong) {
      throw new ExternalServiceError(
        `Embedding dimension mismatch: expected ${String(expected)}, got ${String(wrong.length)}`,
        this.provider.name,
        { retryable: false },
      );
    }
  }

  private async notify(
    listener: EmbeddingProgressListener | undefined,
    progress: BatchProgress,
  ): Promise<void> {
    if (!listener) return;
    try {
      await listener.onBatchEmbedded(progress);
    } catch (err) {
      this.logger?.warn({ err, ...progress }, "Embedding progress listener failed");
    }
  }
}
