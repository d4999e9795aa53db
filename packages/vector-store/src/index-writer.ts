import type { EmbeddedChunk, SearchMatch } from "@voicekb/types";
import type { Logger } from "@voicekb/logger";
import { InvalidNamespaceError, sleep } from "@voicekb/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { toIndexError } from "./index-errors.js";

const NAMESPACE_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface VectorIndexWriterOptions {
  /** Vectors per upsert request. Default: 100 */
  maxVectorsPerRequest?: number;
  /** Pause between upsert requests. Default: 100 */
  batchDelayMs?: number;
  logger?: Logger;
}

export type StoreOutcome =
  | { success: true; stored: number; batches: number }
  | {
      success: false;
      /** Vectors written by the requests that finished before the failure. */
      stored: number;
      batches: number;
      failedBatch: number;
      error: string;
      retryable: boolean;
    };

/** Throws InvalidNamespaceError unless `namespace` is a plain identifier. */
export function assertValidNamespace(namespace: string): void {
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new InvalidNamespaceError(namespace);
  }
}

/**
 * Writes a document's embedded chunks into one namespace in size-capped
 * requests. A failed request stops the write and reports what was stored
 * before it.
 */
export class VectorIndexWriter {
  private vectorStore: IVectorStore;
  private maxVectorsPerRequest: number;
  private batchDelayMs: number;
  private logger?: Logger;

  constructor(store: IVectorStore, options: VectorIndexWriterOptions = {}) {
    this.vectorStore = store;
    this.maxVectorsPerRequest = options.maxVectorsPerRequest ?? 100;
    this.batchDelayMs = options.batchDelayMs ?? 100;
    this.logger = options.logger;

    if (this.maxVectorsPerRequest < 1) {
      throw new Error("VectorIndexWriter: maxVectorsPerRequest must be positive");
    }
  }

  async store(namespace: string, chunks: readonly EmbeddedChunk[]): Promise<StoreOutcome> {
    assertValidNamespace(namespace);

    const batches = Math.ceil(chunks.length / this.maxVectorsPerRequest);
    let stored = 0;

    for (let b = 0; b < batches; b++) {
      const batch = chunks.slice(b * this.maxVectorsPerRequest, (b + 1) * this.maxVectorsPerRequest);

      try {
        await this.vectorStore.upsert(
          namespace,
          batch.map((c) => ({ id: c.id, vector: c.embedding, metadata: { ...c.metadata } })),
        );
      } catch (err) {
        const failure = toIndexError(err);
        this.logger?.error(
          { err, namespace, batch: b + 1, batches, stored },
          "Vector upsert failed; stopping this write",
        );
        return {
          success: false,
          stored,
          batches,
          failedBatch: b + 1,
          error: failure.message,
          retryable: failure.retryable,
        };
      }

      stored += batch.length;

      if (b < batches - 1 && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    this.logger?.debug({ namespace, stored, batches }, "Stored vectors");
    return { success: true, stored, batches };
  }

  /** Remove every chunk of `fileId` from the namespace. Returns how many were removed. */
  async deleteDocument(namespace: string, fileId: string): Promise<number> {
    assertValidNamespace(namespace);

    const ids = await this.vectorStore.listIds(namespace, { fileId });
    for (let i = 0; i < ids.length; i += this.maxVectorsPerRequest) {
      await this.vectorStore.deleteIds(namespace, ids.slice(i, i + this.maxVectorsPerRequest));
    }

    this.logger?.info({ namespace, fileId, deleted: ids.length }, "Deleted document vectors");
    return ids.length;
  }

  async search(namespace: string, vector: number[], topK: number): Promise<SearchMatch[]> {
    assertValidNamespace(namespace);

    const matches = await this.vectorStore.query(namespace, vector, topK);
    return matches.map((m) => ({
      id: m.id,
      score: m.score,
      text: stringField(m.metadata, "text"),
      filename: stringField(m.metadata, "filename"),
      fileId: stringField(m.metadata, "fileId"),
      chunkIndex: numberField(m.metadata, "chunkIndex"),
      metadata: m.metadata,
    }));
  }
}

function stringField(metadata: Record<string, unknown>, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value : "";
}

function numberField(metadata: Record<string, unknown>, key: string): number {
  const value = metadata[key];
  return typeof value === "number" ? value : -1;
}
