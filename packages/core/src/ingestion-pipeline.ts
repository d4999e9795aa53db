import type { EmbeddedChunk, IngestFailure, IngestOutcome, PipelineStage } from "@voicekb/types";
import type { IChunker } from "@voicekb/chunker";
import { cleanText } from "@voicekb/chunker";
import type { EmbeddingBatcher, EmbeddingProgressListener } from "@voicekb/embeddings";
import type { VectorIndexWriter } from "@voicekb/vector-store";
import { assertValidNamespace } from "@voicekb/vector-store";
import type { Logger } from "@voicekb/logger";
import { errorMessage, isRetryable } from "@voicekb/errors";

export interface IngestInput {
  text: string;
  fileId: string;
  filename: string;
  tenantId: string;
  namespaceId: string;
}

export interface StageInfo {
  /** Chunks that go on to embedding, after the per-document cap. */
  chunkCount: number;
  totalBatches: number;
}

/**
 * Receives a document's progress through the pipeline. Batch progress comes
 * from the embedding batcher; stage changes and the final outcome from the
 * pipeline itself.
 */
export interface IngestionReporter extends EmbeddingProgressListener {
  onStage(stage: PipelineStage, info: StageInfo): void | Promise<void>;
  onFinished(outcome: IngestOutcome): void | Promise<void>;
}

export interface IngestionDependencies {
  chunker: IChunker;
  batcher: EmbeddingBatcher;
  writer: VectorIndexWriter;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Ingestion pipeline: Clean -> Chunk -> Embed -> Store
 *
 * Each stage can end the run; the first failure is returned as an
 * IngestFailure naming the stage. Thrown errors are converted the same way,
 * so callers only ever see an outcome.
 */
export async function ingestDocument(
  input: IngestInput,
  deps: IngestionDependencies,
  reporter?: IngestionReporter,
): Promise<IngestOutcome> {
  const log = deps.logger?.child({ fileId: input.fileId, namespaceId: input.namespaceId });
  let stage: Exclude<PipelineStage, "complete"> = "cleaning";
  let wordCount = 0;

  const fail = (
    failure: Pick<IngestFailure, "reason" | "error" | "retryable"> & { chunksStored?: number },
  ): IngestFailure => ({
    success: false,
    stage,
    fileId: input.fileId,
    namespaceId: input.namespaceId,
    reason: failure.reason,
    error: failure.error,
    retryable: failure.retryable,
    chunksStored: failure.chunksStored ?? 0,
    wordCount,
  });

  async function run(): Promise<IngestOutcome> {
    assertValidNamespace(input.namespaceId);

    // Phase 1: Clean
    const cleaned = cleanText(input.text);
    wordCount = cleaned === "" ? 0 : cleaned.split(" ").length;
    if (wordCount === 0) {
      return fail({ reason: "empty_text", error: "Document has no text to index", retryable: false });
    }

    // Phase 2: Chunk
    stage = "chunking";
    const spans = deps.chunker.chunkWithSpans(cleaned);
    if (spans.length === 0) {
      return fail({ reason: "empty_text", error: "Chunking produced no chunks", retryable: false });
    }

    // Phase 3: Embed
    stage = "embedding";
    const texts = spans.map((s) => s.text);
    const plan = deps.batcher.planBatches(texts.length);
    await notify(deps.logger, () =>
      reporter?.onStage("embedding", { chunkCount: plan.chunkCount, totalBatches: plan.totalBatches }),
    );

    const embedded = await deps.batcher.embedBatches(texts, reporter);
    if (!embedded.success) {
      return fail({
        reason: embedded.credentialsMissing ? "credentials" : "embedding",
        error: embedded.error,
        retryable: embedded.retryable,
      });
    }

    const createdAt = (deps.now?.() ?? new Date()).toISOString();
    const chunks: EmbeddedChunk[] = [];
    embedded.embeddings.forEach((embedding, i) => {
      const span = spans[i];
      if (!span) return;
      chunks.push({
        id: `${input.fileId}_chunk_${String(i)}`,
        text: span.text,
        embedding,
        metadata: {
          fileId: input.fileId,
          filename: input.filename,
          chunkIndex: i,
          totalChunks: embedded.chunkCount,
          tenantId: input.tenantId,
          namespaceId: input.namespaceId,
          wordCount: span.endWord - span.startWord,
          text: span.text,
          createdAt,
        },
      });
    });

    // Phase 4: Store
    stage = "vector_storage";
    await notify(deps.logger, () =>
      reporter?.onStage("vector_storage", { chunkCount: chunks.length, totalBatches: plan.totalBatches }),
    );

    const stored = await deps.writer.store(input.namespaceId, chunks);
    if (!stored.success) {
      return fail({
        reason: "indexing",
        error: stored.error,
        retryable: stored.retryable,
        chunksStored: stored.stored,
      });
    }

    log?.info(
      {
        chunksStored: stored.stored,
        originalChunkCount: embedded.originalChunkCount,
        truncated: embedded.truncated,
        tokensUsed: embedded.tokensUsed,
      },
      "Document indexed",
    );

    await notify(deps.logger, () =>
      reporter?.onStage("complete", { chunkCount: stored.stored, totalBatches: plan.totalBatches }),
    );

    return {
      success: true,
      stage: "complete",
      fileId: input.fileId,
      namespaceId: input.namespaceId,
      chunksStored: stored.stored,
      chunkCount: embedded.chunkCount,
      originalChunkCount: embedded.originalChunkCount,
      truncated: embedded.truncated,
      wordCount,
    };
  }

  let outcome: IngestOutcome;
  try {
    outcome = await run();
  } catch (err) {
    log?.error({ err, stage }, "Ingestion failed unexpectedly");
    outcome = fail({ reason: "unexpected", error: errorMessage(err), retryable: isRetryable(err) });
  }

  await notify(deps.logger, () => reporter?.onFinished(outcome));
  return outcome;
}

/** Reporter failures are logged and never end the run. */
async function notify(
  logger: Logger | undefined,
  call: () => void | Promise<void> | undefined,
): Promise<void> {
  try {
    await call();
  } catch (err) {
    logger?.warn({ err }, "Ingestion reporter failed");
  }
}
