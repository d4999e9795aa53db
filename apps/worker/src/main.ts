import { parseEnv } from "@voicekb/config";
import { createLogger, createChildLogger } from "@voicekb/logger";
import { applySchema, createWorkerDbClient } from "@voicekb/db";
import { createEmbeddingProvider, EmbeddingBatcher } from "@voicekb/embeddings";
import { createVectorStore, VectorIndexWriter } from "@voicekb/vector-store";
import { WordWindowChunker } from "@voicekb/chunker";
import { createExtractorRegistry } from "@voicekb/parser";
import { DrizzleJobStore, JobQueue } from "@voicekb/queue";
import { DrizzleProgressStore, ProgressTracker } from "@voicekb/progress";
import { DrizzleDocumentRepository, IngestionJobProcessor } from "@voicekb/core";
import { createJobHandlers } from "./processors/index.js";
import { QueueWorker } from "./queue-worker.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "voicekb-worker" });

  const { db, close } = createWorkerDbClient({
    url: config.database.url,
    maxConnections: config.database.poolMax,
  });
  await applySchema(db);

  const { embeddings } = config;
  const provider = createEmbeddingProvider({
    provider: embeddings.provider,
    dimensions: embeddings.dimensions,
    timeoutMs: embeddings.requestTimeoutMs,
    retry: {
      onRetry: ({ attempt, maxRetries, delayMs, error }) =>
        logger.warn({ err: error, attempt, maxRetries, delayMs }, "Retrying embedding request"),
    },
    openai: { apiKey: embeddings.openai.apiKey, model: embeddings.openai.model },
    cohere: { apiKey: embeddings.cohere.apiKey, model: embeddings.cohere.model },
  });
  if (!embeddings[embeddings.provider].apiKey) {
    logger.warn(
      { provider: embeddings.provider },
      "No embedding API key configured; documents will fail until one is set",
    );
  }

  const vectorStore = createVectorStore({
    type: "qdrant",
    qdrantUrl: config.qdrant.url,
    qdrantApiKey: config.qdrant.apiKey,
    collection: config.qdrant.collection,
    dimensions: embeddings.dimensions,
    timeoutMs: embeddings.requestTimeoutMs,
  });
  await vectorStore.ensureReady();

  const queue = new JobQueue(new DrizzleJobStore(db), {
    defaultMaxRetries: config.queue.maxRetries,
    logger: createChildLogger(logger, { component: "job-queue" }),
  });
  const tracker = new ProgressTracker(new DrizzleProgressStore(db), {
    queue,
    logger: createChildLogger(logger, { component: "progress" }),
  });

  const processor = new IngestionJobProcessor({
    ingestion: {
      chunker: new WordWindowChunker({
        chunkSize: config.chunking.chunkSize,
        chunkOverlap: config.chunking.chunkOverlap,
      }),
      batcher: new EmbeddingBatcher(provider, {
        batchSize: embeddings.batchSize,
        maxChunksPerDocument: embeddings.maxChunksPerDocument,
        batchDelayMs: embeddings.batchDelayMs,
        logger: createChildLogger(logger, { component: "embedding-batcher" }),
      }),
      writer: new VectorIndexWriter(vectorStore, {
        maxVectorsPerRequest: config.indexing.upsertBatchSize,
        batchDelayMs: config.indexing.batchDelayMs,
        logger: createChildLogger(logger, { component: "index-writer" }),
      }),
      logger: createChildLogger(logger, { component: "pipeline" }),
    },
    extractor: createExtractorRegistry({
      pythonPath: config.docling.pythonPath,
      scriptPath: config.docling.scriptPath,
    }),
    documents: new DrizzleDocumentRepository(db),
    tracker,
    logger: createChildLogger(logger, { component: "job-processor" }),
  });

  const worker = new QueueWorker(queue, createJobHandlers(processor), {
    pollIntervalMs: config.queue.pollIntervalMs,
    logger: createChildLogger(logger, { component: "queue-worker" }),
  });
  worker.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down; waiting for the current job");
    await worker.stop();
    await close();
    logger.info("Worker shut down");
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  const logger = createLogger({ service: "voicekb-worker" });
  logger.fatal({ err }, "Worker failed to start");
  process.exit(1);
});
