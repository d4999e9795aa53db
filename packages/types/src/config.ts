export type EmbeddingProviderName = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  qdrant: QdrantConfig;
  embeddings: EmbeddingsConfig;
  chunking: ChunkingSettings;
  indexing: IndexingConfig;
  queue: QueueSettings;
  docling: DoclingConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
  batchSize: number;
  maxChunksPerDocument: number;
  batchDelayMs: number;
  requestTimeoutMs: number;
  openai: { apiKey: string; model: string };
  cohere: { apiKey: string; model: string };
}

export interface ChunkingSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface IndexingConfig {
  upsertBatchSize: number;
  batchDelayMs: number;
}

export interface QueueSettings {
  pollIntervalMs: number;
  maxRetries: number;
}

export interface DoclingConfig {
  pythonPath: string;
  scriptPath: string;
}
