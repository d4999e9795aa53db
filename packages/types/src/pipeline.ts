export type ExtractionResult =
  | {
      success: true;
      text: string;
      wordCount: number;
      metadata: Record<string, unknown>;
    }
  | {
      success: false;
      error: string;
    };

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

/** Why a document did not make it into the index. */
export type DocumentFailureReason =
  | "not_found"
  | "extraction"
  | "empty_text"
  | "credentials"
  | "embedding"
  | "indexing"
  | "unexpected";

/** `extraction` only occurs on paths that start from raw bytes. */
export type PipelineStage =
  | "extraction"
  | "cleaning"
  | "chunking"
  | "embedding"
  | "vector_storage"
  | "complete";

export interface IngestSuccess {
  success: true;
  stage: "complete";
  fileId: string;
  namespaceId: string;
  chunksStored: number;
  chunkCount: number;
  originalChunkCount: number;
  truncated: boolean;
  wordCount: number;
}

export interface IngestFailure {
  success: false;
  stage: Exclude<PipelineStage, "complete">;
  fileId: string;
  namespaceId: string;
  reason: DocumentFailureReason;
  error: string;
  retryable: boolean;
  chunksStored: number;
  wordCount: number;
}

export type IngestOutcome = IngestSuccess | IngestFailure;

export interface DocumentFailure {
  fileId: string;
  filename: string;
  reason: DocumentFailureReason;
  error: string;
  retryable: boolean;
}

export interface BatchIngestionSummary {
  totalFiles: number;
  processedCount: number;
  failedFiles: DocumentFailure[];
  successRate: number;
  /** At least one document stopped because the embedding provider has no usable key. */
  credentialsMissing: boolean;
}

export interface SearchMatch {
  id: string;
  score: number;
  text: string;
  filename: string;
  fileId: string;
  chunkIndex: number;
  metadata: Record<string, unknown>;
}
