export interface ChunkSpan {
  text: string;
  /** Index of the first word (inclusive). */
  startWord: number;
  /** Index one past the last word. */
  endWord: number;
}

export interface ChunkMetadata {
  fileId: string;
  filename: string;
  chunkIndex: number;
  totalChunks: number;
  tenantId: string;
  namespaceId: string;
  wordCount: number;
  /** Duplicated so search hits can be rendered without a second lookup. */
  text: string;
  createdAt: string;
}

export interface EmbeddedChunk {
  /** `{fileId}_chunk_{index}`; stable across retries. */
  id: string;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  boundaryWindow: number;
}
