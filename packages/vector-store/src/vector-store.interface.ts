/** One vector as handed to the store. `id` is the chunk id. */
export interface VectorPoint {
  id: string;
  vector: number[];
  metadata: Record<string, unknown>;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface VectorQueryFilter {
  fileId?: string;
}

/**
 * Namespace-partitioned vector index. Every call is scoped to exactly one
 * namespace; points in other namespaces are never read or touched.
 */
export interface IVectorStore {
  upsert(namespace: string, points: VectorPoint[]): Promise<void>;
  query(
    namespace: string,
    vector: number[],
    topK: number,
    filter?: VectorQueryFilter,
  ): Promise<VectorMatch[]>;
  /** Ids of every point in the namespace that matches the filter. */
  listIds(namespace: string, filter: VectorQueryFilter): Promise<string[]>;
  deleteIds(namespace: string, ids: string[]): Promise<void>;
  /** Create whatever the backing index needs before the first write. */
  ensureReady(): Promise<void>;
  healthCheck(): Promise<boolean>;
}
