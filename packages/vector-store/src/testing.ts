import type {
  IVectorStore,
  VectorMatch,
  VectorPoint,
  VectorQueryFilter,
} from "./vector-store.interface.js";

function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/** In-process vector store for tests, with failure injection on upserts. */
export class InMemoryVectorStore implements IVectorStore {
  readonly upsertCalls: Array<{ namespace: string; ids: string[] }> = [];
  private namespaces = new Map<string, Map<string, VectorPoint>>();
  private upsertFailures = new Map<number, unknown>();

  /** Make the n-th upsert call (1-based) throw `error` without writing. */
  failOnUpsert(callNumber: number, error: unknown): this {
    this.upsertFailures.set(callNumber, error);
    return this;
  }

  count(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }

  get(namespace: string, id: string): VectorPoint | undefined {
    return this.namespaces.get(namespace)?.get(id);
  }

  async upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    this.upsertCalls.push({ namespace, ids: points.map((p) => p.id) });
    const failure = this.upsertFailures.get(this.upsertCalls.length);
    if (failure !== undefined) throw failure;

    const bucket = this.namespaces.get(namespace) ?? new Map<string, VectorPoint>();
    for (const point of points) {
      bucket.set(point.id, { ...point, metadata: { ...point.metadata } });
    }
    this.namespaces.set(namespace, bucket);
  }

  async query(
    namespace: string,
    vector: number[],
    topK: number,
    filter: VectorQueryFilter = {},
  ): Promise<VectorMatch[]> {
    return [...this.matching(namespace, filter)]
      .map((p) => ({ id: p.id, score: cosine(vector, p.vector), metadata: p.metadata }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async listIds(namespace: string, filter: VectorQueryFilter): Promise<string[]> {
    return this.matching(namespace, filter).map((p) => p.id);
  }

  async deleteIds(namespace: string, ids: string[]): Promise<void> {
    const bucket = this.namespaces.get(namespace);
    for (const id of ids) bucket?.delete(id);
  }

  async ensureReady(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private matching(namespace: string, filter: VectorQueryFilter): VectorPoint[] {
    const bucket = this.namespaces.get(namespace);
    if (!bucket) return [];
    return [...bucket.values()].filter(
      (p) => filter.fileId === undefined || p.metadata["fileId"] === filter.fileId,
    );
  }
}
