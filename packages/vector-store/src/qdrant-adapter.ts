import { createHash } from "node:crypto";
import { QdrantClient, type Schemas } from "@qdrant/js-client-rest";
import type {
  IVectorStore,
  VectorMatch,
  VectorPoint,
  VectorQueryFilter,
} from "./vector-store.interface.js";
import { toIndexError } from "./index-errors.js";

const SCROLL_PAGE_SIZE = 256;

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  /** One collection holds every namespace; points carry a `namespace` payload field. */
  collection: string;
  dimensions: number;
  timeoutMs?: number;
}

/**
 * Qdrant point ids must be UUIDs or integers. Chunk ids are hashed together
 * with the namespace so the same file id in two namespaces never collides.
 */
export function pointIdFor(namespace: string, chunkId: string): string {
  const hex = createHash("sha1").update(`${namespace}:${chunkId}`).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    ((parseInt(hex.slice(16, 18), 16) & 0x3f) | 0x80).toString(16) + hex.slice(18, 20),
    hex.slice(20, 32),
  ].join("-");
}

export function namespaceFilter(namespace: string, filter: VectorQueryFilter = {}): Schemas["Filter"] {
  const must: Schemas["FieldCondition"][] = [{ key: "namespace", match: { value: namespace } }];
  if (filter.fileId !== undefined) {
    must.push({ key: "fileId", match: { value: filter.fileId } });
  }
  return { must };
}

function chunkIdOf(payload: Record<string, unknown> | null | undefined, fallback: string | number): string {
  const chunkId = payload?.["chunkId"];
  return typeof chunkId === "string" ? chunkId : String(fallback);
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private collection: string;
  private dimensions: number;

  constructor(options: QdrantVectorStoreOptions) {
    this.client = new QdrantClient({
      url: options.url,
      apiKey: options.apiKey,
      ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
    });
    this.collection = options.collection;
    this.dimensions = options.dimensions;
  }

  async upsert(namespace: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    await this.call(() =>
      this.client.upsert(this.collection, {
        wait: true,
        points: points.map((p) => ({
          id: pointIdFor(namespace, p.id),
          vector: p.vector,
          payload: {
            ...p.metadata,
            namespace,
            chunkId: p.id,
          },
        })),
      }),
    );
  }

  async query(
    namespace: string,
    vector: number[],
    topK: number,
    filter?: VectorQueryFilter,
  ): Promise<VectorMatch[]> {
    const results = await this.call(() =>
      this.client.search(this.collection, {
        vector,
        limit: topK,
        filter: namespaceFilter(namespace, filter),
        with_payload: true,
      }),
    );

    return results.map((r) => ({
      id: chunkIdOf(r.payload, r.id),
      score: r.score,
      metadata: r.payload ?? {},
    }));
  }

  async listIds(namespace: string, filter: VectorQueryFilter): Promise<string[]> {
    const ids: string[] = [];
    let offset: string | number | undefined;

    do {
      const pageOffset = offset;
      const page = await this.call(() =>
        this.client.scroll(this.collection, {
          filter: namespaceFilter(namespace, filter),
          limit: SCROLL_PAGE_SIZE,
          with_payload: ["chunkId"],
          with_vector: false,
          ...(pageOffset !== undefined && { offset: pageOffset }),
        }),
      );

      for (const point of page.points) {
        ids.push(chunkIdOf(point.payload, point.id));
      }

      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);

    return ids;
  }

  async deleteIds(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    await this.call(() =>
      this.client.delete(this.collection, {
        wait: true,
        points: ids.map((id) => pointIdFor(namespace, id)),
      }),
    );
  }

  async ensureReady(): Promise<void> {
    await this.call(() => this.createCollectionIfMissing());
  }

  private async createCollectionIfMissing(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);
    if (exists) return;

    await this.client.createCollection(this.collection, {
      vectors: {
        size: this.dimensions,
        distance: "Cosine",
      },
      optimizers_config: {
        indexing_threshold: 20000,
      },
    });

    // Payload indexes for namespace scoping and per-file deletes
    await this.client.createPayloadIndex(this.collection, {
      field_name: "namespace",
      field_schema: "keyword",
    });
    await this.client.createPayloadIndex(this.collection, {
      field_name: "fileId",
      field_schema: "keyword",
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      throw toIndexError(err);
    }
  }
}
