import { describe, it, expect } from "vitest";
import type { EmbeddedChunk } from "@voicekb/types";
import { ExternalServiceError, InvalidNamespaceError } from "@voicekb/errors";
import { createVectorStore, QdrantVectorStore } from "./index.js";
import { VectorIndexWriter } from "./index-writer.js";
import { namespaceFilter, pointIdFor } from "./qdrant-adapter.js";
import { toIndexError } from "./index-errors.js";
import { InMemoryVectorStore } from "./testing.js";

function chunks(fileId: string, count: number, namespaceId = "agent-1"): EmbeddedChunk[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `${fileId}_chunk_${String(i)}`,
    text: `text ${String(i)}`,
    embedding: [1, i, 0],
    metadata: {
      fileId,
      filename: `${fileId}.txt`,
      chunkIndex: i,
      totalChunks: count,
      tenantId: "tenant-1",
      namespaceId,
      wordCount: 2,
      text: `text ${String(i)}`,
      createdAt: "2026-01-01T00:00:00.000Z",
    },
  }));
}

describe("createVectorStore factory", () => {
  it("creates QdrantVectorStore for type 'qdrant'", () => {
    const store = createVectorStore({
      type: "qdrant",
      qdrantUrl: "http://localhost:6333",
      collection: "kb",
      dimensions: 3,
    });
    expect(store).toBeInstanceOf(QdrantVectorStore);
  });

  it("throws for missing qdrantUrl", () => {
    expect(() => createVectorStore({ type: "qdrant", collection: "kb", dimensions: 3 })).toThrow(
      "qdrantUrl is required",
    );
  });
});

describe("Qdrant helpers", () => {
  it("derives stable UUIDs that differ per namespace", () => {
    const id = pointIdFor("agent-1", "doc_chunk_0");

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(pointIdFor("agent-1", "doc_chunk_0")).toBe(id);
    expect(pointIdFor("agent-2", "doc_chunk_0")).not.toBe(id);
  });

  it("always scopes filters to the namespace", () => {
    expect(namespaceFilter("agent-1")).toEqual({
      must: [{ key: "namespace", match: { value: "agent-1" } }],
    });
    expect(namespaceFilter("agent-1", { fileId: "doc-9" })).toEqual({
      must: [
        { key: "namespace", match: { value: "agent-1" } },
        { key: "fileId", match: { value: "doc-9" } },
      ],
    });
  });
});

describe("VectorIndexWriter", () => {
  it("writes in requests of at most maxVectorsPerRequest", async () => {
    const store = new InMemoryVectorStore();
    const writer = new VectorIndexWriter(store, { maxVectorsPerRequest: 100, batchDelayMs: 0 });

    const outcome = await writer.store("agent-1", chunks("doc", 250));

    expect(outcome).toEqual({ success: true, stored: 250, batches: 3 });
    expect(store.upsertCalls.map((c) => c.ids.length)).toEqual([100, 100, 50]);
    expect(store.count("agent-1")).toBe(250);
    expect(store.get("agent-1", "doc_chunk_7")?.metadata["chunkIndex"]).toBe(7);
  });

  it("reports exactly the vectors stored before a failing request", async () => {
    const store = new InMemoryVectorStore().failOnUpsert(3, new ExternalServiceError("timeout", "qdrant"));
    const writer = new VectorIndexWriter(store, { maxVectorsPerRequest: 10, batchDelayMs: 0 });

    const outcome = await writer.store("agent-1", chunks("doc", 45));

    expect(outcome).toEqual({
      success: false,
      stored: 20,
      batches: 5,
      failedBatch: 3,
      error: "timeout",
      retryable: true,
    });
    expect(store.upsertCalls).toHaveLength(3);
    expect(store.count("agent-1")).toBe(20);
  });

  it("reports a failure on the first request as zero stored", async () => {
    const store = new InMemoryVectorStore().failOnUpsert(1, new Error("connection refused"));
    const writer = new VectorIndexWriter(store, { batchDelayMs: 0 });

    const outcome = await writer.store("agent-1", chunks("doc", 5));

    expect(outcome).toMatchObject({ success: false, stored: 0, failedBatch: 1 });
  });

  it("does not retry a request the index rejected", async () => {
    const rejected = Object.assign(new Error("Bad Request: wrong vector dimension"), { status: 400 });
    const store = new InMemoryVectorStore().failOnUpsert(1, rejected);
    const writer = new VectorIndexWriter(store, { batchDelayMs: 0 });

    const outcome = await writer.store("agent-1", chunks("doc", 5));

    expect(outcome).toEqual({
      success: false,
      stored: 0,
      batches: 1,
      failedBatch: 1,
      error: "Vector index request failed: Bad Request: wrong vector dimension",
      retryable: false,
    });
  });

  it("rejects namespaces that are not plain identifiers", async () => {
    const writer = new VectorIndexWriter(new InMemoryVectorStore());

    await expect(writer.store("../other tenant", chunks("doc", 1))).rejects.toBeInstanceOf(
      InvalidNamespaceError,
    );
    await expect(writer.store("", chunks("doc", 1))).rejects.toBeInstanceOf(InvalidNamespaceError);
    await expect(writer.search("a".repeat(129), [1, 0, 0], 3)).rejects.toBeInstanceOf(
      InvalidNamespaceError,
    );
  });

  it("deletes every chunk of one document and nothing else", async () => {
    const store = new InMemoryVectorStore();
    const writer = new VectorIndexWriter(store, { maxVectorsPerRequest: 2, batchDelayMs: 0 });
    await writer.store("agent-1", chunks("keep", 3));
    await writer.store("agent-1", chunks("drop", 5));
    await writer.store("agent-2", chunks("drop", 2, "agent-2"));

    const deleted = await writer.deleteDocument("agent-1", "drop");

    expect(deleted).toBe(5);
    expect(store.count("agent-1")).toBe(3);
    expect(store.count("agent-2")).toBe(2);
    expect(await writer.deleteDocument("agent-1", "drop")).toBe(0);
  });

  it("searches one namespace and flattens metadata", async () => {
    const store = new InMemoryVectorStore();
    const writer = new VectorIndexWriter(store, { batchDelayMs: 0 });
    await writer.store("agent-1", chunks("doc", 3));
    await writer.store("agent-2", chunks("other", 3, "agent-2"));

    const matches = await writer.search("agent-1", [0, 1, 0], 2);

    expect(matches.map((m) => m.id)).toEqual(["doc_chunk_2", "doc_chunk_1"]);
    expect(matches[0]).toMatchObject({
      text: "text 2",
      filename: "doc.txt",
      fileId: "doc",
      chunkIndex: 2,
    });
  });
});

describe("toIndexError", () => {
  function withStatus(status: number, message: string): Error {
    return Object.assign(new Error(message), { status });
  }

  it("marks rate limits, server errors and transport failures retryable", () => {
    expect(toIndexError(withStatus(429, "slow down")).retryable).toBe(true);
    expect(toIndexError(withStatus(503, "unavailable")).retryable).toBe(true);
    expect(toIndexError(new Error("ECONNREFUSED")).retryable).toBe(true);
  });

  it("marks other client errors terminal", () => {
    const err = toIndexError(withStatus(404, "Not Found"));

    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err.retryable).toBe(false);
    expect(err.details).toEqual({ status: 404 });
  });

  it("reads the status from an unexpected-response message", () => {
    const err = toIndexError(new Error("Unexpected Response: 400 (Bad Request)"));

    expect(err.retryable).toBe(false);
    expect(err.details).toEqual({ status: 400 });
  });

  it("passes app errors through", () => {
    const original = new ExternalServiceError("timeout", "qdrant");

    expect(toIndexError(original)).toBe(original);
  });
});
