import { describe, it, expect, beforeEach } from "vitest";
import { WordWindowChunker } from "@voicekb/chunker";
import { EmbeddingBatcher } from "@voicekb/embeddings";
import { FakeEmbeddingProvider } from "@voicekb/embeddings/testing";
import { VectorIndexWriter } from "@voicekb/vector-store";
import { InMemoryVectorStore } from "@voicekb/vector-store/testing";
import { ValidationError } from "@voicekb/errors";
import { ingestDocument } from "./ingestion-pipeline.js";
import { removeDocument, searchKnowledgeBase, type KnowledgeBaseDependencies } from "./knowledge-base.js";

const body = Array.from({ length: 25 }, (_, i) => `w${String(i)}`).join(" ");

describe("knowledge base search and removal", () => {
  let vectors: InMemoryVectorStore;
  let deps: KnowledgeBaseDependencies;

  beforeEach(async () => {
    const provider = new FakeEmbeddingProvider();
    vectors = new InMemoryVectorStore();
    const writer = new VectorIndexWriter(vectors, { batchDelayMs: 0 });
    deps = { embeddingProvider: provider, writer };

    await ingestDocument(
      { text: body, fileId: "doc-1", filename: "menu.txt", tenantId: "tenant-1", namespaceId: "agent-1" },
      {
        chunker: new WordWindowChunker({ chunkSize: 10, chunkOverlap: 2, boundaryWindow: 3 }),
        batcher: new EmbeddingBatcher(provider, { batchDelayMs: 0 }),
        writer,
      },
    );
  });

  it("returns the top matches of the namespace with their metadata", async () => {
    const matches = await searchKnowledgeBase({ namespaceId: "agent-1", query: "opening hours", topK: 2 }, deps);

    expect(matches).toHaveLength(2);
    for (const match of matches) {
      expect(match.fileId).toBe("doc-1");
      expect(match.filename).toBe("menu.txt");
      expect(match.text).toBe(match.metadata["text"]);
      expect([0, 1, 2]).toContain(match.chunkIndex);
    }
  });

  it("never returns another namespace's chunks", async () => {
    expect(await searchKnowledgeBase({ namespaceId: "agent-2", query: "opening hours" }, deps)).toEqual([]);
  });

  it("rejects an empty query", async () => {
    await expect(
      searchKnowledgeBase({ namespaceId: "agent-1", query: "   " }, deps),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("removes every chunk of a document", async () => {
    expect(await removeDocument({ namespaceId: "agent-1", fileId: "doc-1" }, deps)).toBe(3);
    expect(vectors.count("agent-1")).toBe(0);
    expect(await removeDocument({ namespaceId: "agent-1", fileId: "doc-1" }, deps)).toBe(0);
  });
});
