import { describe, it, expect, beforeEach } from "vitest";
import { WordWindowChunker } from "@voicekb/chunker";
import { EmbeddingBatcher } from "@voicekb/embeddings";
import { FakeEmbeddingProvider } from "@voicekb/embeddings/testing";
import { VectorIndexWriter } from "@voicekb/vector-store";
import { InMemoryVectorStore } from "@voicekb/vector-store/testing";
import { ExtractorRegistry, TextExtractor } from "@voicekb/parser";
import { ingestDocument } from "./ingestion-pipeline.js";
import { ingestUpload, type UploadDependencies } from "./upload-ingestion.js";

const body = Array.from({ length: 25 }, (_, i) => `w${String(i)}`).join(" ");

describe("ingestUpload", () => {
  let vectors: InMemoryVectorStore;
  let deps: UploadDependencies;

  beforeEach(() => {
    const text = new TextExtractor();
    vectors = new InMemoryVectorStore();
    deps = {
      chunker: new WordWindowChunker({ chunkSize: 10, chunkOverlap: 2, boundaryWindow: 3 }),
      batcher: new EmbeddingBatcher(new FakeEmbeddingProvider(), { batchSize: 2, batchDelayMs: 0 }),
      writer: new VectorIndexWriter(vectors, { batchDelayMs: 0 }),
      extractor: new ExtractorRegistry([text], text),
    };
  });

  const upload = {
    mimeType: "text/plain",
    filename: "faq.txt",
    fileId: "faq",
    tenantId: "tenant-1",
    namespaceId: "agent-1",
  };

  it("extracts and indexes an upload", async () => {
    const outcome = await ingestUpload({ ...upload, content: new TextEncoder().encode(body) }, deps);

    expect(outcome).toMatchObject({
      success: true,
      chunksStored: 3,
      wordCount: 25,
      extraction: { success: true, wordCount: 25, metadata: { mimeType: "text/plain" } },
    });
    expect(vectors.count("agent-1")).toBe(3);
  });

  it("produces the same outcome as ingesting the extracted text directly", async () => {
    const { extraction, ...viaUpload } = await ingestUpload({ ...upload, content: body }, deps);
    const direct = await ingestDocument(
      { text: body, fileId: "faq", filename: "faq.txt", tenantId: "tenant-1", namespaceId: "agent-1" },
      deps,
    );

    expect(extraction).not.toBeNull();
    expect(viaUpload).toEqual(direct);
  });

  it("reports unsupported formats as extraction failures", async () => {
    const outcome = await ingestUpload(
      { ...upload, content: new Uint8Array([1, 2, 3]), mimeType: "application/pdf" },
      deps,
    );

    expect(outcome).toEqual({
      success: false,
      stage: "extraction",
      fileId: "faq",
      namespaceId: "agent-1",
      reason: "extraction",
      error: "Unsupported mime type: application/pdf",
      retryable: false,
      chunksStored: 0,
      wordCount: 0,
      extraction: null,
    });
    expect(vectors.count("agent-1")).toBe(0);
  });
});
