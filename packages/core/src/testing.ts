import type { DocumentStatusUpdate, SourceDocument } from "@voicekb/types";
import type { DocumentRepository } from "./document-repository.js";

/** In-process document table; records every status write for assertions. */
export class InMemoryDocumentRepository implements DocumentRepository {
  readonly updates: Array<{ id: string; update: DocumentStatusUpdate }> = [];
  private documents = new Map<string, SourceDocument>();

  add(document: Partial<SourceDocument> & Pick<SourceDocument, "id">): this {
    this.documents.set(document.id, {
      tenantId: "tenant-1",
      filename: `${document.id}.txt`,
      mimeType: "text/plain",
      content: null,
      extractedText: null,
      ...document,
    });
    return this;
  }

  /** The last status written for a document. */
  lastUpdate(id: string): DocumentStatusUpdate | undefined {
    return this.updates.filter((u) => u.id === id).at(-1)?.update;
  }

  async findById(id: string): Promise<SourceDocument | null> {
    return this.documents.get(id) ?? null;
  }

  async updateStatus(id: string, update: DocumentStatusUpdate): Promise<void> {
    this.updates.push({ id, update });
  }
}
