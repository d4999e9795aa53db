import { eq } from "drizzle-orm";
import { documents, type DbClient } from "@voicekb/db";
import type { DocumentStatusUpdate, SourceDocument } from "@voicekb/types";

/**
 * The pipeline's view of stored documents: read the text to index, write
 * back the processing result. Document lifecycle lives elsewhere.
 */
export interface DocumentRepository {
  findById(id: string): Promise<SourceDocument | null>;
  updateStatus(id: string, update: DocumentStatusUpdate): Promise<void>;
}

export class DrizzleDocumentRepository implements DocumentRepository {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async findById(id: string): Promise<SourceDocument | null> {
    const [row] = await this.db
      .select({
        id: documents.id,
        tenantId: documents.tenantId,
        filename: documents.filename,
        mimeType: documents.mimeType,
        content: documents.content,
        extractedText: documents.extractedText,
      })
      .from(documents)
      .where(eq(documents.id, id));
    return row ?? null;
  }

  async updateStatus(id: string, update: DocumentStatusUpdate): Promise<void> {
    const updatedAt = new Date();
    switch (update.status) {
      case "processing":
        await this.db
          .update(documents)
          .set({ processingStatus: "processing", processingError: null, updatedAt })
          .where(eq(documents.id, id));
        return;
      case "completed":
        await this.db
          .update(documents)
          .set({
            processingStatus: "completed",
            wordCount: update.wordCount,
            chunkCount: update.chunkCount,
            processingError: null,
            updatedAt,
          })
          .where(eq(documents.id, id));
        return;
      case "failed":
        await this.db
          .update(documents)
          .set({
            processingStatus: "failed",
            processingError: update.error,
            ...(update.wordCount !== undefined ? { wordCount: update.wordCount } : {}),
            updatedAt,
          })
          .where(eq(documents.id, id));
        return;
    }
  }
}
