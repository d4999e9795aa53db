/** The slice of a stored document the pipeline reads. */
export interface SourceDocument {
  id: string;
  tenantId: string;
  filename: string;
  mimeType: string;
  content: Uint8Array | null;
  extractedText: string | null;
}

export type DocumentStatusUpdate =
  | { status: "processing" }
  | { status: "completed"; wordCount: number; chunkCount: number }
  | { status: "failed"; error: string; wordCount?: number };
