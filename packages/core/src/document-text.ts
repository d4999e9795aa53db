import type { DocumentFailureReason, ExtractionResult, SourceDocument } from "@voicekb/types";
import type { ITextExtractor } from "@voicekb/parser";

export type SuccessfulExtraction = Extract<ExtractionResult, { success: true }>;

export type DocumentText =
  | { success: true; text: string; extraction: SuccessfulExtraction | null }
  | { success: false; reason: DocumentFailureReason; error: string };

/** Extract text from raw bytes, mapping an extractor failure to a document failure. */
export async function extractText(
  extractor: ITextExtractor,
  content: Uint8Array | string,
  mimeType: string,
): Promise<DocumentText> {
  const extraction = await extractor.extract(content, mimeType);
  if (!extraction.success) {
    return { success: false, reason: "extraction", error: extraction.error };
  }
  return { success: true, text: extraction.text, extraction };
}

/** Stored text wins; otherwise the raw upload is extracted now. */
export async function resolveDocumentText(
  extractor: ITextExtractor,
  document: SourceDocument,
): Promise<DocumentText> {
  if (document.extractedText !== null && document.extractedText.trim() !== "") {
    return { success: true, text: document.extractedText, extraction: null };
  }
  if (!document.content) {
    return {
      success: false,
      reason: "extraction",
      error: `Document ${document.filename} has neither extracted text nor content`,
    };
  }
  return extractText(extractor, document.content, document.mimeType);
}
