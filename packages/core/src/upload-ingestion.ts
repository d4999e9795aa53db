import type { IngestOutcome } from "@voicekb/types";
import type { ITextExtractor } from "@voicekb/parser";
import { ingestDocument, type IngestionDependencies } from "./ingestion-pipeline.js";
import { extractText, type SuccessfulExtraction } from "./document-text.js";

export interface UploadInput {
  content: Uint8Array | string;
  mimeType: string;
  filename: string;
  fileId: string;
  tenantId: string;
  namespaceId: string;
}

export interface UploadDependencies extends IngestionDependencies {
  extractor: ITextExtractor;
}

export type UploadOutcome = IngestOutcome & {
  /** Present once extraction succeeded. */
  extraction: SuccessfulExtraction | null;
};

/**
 * Extract and index a single upload right away, outside the queue and
 * without progress tracking. Produces the same outcome the queued path
 * produces for the same document.
 */
export async function ingestUpload(
  input: UploadInput,
  deps: UploadDependencies,
): Promise<UploadOutcome> {
  const text = await extractText(deps.extractor, input.content, input.mimeType);
  if (!text.success) {
    deps.logger?.warn(
      { fileId: input.fileId, filename: input.filename, error: text.error },
      "Upload extraction failed",
    );
    return {
      success: false,
      stage: "extraction",
      fileId: input.fileId,
      namespaceId: input.namespaceId,
      reason: text.reason,
      error: text.error,
      retryable: false,
      chunksStored: 0,
      wordCount: 0,
      extraction: null,
    };
  }

  const outcome = await ingestDocument(
    {
      text: text.text,
      fileId: input.fileId,
      filename: input.filename,
      tenantId: input.tenantId,
      namespaceId: input.namespaceId,
    },
    deps,
  );
  return { ...outcome, extraction: text.extraction };
}
