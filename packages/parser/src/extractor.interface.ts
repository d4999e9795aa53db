import type { ExtractionResult } from "@voicekb/types";

/**
 * Turns raw document bytes into plain text.
 * Implementations report failure through the result, never by throwing.
 */
export interface ITextExtractor {
  readonly supportedMimeTypes: readonly string[];
  extract(input: Uint8Array | string, mimeType: string): Promise<ExtractionResult>;
}
