import type { ExtractionResult } from "@voicekb/types";
import type { ITextExtractor } from "./extractor.interface.js";
import { TextExtractor } from "./text-extractor.js";
import { DoclingExtractor, type DoclingExtractorOptions } from "./docling-extractor.js";

/**
 * Routes a document to the extractor that claims its mime type.
 * Unlisted `text/*` types fall back to the text extractor; anything else
 * is reported as unsupported.
 */
export class ExtractorRegistry implements ITextExtractor {
  private readonly extractors: readonly ITextExtractor[];
  private readonly fallback: ITextExtractor;

  constructor(extractors: readonly ITextExtractor[], fallback: ITextExtractor) {
    this.extractors = extractors;
    this.fallback = fallback;
  }

  get supportedMimeTypes(): readonly string[] {
    return this.extractors.flatMap((e) => e.supportedMimeTypes);
  }

  getExtractor(mimeType: string): ITextExtractor | undefined {
    const normalized = normalizeMimeType(mimeType);
    const match = this.extractors.find((e) => e.supportedMimeTypes.includes(normalized));
    if (match) return match;
    return normalized.startsWith("text/") ? this.fallback : undefined;
  }

  async extract(input: Uint8Array | string, mimeType: string): Promise<ExtractionResult> {
    const extractor = this.getExtractor(mimeType);
    if (!extractor) {
      return { success: false, error: `Unsupported mime type: ${mimeType}` };
    }
    return extractor.extract(input, normalizeMimeType(mimeType));
  }
}

/** `Text/HTML; charset=utf-8` → `text/html` */
export function normalizeMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}

export function createExtractorRegistry(docling?: DoclingExtractorOptions): ExtractorRegistry {
  const text = new TextExtractor();
  return new ExtractorRegistry([text, new DoclingExtractor(docling)], text);
}
