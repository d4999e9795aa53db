import type { ExtractionResult } from "@voicekb/types";
import type { ITextExtractor } from "./extractor.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
] as const;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Plain text, markdown and HTML extractor.
 * Decodes UTF-8 and strips markup; no external dependencies.
 */
export class TextExtractor implements ITextExtractor {
  readonly supportedMimeTypes: readonly string[] = TEXT_MIME_TYPES;

  async extract(input: Uint8Array | string, mimeType: string): Promise<ExtractionResult> {
    let text: string;
    try {
      text = typeof input === "string" ? input : new TextDecoder("utf-8", { fatal: true }).decode(input);
    } catch (err) {
      return {
        success: false,
        error: `Could not decode ${mimeType} content as UTF-8: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    const cleanedText = mimeType === "text/html" ? this.stripHtml(text) : text.trim();

    return {
      success: true,
      text: cleanedText,
      wordCount: countWords(cleanedText),
      metadata: {
        mimeType,
        charCount: cleanedText.length,
      },
    };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/&nbsp;/g, " ")
      .replace(/&amp;/g, "&")
      .replace(/\s+/g, " ")
      .trim();
  }
}
