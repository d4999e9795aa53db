import { spawn } from "node:child_process";
import { z } from "zod";
import type { ExtractionResult } from "@voicekb/types";
import type { ITextExtractor } from "./extractor.interface.js";
import { countWords } from "./text-extractor.js";

const DOCLING_MIME_TYPES = [
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
] as const;

const doclingOutputSchema = z.object({
  text: z.string(),
  page_count: z.number().int().nonnegative().default(0),
  metadata: z.record(z.unknown()).default({}),
});

export interface DoclingExtractorOptions {
  pythonPath?: string;
  scriptPath?: string;
  /** Kill the child process after this long. Default: 120000 */
  timeoutMs?: number;
}

/**
 * Bridge to Docling for PDF/DOCX/PPTX/XLSX extraction.
 * Streams the document to a Python child process on stdin and reads JSON
 * `{ text, page_count, metadata }` back from stdout.
 */
export class DoclingExtractor implements ITextExtractor {
  readonly supportedMimeTypes: readonly string[] = DOCLING_MIME_TYPES;
  private readonly pythonPath: string;
  private readonly scriptPath: string;
  private readonly timeoutMs: number;

  constructor(options: DoclingExtractorOptions = {}) {
    this.pythonPath = options.pythonPath ?? "python3";
    this.scriptPath = options.scriptPath ?? "scripts/docling-parse.py";
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  extract(input: Uint8Array | string, mimeType: string): Promise<ExtractionResult> {
    const inputBuffer = typeof input === "string" ? Buffer.from(input) : Buffer.from(input);

    return new Promise((resolve) => {
      const child = spawn(this.pythonPath, [this.scriptPath, "--mime-type", mimeType], {
        timeout: this.timeoutMs,
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      const finish = (result: ExtractionResult): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (code !== 0) {
          finish({
            success: false,
            error: `Docling exited with code ${String(code)}: ${stderr.trim()}`,
          });
          return;
        }
        finish(this.parseOutput(stdout, mimeType));
      });

      child.on("error", (err) => {
        finish({ success: false, error: `Failed to spawn Docling process: ${err.message}` });
      });

      // EPIPE when the process died before reading; the close/error handlers report it.
      child.stdin.on("error", () => undefined);
      child.stdin.end(inputBuffer);
    });
  }

  private parseOutput(stdout: string, mimeType: string): ExtractionResult {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      return { success: false, error: "Docling returned malformed JSON" };
    }

    const parsed = doclingOutputSchema.safeParse(raw);
    if (!parsed.success) {
      return { success: false, error: `Unexpected Docling output: ${parsed.error.message}` };
    }

    const text = parsed.data.text.trim();
    return {
      success: true,
      text,
      wordCount: countWords(text),
      metadata: { ...parsed.data.metadata, mimeType, pageCount: parsed.data.page_count },
    };
  }
}
