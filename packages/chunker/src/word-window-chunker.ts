import type { ChunkingConfig, ChunkSpan } from "@voicekb/types";
import type { IChunker } from "./chunker.interface.js";

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 400,
  chunkOverlap: 50,
  boundaryWindow: 50,
};

/** Sentence-final punctuation, optionally followed by closing quotes or brackets. */
const SENTENCE_END = /[.!?]["')\]]*$/;

/**
 * Fixed-size word windows with overlap.
 *
 * Each window holds up to `chunkSize` words and the next one starts
 * `chunkOverlap` words before the previous end. A non-final window is pulled
 * back to the last sentence end within its trailing `boundaryWindow` words,
 * as long as the following window still moves forward. A word followed by
 * a line break also counts as a sentence end.
 */
export class WordWindowChunker implements IChunker {
  readonly strategy = "word-window";
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    const merged = { ...DEFAULT_CHUNKING_CONFIG, ...config };

    if (!Number.isInteger(merged.chunkSize) || merged.chunkSize < 1) {
      throw new Error(`chunkSize must be a positive integer, got ${String(merged.chunkSize)}`);
    }
    if (
      !Number.isInteger(merged.chunkOverlap) ||
      merged.chunkOverlap < 0 ||
      merged.chunkOverlap >= merged.chunkSize
    ) {
      throw new Error(
        `chunkOverlap must be in [0, chunkSize), got ${String(merged.chunkOverlap)} for chunkSize ${String(merged.chunkSize)}`,
      );
    }
    if (!Number.isInteger(merged.boundaryWindow) || merged.boundaryWindow < 0) {
      throw new Error(`boundaryWindow must be a non-negative integer, got ${String(merged.boundaryWindow)}`);
    }

    this.config = merged;
  }

  chunk(text: string): string[] {
    return this.chunkWithSpans(text).map((span) => span.text);
  }

  chunkWithSpans(text: string): ChunkSpan[] {
    const { words, lineEnds } = tokenize(text);
    const total = words.length;
    if (total === 0) return [];

    const { chunkSize, chunkOverlap } = this.config;
    if (total <= chunkSize) {
      return [{ text: words.join(" "), startWord: 0, endWord: total }];
    }

    const spans: ChunkSpan[] = [];
    const maxIterations = 2 * total;
    let start = 0;

    for (let iteration = 0; start < total && iteration < maxIterations; iteration++) {
      let end = Math.min(start + chunkSize, total);

      if (end < total) {
        const boundary = this.findSentenceEnd(words, lineEnds, start, end);
        if (boundary !== null && boundary - chunkOverlap > start) {
          end = boundary;
        }
      }

      spans.push({ text: words.slice(start, end).join(" "), startWord: start, endWord: end });

      if (end >= total) break;

      const next = end - chunkOverlap;
      start = next > start ? next : start + 1;
    }

    return spans;
  }

  /** Word index one past the last sentence-ending word in the window's tail, if any. */
  private findSentenceEnd(
    words: readonly string[],
    lineEnds: ReadonlySet<number>,
    start: number,
    end: number,
  ): number | null {
    const lookback = Math.min(this.config.boundaryWindow, end - start);
    for (let i = end - 1; i >= end - lookback; i--) {
      const word = words[i];
      if (word !== undefined && (SENTENCE_END.test(word) || lineEnds.has(i))) {
        return i + 1;
      }
    }
    return null;
  }
}

/** Split on whitespace, remembering which words are followed by a line break. */
function tokenize(text: string): { words: string[]; lineEnds: Set<number> } {
  const words: string[] = [];
  const lineEnds = new Set<number>();

  for (const match of text.matchAll(/(\S+)(\s*)/g)) {
    const [, word, gap] = match;
    if (word === undefined) continue;
    if (gap?.includes("\n")) lineEnds.add(words.length);
    words.push(word);
  }

  return { words, lineEnds };
}
