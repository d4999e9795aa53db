import type { ChunkSpan } from "@voicekb/types";

export interface IChunker {
  readonly strategy: string;
  chunk(text: string): string[];
  chunkWithSpans(text: string): ChunkSpan[];
}
