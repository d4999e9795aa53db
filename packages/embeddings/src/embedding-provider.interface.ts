import type { EmbeddingResult } from "@voicekb/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed document chunks; one vector per input, in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
