import type { EmbeddingResult } from "@voicekb/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

/**
 * Deterministic provider for tests. Each text maps to
 * `[wordCount, callNumber, positionInCall, 1, 0, ...]`.
 */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions: number;
  readonly calls: string[][] = [];
  private failures = new Map<number, unknown>();
  private shortCalls = new Set<number>();

  constructor(dimensions = 4) {
    this.dimensions = dimensions;
  }

  /** Make the n-th call (1-based) throw `error`. */
  failOnCall(callNumber: number, error: unknown): this {
    this.failures.set(callNumber, error);
    return this;
  }

  /** Make the n-th call return one vector fewer than asked for. */
  dropOneOnCall(callNumber: number): this {
    this.shortCalls.add(callNumber);
    return this;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push([...texts]);
    const callNumber = this.calls.length;

    if (this.failures.has(callNumber)) {
      throw this.failures.get(callNumber);
    }

    const count = this.shortCalls.has(callNumber) ? Math.max(0, texts.length - 1) : texts.length;
    const embeddings = texts.slice(0, count).map((text, i) => this.vectorFor(text, callNumber, i));
    const tokensUsed = texts.reduce((sum, t) => sum + t.split(/\s+/).filter(Boolean).length, 0);

    return { embeddings, model: "fake-embed", tokensUsed, dimensions: this.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private vectorFor(text: string, callNumber: number, position: number): number[] {
    const head = [text.split(/\s+/).filter(Boolean).length, callNumber, position, 1];
    return Array.from({ length: this.dimensions }, (_, i) => head[i] ?? 0);
  }
}
