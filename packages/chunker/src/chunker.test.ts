import { describe, it, expect } from "vitest";
import { WordWindowChunker } from "./word-window-chunker.js";
import { cleanText } from "./text-cleaner.js";

function words(count: number, prefix = "w"): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${String(i)}`).join(" ");
}

describe("WordWindowChunker", () => {
  it("has strategy 'word-window'", () => {
    expect(new WordWindowChunker().strategy).toBe("word-window");
  });

  it("returns nothing for blank text", () => {
    const chunker = new WordWindowChunker();
    expect(chunker.chunk("")).toEqual([]);
    expect(chunker.chunk("   \n\t ")).toEqual([]);
  });

  it("returns a single chunk when the text fits", () => {
    const chunker = new WordWindowChunker({ chunkSize: 5, chunkOverlap: 1 });

    expect(chunker.chunkWithSpans("alpha  beta\ngamma")).toEqual([
      { text: "alpha beta gamma", startWord: 0, endWord: 3 },
    ]);
  });

  it("pulls windows back to sentence ends when the next window still advances", () => {
    const chunker = new WordWindowChunker({ chunkSize: 5, chunkOverlap: 1 });
    const text = "One two three. Four five six seven. Eight nine ten eleven twelve";

    expect(chunker.chunkWithSpans(text)).toEqual([
      { text: "One two three.", startWord: 0, endWord: 3 },
      { text: "three. Four five six seven.", startWord: 2, endWord: 7 },
      { text: "seven. Eight nine ten eleven", startWord: 6, endWord: 11 },
      { text: "eleven twelve", startWord: 10, endWord: 12 },
    ]);
  });

  it("treats closing quotes and brackets after punctuation as a sentence end", () => {
    const chunker = new WordWindowChunker({ chunkSize: 4, chunkOverlap: 0 });

    expect(chunker.chunk('He said "stop." then left the room')).toEqual([
      'He said "stop."',
      "then left the room",
    ]);
  });

  it("returns exactly one chunk for text of exactly chunkSize words", () => {
    const chunker = new WordWindowChunker({ chunkSize: 400, chunkOverlap: 50 });
    const text = words(400);

    expect(chunker.chunk(text)).toEqual([text]);
  });

  it("treats line breaks as boundaries", () => {
    const chunker = new WordWindowChunker({ chunkSize: 4, chunkOverlap: 0 });

    expect(chunker.chunk("Opening hours\nMonday to Friday nine to five")).toEqual([
      "Opening hours",
      "Monday to Friday nine",
      "to five",
    ]);
  });

  it("ignores sentence ends outside the boundary window", () => {
    const chunker = new WordWindowChunker({ chunkSize: 5, chunkOverlap: 0, boundaryWindow: 2 });

    expect(chunker.chunk("Alpha. b c d e f g")).toEqual(["Alpha. b c d e", "f g"]);
  });

  it("uses plain windows when there is no punctuation", () => {
    const chunker = new WordWindowChunker({ chunkSize: 400, chunkOverlap: 50 });

    const spans = chunker.chunkWithSpans(words(1000));

    expect(spans.map((s) => [s.startWord, s.endWord])).toEqual([
      [0, 400],
      [350, 750],
      [700, 1000],
    ]);
    expect(spans[1]?.text.split(" ")[0]).toBe("w350");
  });

  it("covers every word and always moves forward", () => {
    const chunker = new WordWindowChunker({ chunkSize: 7, chunkOverlap: 3 });
    const text = "A b. c d! e f g? h i j. k l m n o. p q r s t u v w x y z.";
    const total = text.split(" ").length;

    const spans = chunker.chunkWithSpans(text);

    expect(spans[0]?.startWord).toBe(0);
    expect(spans[spans.length - 1]?.endWord).toBe(total);
    for (let i = 1; i < spans.length; i++) {
      const prev = spans[i - 1];
      const curr = spans[i];
      if (!prev || !curr) throw new Error("missing span");
      expect(curr.startWord).toBeGreaterThan(prev.startWord);
      expect(curr.startWord).toBeLessThanOrEqual(prev.endWord);
      expect(curr.endWord - curr.startWord).toBeLessThanOrEqual(7);
    }
  });

  it("rebuilds the word sequence from the non-overlapping part of each chunk", () => {
    const chunker = new WordWindowChunker({ chunkSize: 9, chunkOverlap: 4 });
    const text = "We open at nine. Parking is free! Ask for Sam? Deliveries arrive daily. " + words(23);
    const original = text.split(" ");

    const spans = chunker.chunkWithSpans(text);

    const rebuilt: string[] = [];
    let covered = 0;
    for (const span of spans) {
      rebuilt.push(...span.text.split(" ").slice(covered - span.startWord));
      covered = span.endWord;
    }
    expect(rebuilt).toEqual(original);
  });

  it("rejects invalid settings", () => {
    expect(() => new WordWindowChunker({ chunkSize: 0 })).toThrow("chunkSize must be a positive integer");
    expect(() => new WordWindowChunker({ chunkSize: 10, chunkOverlap: 10 })).toThrow(
      "chunkOverlap must be in [0, chunkSize)",
    );
    expect(() => new WordWindowChunker({ boundaryWindow: -1 })).toThrow("boundaryWindow");
  });
});

describe("cleanText", () => {
  it("normalizes punctuation runs, symbols and whitespace", () => {
    expect(cleanText("Hello,   world!!!  Visit\u0000 us...... now???")).toBe(
      "Hello, world! Visit us... now!",
    );
  });

  it("keeps letters from any script", () => {
    expect(cleanText("Café déjà vu, naïve façade")).toBe("Café déjà vu, naïve façade");
  });

  it("replaces symbols and emoji with spaces", () => {
    expect(cleanText("Great 👍 job: x + y = z")).toBe("Great job: x y z");
  });

  it("collapses mixed question and exclamation runs", () => {
    expect(cleanText("Wait?! Really")).toBe("Wait! Really");
  });

  it("keeps brackets, quotes and paths", () => {
    expect(cleanText('See [1] (p. 4) "quoted" C:\\docs/a-b')).toBe('See [1] (p. 4) "quoted" C:\\docs/a-b');
  });
});
