import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { TextExtractor } from "./text-extractor.js";
import { DoclingExtractor } from "./docling-extractor.js";
import { createExtractorRegistry, normalizeMimeType } from "./factory.js";

const FAKE_DOCLING = fileURLToPath(new URL("./__fixtures__/fake-docling.mjs", import.meta.url));

describe("TextExtractor", () => {
  const extractor = new TextExtractor();

  it("supports text MIME types", () => {
    expect(extractor.supportedMimeTypes).toContain("text/plain");
    expect(extractor.supportedMimeTypes).toContain("text/markdown");
    expect(extractor.supportedMimeTypes).toContain("text/csv");
    expect(extractor.supportedMimeTypes).toContain("text/html");
    expect(extractor.supportedMimeTypes).toContain("application/json");
  });

  it("extracts a plain text string", async () => {
    const result = await extractor.extract("  Hello world  ", "text/plain");

    expect(result).toEqual({
      success: true,
      text: "Hello world",
      wordCount: 2,
      metadata: { mimeType: "text/plain", charCount: 11 },
    });
  });

  it("decodes Uint8Array input", async () => {
    const input = new TextEncoder().encode("Encoded text");
    const result = await extractor.extract(input, "text/plain");

    expect(result.success && result.text).toBe("Encoded text");
  });

  it("reports bytes that are not UTF-8", async () => {
    const result = await extractor.extract(new Uint8Array([0xff, 0xfe, 0xfd]), "text/plain");

    expect(result.success).toBe(false);
  });

  it("strips HTML tags", async () => {
    const html = "<h1>Title</h1><p>Content with <b>bold</b> text</p>";
    const result = await extractor.extract(html, "text/html");

    expect(result.success && result.text).toBe("Title Content with bold text");
    expect(result.success && result.wordCount).toBe(5);
  });

  it("strips script and style tags from HTML", async () => {
    const html = '<script>alert("x")</script><style>body{color:red}</style><p>Safe&nbsp;content</p>';
    const result = await extractor.extract(html, "text/html");

    expect(result.success && result.text).toBe("Safe content");
  });
});

describe("DoclingExtractor", () => {
  it("supports document MIME types", () => {
    const extractor = new DoclingExtractor();
    expect(extractor.supportedMimeTypes).toContain("application/pdf");
    expect(extractor.supportedMimeTypes).toContain(
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    );
  });

  it("returns the text the bridge prints", async () => {
    const extractor = new DoclingExtractor({ pythonPath: process.execPath, scriptPath: FAKE_DOCLING });

    const result = await extractor.extract("Quarterly report body", "application/pdf");

    expect(result).toEqual({
      success: true,
      text: "Quarterly report body",
      wordCount: 3,
      metadata: { mimeType: "application/pdf", pageCount: 2 },
    });
  });

  it("reports a non-zero exit with stderr", async () => {
    const extractor = new DoclingExtractor({ pythonPath: process.execPath, scriptPath: FAKE_DOCLING });

    const result = await extractor.extract("FAIL", "application/pdf");

    expect(result).toEqual({ success: false, error: "Docling exited with code 3: corrupt document" });
  });

  it("reports malformed output", async () => {
    const extractor = new DoclingExtractor({ pythonPath: process.execPath, scriptPath: FAKE_DOCLING });

    const result = await extractor.extract("GARBAGE", "application/pdf");

    expect(result).toEqual({ success: false, error: "Docling returned malformed JSON" });
  });

  it("fails without throwing when the interpreter is missing", async () => {
    const extractor = new DoclingExtractor({
      pythonPath: "nonexistent-interpreter",
      scriptPath: "nonexistent-script.py",
    });

    const result = await extractor.extract("test", "application/pdf");

    expect(result.success).toBe(false);
    expect(result.success ? "" : result.error).toMatch(/Docling/);
  });
});

describe("ExtractorRegistry", () => {
  const registry = createExtractorRegistry();

  it("routes text types to the text extractor", () => {
    expect(registry.getExtractor("text/markdown")).toBeInstanceOf(TextExtractor);
    expect(registry.getExtractor("text/html; charset=utf-8")).toBeInstanceOf(TextExtractor);
  });

  it("routes office documents to Docling", () => {
    expect(registry.getExtractor("application/pdf")).toBeInstanceOf(DoclingExtractor);
  });

  it("falls back to text for unlisted text types", () => {
    expect(registry.getExtractor("text/x-log")).toBeInstanceOf(TextExtractor);
  });

  it("reports unsupported binary types", async () => {
    expect(registry.getExtractor("image/png")).toBeUndefined();
    await expect(registry.extract(new Uint8Array([1, 2]), "image/png")).resolves.toEqual({
      success: false,
      error: "Unsupported mime type: image/png",
    });
  });

  it("extracts through the routed extractor", async () => {
    const result = await registry.extract("<p>Hi there</p>", "TEXT/HTML");

    expect(result.success && result.text).toBe("Hi there");
  });

  it("normalizes mime parameters and case", () => {
    expect(normalizeMimeType("Text/Plain; charset=UTF-8")).toBe("text/plain");
  });
});
