export type { ITextExtractor } from "./extractor.interface.js";
export { TextExtractor, countWords } from "./text-extractor.js";
export { DoclingExtractor } from "./docling-extractor.js";
export type { DoclingExtractorOptions } from "./docling-extractor.js";
export { ExtractorRegistry, createExtractorRegistry, normalizeMimeType } from "./factory.js";
