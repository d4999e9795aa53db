export type { IChunker } from "./chunker.interface.js";
export { WordWindowChunker, DEFAULT_CHUNKING_CONFIG } from "./word-window-chunker.js";
export { cleanText } from "./text-cleaner.js";
