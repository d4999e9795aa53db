export * from "./job.js";
export * from "./progress.js";
export * from "./chunk.js";
export * from "./document.js";
export * from "./pipeline.js";
export * from "./config.js";
