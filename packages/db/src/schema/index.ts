export * from "./ingestion-jobs.js";
export * from "./ingestion-progress.js";
export * from "./documents.js";
