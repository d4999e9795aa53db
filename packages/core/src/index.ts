export { ingestDocument } from "./ingestion-pipeline.js";
export type {
  IngestInput,
  IngestionDependencies,
  IngestionReporter,
  StageInfo,
} from "./ingestion-pipeline.js";

export { IngestionJobProcessor } from "./ingestion-job-processor.js";
export type { JobProcessorDependencies } from "./ingestion-job-processor.js";

export { IngestionScheduler } from "./ingestion-scheduler.js";
export type { ScheduleInput, ScheduledIngestion } from "./ingestion-scheduler.js";

export { ingestUpload } from "./upload-ingestion.js";
export type { UploadInput, UploadDependencies, UploadOutcome } from "./upload-ingestion.js";

export { searchKnowledgeBase, removeDocument } from "./knowledge-base.js";
export type { KnowledgeBaseDependencies, SearchRequest } from "./knowledge-base.js";

export type { DocumentRepository } from "./document-repository.js";
export { DrizzleDocumentRepository } from "./document-repository.js";
export { resolveDocumentText, extractText } from "./document-text.js";
export type { DocumentText, SuccessfulExtraction } from "./document-text.js";
