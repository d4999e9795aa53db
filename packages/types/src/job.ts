export const JOB_KINDS = ["file_processing", "knowledge_base_processing"] as const;

export type JobKind = (typeof JOB_KINDS)[number];

export const JOB_STATUSES = ["queued", "processing", "completed", "failed", "cancelled"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface FileProcessingPayload {
  kind: "file_processing";
  /** Documents to ingest, processed in this order. */
  documentIds: string[];
}

export interface KnowledgeSource {
  documentId: string;
  title: string;
  text: string;
}

export interface KnowledgeBaseProcessingPayload {
  kind: "knowledge_base_processing";
  /** Pre-extracted content (scraped pages, transcripts). */
  sources: KnowledgeSource[];
}

export type JobPayload = FileProcessingPayload | KnowledgeBaseProcessingPayload;

export type PayloadOf<K extends JobKind> = Extract<JobPayload, { kind: K }>;

/**
 * A persisted unit of ingestion work. `payload` is stored as JSON and is
 * only trusted after it has been parsed against the closed set of job kinds.
 */
export interface IngestionJob<TPayload = unknown> {
  id: string;
  tenantId: string;
  namespaceId: string;
  taskType: string;
  status: JobStatus;
  priority: number;
  queuePosition: number | null;
  payload: TPayload;
  retryCount: number;
  maxRetries: number;
  errorMessage: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  updatedAt: Date;
}

export interface NewIngestionJob {
  id: string;
  tenantId: string;
  namespaceId: string;
  taskType: JobKind;
  priority: number;
  payload: JobPayload;
  maxRetries: number;
  createdAt: Date;
}

export type QueueStatusCounts = Record<JobStatus, number> & { active: number };
