export type ProgressStatus = "pending" | "in_progress" | "completed" | "failed";

export type ProgressStage =
  | "queued"
  | "file_processing"
  | "text_extraction"
  | "embedding"
  | "vector_storage"
  | "complete"
  | "failed";

export const ACTIVE_PROGRESS_STATUSES: readonly ProgressStatus[] = ["pending", "in_progress"];

export interface ProgressRecord {
  id: string;
  tenantId: string;
  namespaceId: string;
  stage: ProgressStage;
  status: ProgressStatus;
  taskId: string | null;
  queuePosition: number | null;

  currentFile: string | null;
  currentFileIndex: number;
  totalFiles: number;

  currentBatch: number;
  totalBatches: number;
  currentChunk: number;
  totalChunks: number;

  processedFiles: number;
  failedFiles: number;
  progressPercentage: number;

  /** UI-facing details: last file, partial failures, batch labels. */
  details: Record<string, unknown>;
  /** Processing statistics merged in on terminal transitions. */
  metadata: Record<string, unknown>;
  errorMessage: string | null;

  startedAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

/** Fields a caller may merge into the active record. */
export type ProgressUpdate = Partial<
  Pick<
    ProgressRecord,
    | "stage"
    | "status"
    | "queuePosition"
    | "currentFile"
    | "currentFileIndex"
    | "totalFiles"
    | "currentBatch"
    | "totalBatches"
    | "currentChunk"
    | "totalChunks"
    | "processedFiles"
    | "failedFiles"
    | "progressPercentage"
    | "details"
  >
>;
