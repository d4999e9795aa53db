import type { IngestionJob, JobStatus, NewIngestionJob } from "@voicekb/types";

/** Columns a state transition may change. */
export type JobPatch = Partial<
  Pick<IngestionJob, "status" | "retryCount" | "errorMessage" | "startedAt" | "completedAt">
>;

export interface TransitionResult {
  job: IngestionJob;
  /** False when the mutator declined (e.g. the job was in the wrong state). */
  applied: boolean;
}

/**
 * Persistence for ingestion jobs.
 *
 * Every write (insert or applied transition) recomputes `queuePosition` for
 * the whole queued set in the same transaction: queued jobs are ranked
 * 1..n by priority (desc) then creation time (asc), everything else is null.
 */
export interface JobStore {
  insert(job: NewIngestionJob): Promise<IngestionJob>;
  findById(id: string): Promise<IngestionJob | null>;
  /** Highest-ranked queued job, without changing it. */
  findNextQueued(): Promise<IngestionJob | null>;
  /** Oldest queued or processing job for the tenant. */
  findActiveByTenant(tenantId: string): Promise<IngestionJob | null>;
  /** Queued jobs in rank order. */
  listQueued(): Promise<IngestionJob[]>;
  countByStatus(): Promise<Record<JobStatus, number>>;
  /**
   * Read the job under a row lock, let `mutate` decide the patch, write it.
   * Returns null when the job does not exist.
   */
  transition(
    id: string,
    mutate: (job: IngestionJob) => JobPatch | null,
  ): Promise<TransitionResult | null>;
}

export function emptyStatusCounts(): Record<JobStatus, number> {
  return { queued: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
}
