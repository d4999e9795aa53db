import type { IngestionJob, JobPayload, ProgressRecord } from "@voicekb/types";
import type { JobQueue } from "@voicekb/queue";
import type { ProgressTracker } from "@voicekb/progress";
import type { Logger } from "@voicekb/logger";
import { ConflictError, NotFoundError } from "@voicekb/errors";

export interface ScheduleInput {
  tenantId: string;
  namespaceId: string;
  payload: JobPayload;
  priority?: number;
}

export interface ScheduledIngestion {
  job: IngestionJob;
  progress: ProgressRecord;
}

function documentCount(payload: JobPayload): number {
  switch (payload.kind) {
    case "file_processing":
      return payload.documentIds.length;
    case "knowledge_base_processing":
      return payload.sources.length;
  }
}

/**
 * Entry point for callers that want ingestion done in the background:
 * enqueues the job and opens the tenant's progress record in the `queued`
 * stage. A tenant has at most one active job at a time.
 */
export class IngestionScheduler {
  private queue: JobQueue;
  private tracker: ProgressTracker;
  private logger?: Logger;

  constructor(queue: JobQueue, tracker: ProgressTracker, logger?: Logger) {
    this.queue = queue;
    this.tracker = tracker;
    this.logger = logger;
  }

  async schedule(input: ScheduleInput): Promise<ScheduledIngestion> {
    const active = await this.queue.getActiveJobForTenant(input.tenantId);
    if (active) {
      throw new ConflictError(
        `Tenant ${input.tenantId} already has an active ingestion job`,
        { jobId: active.id, details: { status: active.status } },
      );
    }

    const job = await this.queue.enqueue(input);

    let progress: ProgressRecord;
    try {
      progress = await this.tracker.create({
        tenantId: input.tenantId,
        namespaceId: input.namespaceId,
        totalFiles: documentCount(input.payload),
        taskId: job.id,
        queuePosition: job.queuePosition,
        stage: "queued",
      });
    } catch (err) {
      await this.queue.cancel(job.id);
      throw err;
    }

    this.logger?.info(
      { jobId: job.id, tenantId: job.tenantId, queuePosition: job.queuePosition },
      "Ingestion scheduled",
    );
    return { job, progress };
  }

  /** Cancel a job that has not started yet, and drop the progress record it opened. */
  async cancel(jobId: string): Promise<boolean> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      throw new NotFoundError(`Ingestion job ${jobId} not found`, { jobId });
    }

    const cancelled = await this.queue.cancel(jobId);
    if (cancelled) {
      const record = await this.tracker.get(job.tenantId);
      if (record?.taskId === jobId) {
        await this.tracker.delete(job.tenantId);
      }
    }
    return cancelled;
  }
}
