import { randomUUID } from "node:crypto";
import type { IngestionJob, JobPayload, QueueStatusCounts } from "@voicekb/types";
import { ConflictError, NotFoundError } from "@voicekb/errors";
import type { Logger } from "@voicekb/logger";
import type { JobPatch, JobStore } from "./job-store.js";
import { validateJobPayload } from "./payloads.js";

export interface EnqueueInput {
  tenantId: string;
  namespaceId: string;
  payload: JobPayload;
  /** Higher runs first. Default: 0 */
  priority?: number;
  maxRetries?: number;
}

export interface MarkFailedOptions {
  /** Skip remaining retries and go straight to `failed`. */
  terminal?: boolean;
}

export interface JobQueueOptions {
  defaultMaxRetries?: number;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

/**
 * Priority queue of ingestion jobs with FIFO order inside a priority.
 *
 * queued → processing → completed | failed | queued (retry)
 * queued → cancelled
 *
 * A retried job keeps its original priority and creation time, so it goes
 * back to the rank it would have had, ahead of anything enqueued after it.
 */
export class JobQueue {
  private store: JobStore;
  private defaultMaxRetries: number;
  private logger?: Logger;
  private now: () => Date;
  private idFactory: () => string;

  constructor(store: JobStore, options: JobQueueOptions = {}) {
    this.store = store;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async enqueue(input: EnqueueInput): Promise<IngestionJob> {
    const payload = validateJobPayload(input.payload);

    const job = await this.store.insert({
      id: this.idFactory(),
      tenantId: input.tenantId,
      namespaceId: input.namespaceId,
      taskType: payload.kind,
      priority: input.priority ?? 0,
      payload,
      maxRetries: input.maxRetries ?? this.defaultMaxRetries,
      createdAt: this.now(),
    });

    this.logger?.info(
      { jobId: job.id, tenantId: job.tenantId, taskType: job.taskType, queuePosition: job.queuePosition },
      "Job enqueued",
    );
    return job;
  }

  /** Next job to run. Read-only: the caller must still call {@link markProcessing}. */
  async dequeueNext(): Promise<IngestionJob | null> {
    return this.store.findNextQueued();
  }

  async markProcessing(jobId: string): Promise<IngestionJob> {
    return this.apply(jobId, "mark processing", (job) =>
      job.status === "queued" ? { status: "processing", startedAt: this.now() } : null,
    );
  }

  async markCompleted(jobId: string): Promise<IngestionJob> {
    return this.apply(jobId, "mark completed", (job) =>
      job.status === "processing"
        ? { status: "completed", completedAt: this.now(), errorMessage: null }
        : null,
    );
  }

  /**
   * Record a failed attempt. The job returns to the queue until
   * `retryCount` reaches `maxRetries`, then it is failed for good.
   */
  async markFailed(
    jobId: string,
    errorMessage: string,
    options: MarkFailedOptions = {},
  ): Promise<IngestionJob> {
    const job = await this.apply(jobId, "mark failed", (current) => {
      if (current.status !== "processing") return null;

      const retryCount = current.retryCount + 1;
      const exhausted = options.terminal === true || retryCount >= current.maxRetries;
      const patch: JobPatch = exhausted
        ? { status: "failed", retryCount, errorMessage, completedAt: this.now() }
        : { status: "queued", retryCount, errorMessage, startedAt: null };
      return patch;
    });

    if (job.status === "failed") {
      this.logger?.error(
        { jobId, retryCount: job.retryCount, maxRetries: job.maxRetries, error: errorMessage },
        "Job failed permanently",
      );
    } else {
      this.logger?.warn(
        { jobId, retryCount: job.retryCount, maxRetries: job.maxRetries, queuePosition: job.queuePosition },
        "Job failed; re-queued for retry",
      );
    }
    return job;
  }

  /** Cancel a queued job. Returns false when the job is no longer queued. */
  async cancel(jobId: string): Promise<boolean> {
    const result = await this.store.transition(jobId, (job) =>
      job.status === "queued" ? { status: "cancelled", completedAt: this.now() } : null,
    );
    if (!result) {
      throw new NotFoundError(`Ingestion job ${jobId} not found`, { jobId });
    }
    if (result.applied) {
      this.logger?.info({ jobId }, "Job cancelled");
    }
    return result.applied;
  }

  async getJob(jobId: string): Promise<IngestionJob | null> {
    return this.store.findById(jobId);
  }

  async getActiveJobForTenant(tenantId: string): Promise<IngestionJob | null> {
    return this.store.findActiveByTenant(tenantId);
  }

  async listQueued(): Promise<IngestionJob[]> {
    return this.store.listQueued();
  }

  /** Current rank of a job, or null when it is not queued (or unknown). */
  async getQueuePosition(jobId: string): Promise<number | null> {
    const job = await this.store.findById(jobId);
    return job?.status === "queued" ? job.queuePosition : null;
  }

  async getQueueStatus(): Promise<QueueStatusCounts> {
    const counts = await this.store.countByStatus();
    return { ...counts, active: counts.queued + counts.processing };
  }

  private async apply(
    jobId: string,
    action: string,
    mutate: (job: IngestionJob) => JobPatch | null,
  ): Promise<IngestionJob> {
    const result = await this.store.transition(jobId, mutate);
    if (!result) {
      throw new NotFoundError(`Ingestion job ${jobId} not found`, { jobId });
    }
    if (!result.applied) {
      throw new ConflictError(`Cannot ${action}: job ${jobId} is ${result.job.status}`, {
        jobId,
        details: { status: result.job.status },
      });
    }
    return result.job;
  }
}
