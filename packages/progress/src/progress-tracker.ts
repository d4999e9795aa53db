import { randomUUID } from "node:crypto";
import {
  ACTIVE_PROGRESS_STATUSES,
  type ProgressRecord,
  type ProgressStage,
  type ProgressUpdate,
} from "@voicekb/types";
import { ConflictError } from "@voicekb/errors";
import type { Logger } from "@voicekb/logger";
import type { ProgressPatch, ProgressStore } from "./progress-store.js";

/** Live queue lookup; satisfied by the job queue service. */
export interface QueuePositionSource {
  getQueuePosition(jobId: string): Promise<number | null>;
}

export interface CreateProgressInput {
  tenantId: string;
  namespaceId: string;
  totalFiles: number;
  taskId?: string;
  queuePosition?: number | null;
  /** Default: "file_processing". A "queued" record starts out pending. */
  stage?: ProgressStage;
}

export interface ProgressTrackerOptions {
  queue?: QueuePositionSource;
  logger?: Logger;
  now?: () => Date;
}

function isActive(record: ProgressRecord): boolean {
  return ACTIVE_PROGRESS_STATUSES.includes(record.status);
}

/**
 * Per-tenant ingestion progress. Updates are best-effort: writing to a
 * tenant without an active record logs a warning and returns false.
 *
 * While a record is not failed its percentage only moves forward, and it
 * is exactly 100 once the record is completed.
 */
export class ProgressTracker {
  private store: ProgressStore;
  private queue?: QueuePositionSource;
  private logger?: Logger;
  private now: () => Date;

  constructor(store: ProgressStore, options: ProgressTrackerOptions = {}) {
    this.store = store;
    this.queue = options.queue;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Start a record. Throws ConflictError while the tenant has an active one. */
  async create(input: CreateProgressInput): Promise<ProgressRecord> {
    const stage = input.stage ?? "file_processing";
    const result = await this.store.insertIfNoneActive({
      id: randomUUID(),
      tenantId: input.tenantId,
      namespaceId: input.namespaceId,
      stage,
      status: stage === "queued" ? "pending" : "in_progress",
      taskId: input.taskId ?? null,
      queuePosition: input.queuePosition ?? null,
      currentFile: null,
      currentFileIndex: 0,
      totalFiles: input.totalFiles,
      currentBatch: 0,
      totalBatches: 0,
      currentChunk: 0,
      totalChunks: 0,
      processedFiles: 0,
      failedFiles: 0,
      progressPercentage: 0,
      details: {},
      metadata: {},
      startedAt: this.now(),
    });

    if (!result.created) {
      throw new ConflictError(
        `Tenant ${input.tenantId} already has an active ingestion (${result.existing.status})`,
        { details: { progressId: result.existing.id, taskId: result.existing.taskId } },
      );
    }
    return result.record;
  }

  /**
   * Current record for the tenant. While it is still waiting in the queue,
   * `queuePosition` is read from the live job rather than the stored copy.
   */
  async get(tenantId: string): Promise<ProgressRecord | null> {
    const record = await this.store.findByTenant(tenantId);
    if (!record || record.stage !== "queued" || !record.taskId || !this.queue) {
      return record;
    }
    return { ...record, queuePosition: await this.queue.getQueuePosition(record.taskId) };
  }

  async update(tenantId: string, fields: ProgressUpdate): Promise<boolean> {
    const updated = await this.store.modify(tenantId, (current) => {
      if (!isActive(current)) return null;

      const patch: ProgressPatch = { ...fields };
      if (fields.details) {
        patch.details = { ...current.details, ...fields.details };
      }
      if (fields.status === "completed") {
        patch.progressPercentage = 100;
        patch.completedAt = this.now();
      } else if (fields.status === "failed") {
        patch.completedAt = this.now();
      } else if (fields.progressPercentage !== undefined) {
        patch.progressPercentage = Math.min(
          100,
          Math.max(current.progressPercentage, fields.progressPercentage),
        );
      }
      return patch;
    });

    if (!updated) {
      this.logger?.warn({ tenantId, fields: Object.keys(fields) }, "No active progress record to update");
      return false;
    }
    return true;
  }

  async markCompleted(tenantId: string, metadata: Record<string, unknown> = {}): Promise<boolean> {
    const updated = await this.store.modify(tenantId, (current) =>
      isActive(current)
        ? {
            status: "completed",
            stage: "complete",
            progressPercentage: 100,
            completedAt: this.now(),
            metadata: { ...current.metadata, ...metadata },
          }
        : null,
    );
    if (!updated) {
      this.logger?.warn({ tenantId }, "No active progress record to complete");
    }
    return updated !== null;
  }

  async markFailed(
    tenantId: string,
    errorMessage: string,
    metadata: Record<string, unknown> = {},
  ): Promise<boolean> {
    const updated = await this.store.modify(tenantId, (current) =>
      isActive(current)
        ? {
            status: "failed",
            stage: "failed",
            errorMessage,
            completedAt: this.now(),
            metadata: { ...current.metadata, ...metadata },
          }
        : null,
    );
    if (!updated) {
      this.logger?.warn({ tenantId, error: errorMessage }, "No active progress record to fail");
    }
    return updated !== null;
  }

  /** Idempotent; false when there was nothing to delete. */
  async delete(tenantId: string): Promise<boolean> {
    return this.store.remove(tenantId);
  }

  async listActive(): Promise<ProgressRecord[]> {
    return this.store.listActive();
  }
}
