import type { IngestionJob } from "@voicekb/types";
import { type JobQueue, parseJobPayload } from "@voicekb/queue";
import { AppError, ConflictError, errorMessage } from "@voicekb/errors";
import type { Logger } from "@voicekb/logger";
import { dispatchJob, type JobHandlers } from "./processors/index.js";

export interface QueueWorkerOptions {
  /** Idle wait between polls of an empty queue. Default: 2000 */
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface WorkerStatus {
  running: boolean;
  currentJobId: string | null;
  pollIntervalMs: number;
}

/**
 * Single poll loop over the job queue with at most one job in flight.
 *
 * A job that throws is recorded with `markFailed` and the loop carries on.
 * Errors the queue cannot cure by retrying (an AppError that is not
 * retryable, such as an unsupported job) fail the job on the spot.
 */
export class QueueWorker {
  private queue: JobQueue;
  private handlers: JobHandlers;
  private pollIntervalMs: number;
  private logger?: Logger;

  private running = false;
  private currentJobId: string | null = null;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(queue: JobQueue, handlers: JobHandlers, options: QueueWorkerOptions = {}) {
    this.queue = queue;
    this.handlers = handlers;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.logger = options.logger;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.pollLoop();
    this.logger?.info({ pollIntervalMs: this.pollIntervalMs }, "Queue worker started");
  }

  /** Stop polling. Resolves once the job in flight, if any, has finished. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = null;
    this.logger?.info("Queue worker stopped");
  }

  getStatus(): WorkerStatus {
    return {
      running: this.running,
      currentJobId: this.currentJobId,
      pollIntervalMs: this.pollIntervalMs,
    };
  }

  /** Run the next queued job, if there is one. Returns false when the queue was empty. */
  async runOnce(): Promise<boolean> {
    const next = await this.queue.dequeueNext();
    if (!next) return false;

    let job: IngestionJob;
    try {
      job = await this.queue.markProcessing(next.id);
    } catch (err) {
      if (err instanceof ConflictError) {
        this.logger?.debug({ jobId: next.id }, "Job left the queue before it could start");
        return true;
      }
      throw err;
    }

    this.currentJobId = job.id;
    try {
      await this.execute(job);
    } finally {
      this.currentJobId = null;
    }
    return true;
  }

  private async execute(job: IngestionJob): Promise<void> {
    const log = this.logger?.child({
      jobId: job.id,
      tenantId: job.tenantId,
      namespaceId: job.namespaceId,
      taskType: job.taskType,
    });
    const startedAt = Date.now();

    try {
      const payload = parseJobPayload(job.taskType, job.payload);
      const summary = await dispatchJob(this.handlers, job, payload);
      await this.queue.markCompleted(job.id);
      log?.info(
        {
          durationMs: Date.now() - startedAt,
          processedCount: summary.processedCount,
          failedCount: summary.failedFiles.length,
          credentialsMissing: summary.credentialsMissing,
        },
        "Job completed",
      );
    } catch (err) {
      const terminal = AppError.isAppError(err) && !err.retryable;
      log?.error({ err, terminal, durationMs: Date.now() - startedAt }, "Job failed");
      await this.queue.markFailed(job.id, errorMessage(err), { terminal });
    }
  }

  private async pollLoop(): Promise<void> {
    while (this.running) {
      let worked = false;
      try {
        worked = await this.runOnce();
      } catch (err) {
        this.logger?.error({ err }, "Queue poll failed");
      }
      if (!worked && this.running) {
        await this.idle();
      }
    }
  }

  private idle(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.pollIntervalMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
