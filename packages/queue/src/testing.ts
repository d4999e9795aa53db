import type { IngestionJob, JobStatus, NewIngestionJob } from "@voicekb/types";
import {
  emptyStatusCounts,
  type JobPatch,
  type JobStore,
  type TransitionResult,
} from "./job-store.js";

interface StoredJob {
  job: IngestionJob;
  /** Insertion order; breaks ties between jobs created in the same millisecond. */
  seq: number;
}

function compareQueueOrder(a: StoredJob, b: StoredJob): number {
  return (
    b.job.priority - a.job.priority ||
    a.job.createdAt.getTime() - b.job.createdAt.getTime() ||
    a.seq - b.seq
  );
}

function clone(job: IngestionJob): IngestionJob {
  return structuredClone(job);
}

/** In-process JobStore with the same ranking rules as the Postgres store. */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, StoredJob>();
  private seq = 0;

  async insert(input: NewIngestionJob): Promise<IngestionJob> {
    if (this.jobs.has(input.id)) {
      throw new Error(`duplicate job id ${input.id}`);
    }
    this.jobs.set(input.id, {
      seq: this.seq++,
      job: {
        ...input,
        payload: structuredClone(input.payload),
        status: "queued",
        queuePosition: null,
        retryCount: 0,
        errorMessage: null,
        startedAt: null,
        completedAt: null,
        updatedAt: input.createdAt,
      },
    });
    this.rerank();
    return this.require(input.id);
  }

  async findById(id: string): Promise<IngestionJob | null> {
    const stored = this.jobs.get(id);
    return stored ? clone(stored.job) : null;
  }

  async findNextQueued(): Promise<IngestionJob | null> {
    const [first] = this.queued();
    return first ? clone(first.job) : null;
  }

  async findActiveByTenant(tenantId: string): Promise<IngestionJob | null> {
    const active = [...this.jobs.values()]
      .filter(
        (s) =>
          s.job.tenantId === tenantId && (s.job.status === "queued" || s.job.status === "processing"),
      )
      .sort((a, b) => a.job.createdAt.getTime() - b.job.createdAt.getTime() || a.seq - b.seq);
    const [first] = active;
    return first ? clone(first.job) : null;
  }

  async listQueued(): Promise<IngestionJob[]> {
    return this.queued().map((s) => clone(s.job));
  }

  async countByStatus(): Promise<Record<JobStatus, number>> {
    const counts = emptyStatusCounts();
    for (const { job } of this.jobs.values()) {
      counts[job.status] += 1;
    }
    return counts;
  }

  async transition(
    id: string,
    mutate: (job: IngestionJob) => JobPatch | null,
  ): Promise<TransitionResult | null> {
    const stored = this.jobs.get(id);
    if (!stored) return null;

    const patch = mutate(clone(stored.job));
    if (!patch) return { job: clone(stored.job), applied: false };

    stored.job = { ...stored.job, ...patch, updatedAt: new Date() };
    this.rerank();
    return { job: this.require(id), applied: true };
  }

  /** Every stored job, for assertions. */
  all(): IngestionJob[] {
    return [...this.jobs.values()].map((s) => clone(s.job));
  }

  private queued(): StoredJob[] {
    return [...this.jobs.values()].filter((s) => s.job.status === "queued").sort(compareQueueOrder);
  }

  private rerank(): void {
    for (const stored of this.jobs.values()) {
      stored.job.queuePosition = null;
    }
    this.queued().forEach((stored, i) => {
      stored.job.queuePosition = i + 1;
    });
  }

  private require(id: string): IngestionJob {
    const stored = this.jobs.get(id);
    if (!stored) throw new Error(`job ${id} missing`);
    return clone(stored.job);
  }
}
