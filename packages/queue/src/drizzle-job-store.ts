import { and, asc, desc, eq, inArray, sql } from "drizzle-orm";
import { ingestionJobs, type DbClient, type IngestionJobRow } from "@voicekb/db";
import type { IngestionJob, JobStatus, NewIngestionJob } from "@voicekb/types";
import {
  emptyStatusCounts,
  type JobPatch,
  type JobStore,
  type TransitionResult,
} from "./job-store.js";

type Tx = Parameters<Parameters<DbClient["transaction"]>[0]>[0];

function toJob(row: IngestionJobRow): IngestionJob {
  return {
    id: row.id,
    tenantId: row.tenantId,
    namespaceId: row.namespaceId,
    taskType: row.taskType,
    status: row.status,
    priority: row.priority,
    queuePosition: row.queuePosition,
    payload: row.payload,
    retryCount: row.retryCount,
    maxRetries: row.maxRetries,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Serialize writers on one advisory lock, then rewrite queue positions.
 * Runs inside the caller's transaction.
 */
async function lockQueue(tx: Tx): Promise<void> {
  await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext('ingestion_jobs_ranking'))`);
}

async function rerank(tx: Tx): Promise<void> {
  await tx.execute(sql`
    UPDATE ingestion_jobs
       SET queue_position = NULL
     WHERE status <> 'queued' AND queue_position IS NOT NULL
  `);
  await tx.execute(sql`
    UPDATE ingestion_jobs AS j
       SET queue_position = r.rank
      FROM (
        SELECT id, row_number() OVER (ORDER BY priority DESC, created_at ASC, id ASC) AS rank
          FROM ingestion_jobs
         WHERE status = 'queued'
      ) AS r
     WHERE j.id = r.id AND j.queue_position IS DISTINCT FROM r.rank
  `);
}

export class DrizzleJobStore implements JobStore {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async insert(job: NewIngestionJob): Promise<IngestionJob> {
    return this.db.transaction(async (tx) => {
      await lockQueue(tx);
      await tx.insert(ingestionJobs).values({
        id: job.id,
        tenantId: job.tenantId,
        namespaceId: job.namespaceId,
        taskType: job.taskType,
        status: "queued",
        priority: job.priority,
        payload: job.payload,
        maxRetries: job.maxRetries,
        createdAt: job.createdAt,
        updatedAt: job.createdAt,
      });
      await rerank(tx);
      return this.reload(tx, job.id);
    });
  }

  async findById(id: string): Promise<IngestionJob | null> {
    const [row] = await this.db.select().from(ingestionJobs).where(eq(ingestionJobs.id, id));
    return row ? toJob(row) : null;
  }

  async findNextQueued(): Promise<IngestionJob | null> {
    const [row] = await this.db
      .select()
      .from(ingestionJobs)
      .where(eq(ingestionJobs.status, "queued"))
      .orderBy(desc(ingestionJobs.priority), asc(ingestionJobs.createdAt), asc(ingestionJobs.id))
      .limit(1);
    return row ? toJob(row) : null;
  }

  async findActiveByTenant(tenantId: string): Promise<IngestionJob | null> {
    const [row] = await this.db
      .select()
      .from(ingestionJobs)
      .where(
        and(
          eq(ingestionJobs.tenantId, tenantId),
          inArray(ingestionJobs.status, ["queued", "processing"]),
        ),
      )
      .orderBy(asc(ingestionJobs.createdAt))
      .limit(1);
    return row ? toJob(row) : null;
  }

  async listQueued(): Promise<IngestionJob[]> {
    const rows = await this.db
      .select()
      .from(ingestionJobs)
      .where(eq(ingestionJobs.status, "queued"))
      .orderBy(desc(ingestionJobs.priority), asc(ingestionJobs.createdAt), asc(ingestionJobs.id));
    return rows.map(toJob);
  }

  async countByStatus(): Promise<Record<JobStatus, number>> {
    const rows = await this.db
      .select({ status: ingestionJobs.status, count: sql<number>`count(*)::int` })
      .from(ingestionJobs)
      .groupBy(ingestionJobs.status);

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  async transition(
    id: string,
    mutate: (job: IngestionJob) => JobPatch | null,
  ): Promise<TransitionResult | null> {
    return this.db.transaction(async (tx) => {
      await lockQueue(tx);
      const [row] = await tx.select().from(ingestionJobs).where(eq(ingestionJobs.id, id)).for("update");
      if (!row) return null;

      const current = toJob(row);
      const patch = mutate(current);
      if (!patch) return { job: current, applied: false };

      await tx
        .update(ingestionJobs)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(ingestionJobs.id, id));
      await rerank(tx);

      return { job: await this.reload(tx, id), applied: true };
    });
  }

  private async reload(tx: Tx, id: string): Promise<IngestionJob> {
    const [row] = await tx.select().from(ingestionJobs).where(eq(ingestionJobs.id, id));
    if (!row) {
      throw new Error(`Ingestion job ${id} vanished inside its own transaction`);
    }
    return toJob(row);
  }
}
