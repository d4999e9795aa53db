import { eq, inArray } from "drizzle-orm";
import { ingestionProgress, type DbClient, type IngestionProgressRow } from "@voicekb/db";
import { ConflictError } from "@voicekb/errors";
import { ACTIVE_PROGRESS_STATUSES, type ProgressRecord } from "@voicekb/types";
import type {
  InsertResult,
  NewProgressRecord,
  ProgressPatch,
  ProgressStore,
} from "./progress-store.js";

function toRecord(row: IngestionProgressRow): ProgressRecord {
  return {
    id: row.id,
    tenantId: row.tenantId,
    namespaceId: row.namespaceId,
    stage: row.stage,
    status: row.status,
    taskId: row.taskId,
    queuePosition: row.queuePosition,
    currentFile: row.currentFile,
    currentFileIndex: row.currentFileIndex,
    totalFiles: row.totalFiles,
    currentBatch: row.currentBatch,
    totalBatches: row.totalBatches,
    currentChunk: row.currentChunk,
    totalChunks: row.totalChunks,
    processedFiles: row.processedFiles,
    failedFiles: row.failedFiles,
    progressPercentage: row.progressPercentage,
    details: row.details,
    metadata: row.metadata,
    errorMessage: row.errorMessage,
    startedAt: row.startedAt,
    updatedAt: row.updatedAt,
    completedAt: row.completedAt,
  };
}

/**
 * Insert that yields no row, instead of a unique violation, when another
 * transaction already holds the tenant's slot.
 */
export function insertProgressRow(db: Pick<DbClient, "insert">, record: NewProgressRecord) {
  return db
    .insert(ingestionProgress)
    .values({ ...record, updatedAt: record.startedAt })
    .onConflictDoNothing({ target: ingestionProgress.tenantId })
    .returning();
}

function isActive(record: ProgressRecord): boolean {
  return ACTIVE_PROGRESS_STATUSES.includes(record.status);
}

export class DrizzleProgressStore implements ProgressStore {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  async findByTenant(tenantId: string): Promise<ProgressRecord | null> {
    const [row] = await this.db
      .select()
      .from(ingestionProgress)
      .where(eq(ingestionProgress.tenantId, tenantId));
    return row ? toRecord(row) : null;
  }

  async insertIfNoneActive(record: NewProgressRecord): Promise<InsertResult> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .select()
        .from(ingestionProgress)
        .where(eq(ingestionProgress.tenantId, record.tenantId))
        .for("update");

      if (row) {
        const existing = toRecord(row);
        if (isActive(existing)) return { created: false, existing };
        await tx.delete(ingestionProgress).where(eq(ingestionProgress.id, existing.id));
      }

      const [inserted] = await insertProgressRow(tx, record);
      if (inserted) return { created: true, record: toRecord(inserted) };

      // A concurrent create for the same tenant committed first.
      const [winner] = await tx
        .select()
        .from(ingestionProgress)
        .where(eq(ingestionProgress.tenantId, record.tenantId));
      if (!winner) {
        throw new ConflictError(`Progress record for tenant ${record.tenantId} was created concurrently`);
      }
      return { created: false, existing: toRecord(winner) };
    });
  }

  async modify(
    tenantId: string,
    mutate: (record: ProgressRecord) => ProgressPatch | null,
  ): Promise<ProgressRecord | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .select()
        .from(ingestionProgress)
        .where(eq(ingestionProgress.tenantId, tenantId))
        .for("update");
      if (!row) return null;

      const patch = mutate(toRecord(row));
      if (!patch) return null;

      const [updated] = await tx
        .update(ingestionProgress)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(ingestionProgress.id, row.id))
        .returning();
      return updated ? toRecord(updated) : null;
    });
  }

  async remove(tenantId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(ingestionProgress)
      .where(eq(ingestionProgress.tenantId, tenantId))
      .returning({ id: ingestionProgress.id });
    return deleted.length > 0;
  }

  async listActive(): Promise<ProgressRecord[]> {
    const rows = await this.db
      .select()
      .from(ingestionProgress)
      .where(inArray(ingestionProgress.status, [...ACTIVE_PROGRESS_STATUSES]));
    return rows.map(toRecord);
  }
}
