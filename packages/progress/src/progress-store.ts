import type { ProgressRecord } from "@voicekb/types";

export type NewProgressRecord = Omit<ProgressRecord, "updatedAt" | "completedAt" | "errorMessage">;

/** Columns a modification may change. */
export type ProgressPatch = Partial<
  Omit<ProgressRecord, "id" | "tenantId" | "startedAt" | "updatedAt">
>;

export type InsertResult =
  | { created: true; record: ProgressRecord }
  | { created: false; existing: ProgressRecord };

/**
 * Persistence for progress records, one row per tenant. A terminal row
 * (completed or failed) is kept until it is deleted or superseded.
 */
export interface ProgressStore {
  findByTenant(tenantId: string): Promise<ProgressRecord | null>;
  /**
   * Insert unless the tenant has an active (pending or in_progress) record.
   * A terminal record is replaced.
   */
  insertIfNoneActive(record: NewProgressRecord): Promise<InsertResult>;
  /**
   * Row-locked read-modify-write. `mutate` returns null to leave the row
   * untouched; the result is null when nothing was written.
   */
  modify(
    tenantId: string,
    mutate: (record: ProgressRecord) => ProgressPatch | null,
  ): Promise<ProgressRecord | null>;
  remove(tenantId: string): Promise<boolean>;
  listActive(): Promise<ProgressRecord[]>;
}
