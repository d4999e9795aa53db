import { ACTIVE_PROGRESS_STATUSES, type ProgressRecord } from "@voicekb/types";
import type {
  InsertResult,
  NewProgressRecord,
  ProgressPatch,
  ProgressStore,
} from "./progress-store.js";

/** In-process ProgressStore keyed by tenant, like the unique index in Postgres. */
export class InMemoryProgressStore implements ProgressStore {
  private records = new Map<string, ProgressRecord>();
  /** Every percentage written per tenant, in order. */
  readonly percentageHistory = new Map<string, number[]>();

  async findByTenant(tenantId: string): Promise<ProgressRecord | null> {
    const record = this.records.get(tenantId);
    return record ? structuredClone(record) : null;
  }

  async insertIfNoneActive(input: NewProgressRecord): Promise<InsertResult> {
    const existing = this.records.get(input.tenantId);
    if (existing && ACTIVE_PROGRESS_STATUSES.includes(existing.status)) {
      return { created: false, existing: structuredClone(existing) };
    }
    const record: ProgressRecord = {
      ...structuredClone(input),
      errorMessage: null,
      updatedAt: input.startedAt,
      completedAt: null,
    };
    this.records.set(input.tenantId, record);
    this.percentageHistory.set(input.tenantId, [record.progressPercentage]);
    return { created: true, record: structuredClone(record) };
  }

  async modify(
    tenantId: string,
    mutate: (record: ProgressRecord) => ProgressPatch | null,
  ): Promise<ProgressRecord | null> {
    const current = this.records.get(tenantId);
    if (!current) return null;

    const patch = mutate(structuredClone(current));
    if (!patch) return null;

    const next: ProgressRecord = { ...current, ...patch, updatedAt: new Date() };
    this.records.set(tenantId, next);
    this.percentageHistory.get(tenantId)?.push(next.progressPercentage);
    return structuredClone(next);
  }

  async remove(tenantId: string): Promise<boolean> {
    return this.records.delete(tenantId);
  }

  async listActive(): Promise<ProgressRecord[]> {
    return [...this.records.values()]
      .filter((r) => ACTIVE_PROGRESS_STATUSES.includes(r.status))
      .map((r) => structuredClone(r));
  }
}
