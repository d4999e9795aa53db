import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";

export const jobStatusEnum = pgEnum("job_status", [
  "queued",
  "processing",
  "completed",
  "failed",
  "cancelled",
]);

export const ingestionJobs = pgTable(
  "ingestion_jobs",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenantId: text("tenant_id").notNull(),
    namespaceId: text("namespace_id").notNull(),
    taskType: text("task_type").notNull(),
    status: jobStatusEnum("status").notNull().default("queued"),
    priority: integer("priority").notNull().default(0),
    // 1-based rank among queued jobs; null once the job leaves the queue
    queuePosition: integer("queue_position"),
    payload: jsonb("payload").$type<unknown>().notNull(),
    retryCount: integer("retry_count").notNull().default(0),
    maxRetries: integer("max_retries").notNull().default(3),
    errorMessage: text("error_message"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    rankingIdx: index("ingestion_jobs_ranking_idx").on(table.status, table.priority, table.createdAt),
    tenantIdx: index("ingestion_jobs_tenant_idx").on(table.tenantId, table.status),
  }),
);

export type IngestionJobRow = typeof ingestionJobs.$inferSelect;
