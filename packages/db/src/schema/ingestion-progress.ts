import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  doublePrecision,
  pgEnum,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { ProgressStage } from "@voicekb/types";

export const progressStatusEnum = pgEnum("progress_status", [
  "pending",
  "in_progress",
  "completed",
  "failed",
]);

export const ingestionProgress = pgTable(
  "ingestion_progress",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenantId: text("tenant_id").notNull(),
    namespaceId: text("namespace_id").notNull(),
    taskId: text("task_id"),
    stage: text("stage").$type<ProgressStage>().notNull(),
    status: progressStatusEnum("status").notNull().default("pending"),
    queuePosition: integer("queue_position"),
    currentFile: text("current_file"),
    currentFileIndex: integer("current_file_index").notNull().default(0),
    totalFiles: integer("total_files").notNull().default(0),
    currentBatch: integer("current_batch").notNull().default(0),
    totalBatches: integer("total_batches").notNull().default(0),
    currentChunk: integer("current_chunk").notNull().default(0),
    totalChunks: integer("total_chunks").notNull().default(0),
    processedFiles: integer("processed_files").notNull().default(0),
    failedFiles: integer("failed_files").notNull().default(0),
    progressPercentage: doublePrecision("progress_percentage").notNull().default(0),
    details: jsonb("details").$type<Record<string, unknown>>().notNull().default({}),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
    errorMessage: text("error_message"),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    tenantIdx: uniqueIndex("ingestion_progress_tenant_idx").on(table.tenantId),
  }),
);

export type IngestionProgressRow = typeof ingestionProgress.$inferSelect;
