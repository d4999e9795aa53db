import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

const ENUMS: Record<string, readonly string[]> = {
  job_status: ["queued", "processing", "completed", "failed", "cancelled"],
  progress_status: ["pending", "in_progress", "completed", "failed"],
  document_processing_status: ["pending", "processing", "completed", "failed"],
};

/**
 * Idempotent DDL for the worker's tables. Safe to run on every start.
 */
export function getSchemaMigrationSql(): string[] {
  const statements: string[] = [];

  for (const [name, values] of Object.entries(ENUMS)) {
    const list = values.map((v) => `'${v}'`).join(", ");
    statements.push(
      `DO $$ BEGIN CREATE TYPE ${name} AS ENUM (${list}); EXCEPTION WHEN duplicate_object THEN null; END $$;`,
    );
  }

  statements.push(`
    CREATE TABLE IF NOT EXISTS ingestion_jobs (
      id text PRIMARY KEY,
      tenant_id text NOT NULL,
      namespace_id text NOT NULL,
      task_type text NOT NULL,
      status job_status NOT NULL DEFAULT 'queued',
      priority integer NOT NULL DEFAULT 0,
      queue_position integer,
      payload jsonb NOT NULL,
      retry_count integer NOT NULL DEFAULT 0,
      max_retries integer NOT NULL DEFAULT 3,
      error_message text,
      created_at timestamptz NOT NULL DEFAULT now(),
      started_at timestamptz,
      completed_at timestamptz,
      updated_at timestamptz NOT NULL DEFAULT now()
    )`);
  statements.push(
    "CREATE INDEX IF NOT EXISTS ingestion_jobs_ranking_idx ON ingestion_jobs (status, priority, created_at)",
  );
  statements.push(
    "CREATE INDEX IF NOT EXISTS ingestion_jobs_tenant_idx ON ingestion_jobs (tenant_id, status)",
  );

  statements.push(`
    CREATE TABLE IF NOT EXISTS ingestion_progress (
      id text PRIMARY KEY,
      tenant_id text NOT NULL,
      namespace_id text NOT NULL,
      task_id text,
      stage text NOT NULL,
      status progress_status NOT NULL DEFAULT 'pending',
      queue_position integer,
      current_file text,
      current_file_index integer NOT NULL DEFAULT 0,
      total_files integer NOT NULL DEFAULT 0,
      current_batch integer NOT NULL DEFAULT 0,
      total_batches integer NOT NULL DEFAULT 0,
      current_chunk integer NOT NULL DEFAULT 0,
      total_chunks integer NOT NULL DEFAULT 0,
      processed_files integer NOT NULL DEFAULT 0,
      failed_files integer NOT NULL DEFAULT 0,
      progress_percentage double precision NOT NULL DEFAULT 0,
      details jsonb NOT NULL DEFAULT '{}'::jsonb,
      metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
      error_message text,
      started_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now(),
      completed_at timestamptz
    )`);
  statements.push(
    "CREATE UNIQUE INDEX IF NOT EXISTS ingestion_progress_tenant_idx ON ingestion_progress (tenant_id)",
  );

  statements.push(`
    CREATE TABLE IF NOT EXISTS documents (
      id text PRIMARY KEY,
      tenant_id text NOT NULL,
      filename text NOT NULL,
      mime_type text NOT NULL DEFAULT 'text/plain',
      content bytea,
      extracted_text text,
      processing_status document_processing_status NOT NULL DEFAULT 'pending',
      word_count integer,
      chunk_count integer,
      processing_error text,
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    )`);
  statements.push("CREATE INDEX IF NOT EXISTS documents_tenant_idx ON documents (tenant_id)");

  return statements;
}

export async function applySchema(db: DbClient): Promise<void> {
  for (const statement of getSchemaMigrationSql()) {
    await db.execute(sql.raw(statement));
  }
}
