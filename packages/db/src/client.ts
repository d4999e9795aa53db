import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

export type DbClient = PostgresJsDatabase<typeof schema>;

export interface DbHandle {
  db: DbClient;
  /** Drain the pool; pending queries finish first. */
  close(): Promise<void>;
}

const DEFAULT_WORKER_POOL = { max: 10 };

export function createWorkerDbClient(options: DbClientOptions): DbHandle {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}
