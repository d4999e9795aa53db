export * from "./schema/index.js";
export {
  createWorkerDbClient,
  type DbClient,
  type DbClientOptions,
  type DbHandle,
} from "./client.js";
export { getSchemaMigrationSql, applySchema } from "./migrations.js";
