export * from "./schema/index.js";
export { createDbClient, type DbClient, type DbClientOptions, type DbHandle } from "./client.js";
export { PgTaskStore, toTask, DEFAULT_TASK_HISTORY_SIZE } from "./pg-task-store.js";
export type { TaskStoreOptions } from "./pg-task-store.js";
export { PgSourceAccountStore } from "./pg-source-account-store.js";
export { InMemoryTaskStore, InMemorySourceAccountStore } from "./in-memory-stores.js";
export type { InMemoryTaskStoreOptions } from "./in-memory-stores.js";
export { applySchema, getSchemaStatements } from "./migrate.js";
