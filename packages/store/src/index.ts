export type { WorkItemStore } from "./store.js";
export { MemoryWorkItemStore } from "./memory-store.js";
export { PostgresWorkItemStore, rowToWorkItem } from "./postgres-store.js";
export { runMigrations } from "./migrate.js";
export { createWorkItemStore } from "./factory.js";
