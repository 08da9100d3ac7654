import pg from "pg";
import type { StoreConfig } from "@image-triage/shared";
import { MemoryWorkItemStore } from "./memory-store.js";
import { runMigrations } from "./migrate.js";
import { PostgresWorkItemStore } from "./postgres-store.js";
import type { WorkItemStore } from "./store.js";

export const createWorkItemStore = async (config: StoreConfig): Promise<WorkItemStore> => {
  if (config.driver === "memory") {
    return new MemoryWorkItemStore();
  }
  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  await runMigrations(pool);
  return new PostgresWorkItemStore(pool);
};
