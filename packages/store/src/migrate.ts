import { readFile } from "node:fs/promises";
import type { Pool } from "pg";

const MIGRATIONS = ["001_work_items.sql"];

const splitStatements = (sql: string): string[] =>
  sql
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

export const runMigrations = async (pool: Pick<Pool, "query">): Promise<void> => {
  for (const file of MIGRATIONS) {
    const sql = await readFile(new URL(`../sql/${file}`, import.meta.url), "utf8");
    for (const statement of splitStatements(sql)) {
      await pool.query(statement);
    }
  }
};
