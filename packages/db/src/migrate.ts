import { readFileSync } from "node:fs";
import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/** Idempotent DDL for the task and source-account tables, one statement per entry. */
export function getSchemaStatements(): string[] {
  return readFileSync(new URL("./schema.sql", import.meta.url), "utf8")
    .split(/;\s*\n\s*\n/)
    .map((statement) => statement.trim().replace(/;$/, ""))
    .filter((statement) => statement.length > 0);
}

export async function applySchema(db: DbClient): Promise<void> {
  for (const statement of getSchemaStatements()) {
    await db.execute(sql.raw(statement));
  }
}
