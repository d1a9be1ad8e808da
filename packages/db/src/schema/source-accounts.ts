import { randomUUID } from "node:crypto";
import { pgTable, text, timestamp, jsonb, boolean } from "drizzle-orm/pg-core";
import type { SourceQuery } from "@ragsync/types";
import { sourceServiceEnum } from "./tasks.js";

/** Connected accounts picked up by the scheduled sweep. */
export const sourceAccounts = pgTable("source_accounts", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => randomUUID()),
  service: sourceServiceEnum("service").notNull(),
  userId: text("user_id").notNull(),
  sourceQuery: jsonb("source_query").notNull().$type<SourceQuery>().default({}),
  enabled: boolean("enabled").notNull().default(true),
  lastCollectedAt: timestamp("last_collected_at", { withTimezone: true }),
  lastTaskId: text("last_task_id"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type SourceAccountRow = typeof sourceAccounts.$inferSelect;
