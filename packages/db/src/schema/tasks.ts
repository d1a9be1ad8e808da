import { randomUUID } from "node:crypto";
import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";
import type { SourceQuery } from "@ragsync/types";

export const taskStatusEnum = pgEnum("task_status", ["pending", "in_progress", "completed", "failed"]);

export const taskKindEnum = pgEnum("task_kind", ["manual", "scheduled"]);

export const sourceServiceEnum = pgEnum("source_service", ["gmail", "drive", "file"]);

export const tasks = pgTable(
  "tasks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    ownerId: text("owner_id").notNull(),
    status: taskStatusEnum("status").notNull().default("pending"),
    service: sourceServiceEnum("service").notNull(),
    kind: taskKindEnum("kind").notNull().default("manual"),
    sourceQuery: jsonb("source_query").notNull().$type<SourceQuery>().default({}),
    processedCount: integer("processed_count").notNull().default(0),
    failedItemCount: integer("failed_item_count").notNull().default(0),
    error: text("error"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ownerHistoryIdx: index("tasks_owner_history_idx").on(table.ownerId, table.service, table.createdAt),
    statusUpdatedIdx: index("tasks_status_updated_idx").on(table.status, table.updatedAt),
  }),
);

export type TaskRow = typeof tasks.$inferSelect;
