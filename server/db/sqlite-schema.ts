import { sqliteTable, text, integer, index, primaryKey } from "drizzle-orm/sqlite-core";
import type { ObjectRecord } from "@shared/schema";

export const harvestState = sqliteTable("harvest_state", {
  runName: text("run_name").primaryKey(),
  lastCompletedIndex: integer("last_completed_index").notNull().default(-1),
  total: integer("total"),
  startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
  finishedAt: integer("finished_at", { mode: "timestamp" }),
});

export const objectRecords = sqliteTable("object_records", {
  runName: text("run_name").notNull(),
  objectId: text("object_id").notNull(),
  position: integer("position").notNull(),
  status: text("status").notNull(),
  record: text("record", { mode: "json" }).$type<ObjectRecord>().notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.runName, table.objectId] }),
  positionIdx: index("object_records_run_position_idx").on(table.runName, table.position),
}));
