import { drizzle } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import fs from "fs";
import { dirname } from "path";
import * as sqliteSchema from "./sqlite-schema";
import type { CheckpointDatabase } from "../types";

export interface OpenedDatabase {
  db: CheckpointDatabase;
  sqlite: Database.Database;
}

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS harvest_state (
    run_name TEXT PRIMARY KEY,
    last_completed_index INTEGER NOT NULL DEFAULT -1,
    total INTEGER,
    started_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    finished_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS object_records (
    run_name TEXT NOT NULL,
    object_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    status TEXT NOT NULL,
    record TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (run_name, object_id)
  );

  CREATE INDEX IF NOT EXISTS object_records_run_position_idx ON object_records(run_name, position);
`;

/**
 * Opens (and creates when needed) the checkpoint database.
 * `:memory:` gives a private in-process database.
 */
export function openCheckpointDatabase(dbPath: string): OpenedDatabase {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("synchronous = FULL");
    sqlite.exec(CREATE_TABLES_SQL);
  } catch (error) {
    sqlite.close();
    if (error instanceof Error) {
      if (error.message.includes("SQLITE_CANTOPEN") || error.message.includes("unable to open")) {
        throw new Error(`Cannot open checkpoint database at ${dbPath}: check permissions and that the directory is writable`);
      }
      if (error.message.includes("SQLITE_CORRUPT") || error.message.includes("malformed")) {
        throw new Error(`Checkpoint database at ${dbPath} is corrupted: ${error.message}`);
      }
    }
    throw error;
  }

  const db = drizzle(sqlite, { schema: sqliteSchema });
  return { db, sqlite };
}
