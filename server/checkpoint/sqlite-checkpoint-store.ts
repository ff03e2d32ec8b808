import { asc, eq, sql } from "drizzle-orm";
import { objectRecordSchema, type ObjectRecord } from "@shared/schema";
import { openCheckpointDatabase, type OpenedDatabase } from "../db/index";
import { harvestState, objectRecords } from "../db/sqlite-schema";
import type { CheckpointCommit, CheckpointStore, PersistedCheckpoint } from "../types";

/**
 * Checkpoint store on SQLite. One row of `harvest_state` per run name; records
 * are keyed by (run, object ID) so a reprocessed object replaces its row.
 */
export class SqliteCheckpointStore implements CheckpointStore {
  private constructor(
    private readonly database: OpenedDatabase,
    private readonly runName: string,
  ) {}

  static open(dbPath: string, runName: string = "default"): SqliteCheckpointStore {
    const database = openCheckpointDatabase(dbPath);
    const now = new Date();
    database.db
      .insert(harvestState)
      .values({ runName, lastCompletedIndex: -1, startedAt: now, updatedAt: now })
      .onConflictDoNothing()
      .run();
    return new SqliteCheckpointStore(database, runName);
  }

  async load(): Promise<PersistedCheckpoint> {
    const row = this.database.db
      .select()
      .from(harvestState)
      .where(eq(harvestState.runName, this.runName))
      .get();

    return {
      lastCompletedIndex: row?.lastCompletedIndex ?? -1,
      total: row?.total ?? null,
      finishedAt: row?.finishedAt ? row.finishedAt.toISOString() : null,
    };
  }

  async commit(batch: CheckpointCommit): Promise<void> {
    const now = new Date();

    this.database.db.transaction((tx) => {
      for (const { position, record } of batch.records) {
        tx.insert(objectRecords)
          .values({
            runName: this.runName,
            objectId: record.objectId,
            position,
            status: record.status,
            record,
            updatedAt: now,
          })
          .onConflictDoUpdate({
            target: [objectRecords.runName, objectRecords.objectId],
            set: {
              position: sql`excluded.position`,
              status: sql`excluded.status`,
              record: sql`excluded.record`,
              updatedAt: sql`excluded.updated_at`,
            },
          })
          .run();
      }

      tx.update(harvestState)
        .set({ lastCompletedIndex: batch.lastCompletedIndex, updatedAt: now, finishedAt: null })
        .where(eq(harvestState.runName, this.runName))
        .run();
    });
  }

  async markFinished(total: number): Promise<void> {
    const now = new Date();
    this.database.db
      .update(harvestState)
      .set({ total, finishedAt: now, updatedAt: now })
      .where(eq(harvestState.runName, this.runName))
      .run();
  }

  async listRecords(): Promise<ObjectRecord[]> {
    const rows = this.database.db
      .select({ record: objectRecords.record })
      .from(objectRecords)
      .where(eq(objectRecords.runName, this.runName))
      .orderBy(asc(objectRecords.position))
      .all();

    return rows.map((row) => objectRecordSchema.parse(row.record));
  }

  async countRecords(): Promise<number> {
    const row = this.database.db
      .select({ count: sql<number>`count(*)` })
      .from(objectRecords)
      .where(eq(objectRecords.runName, this.runName))
      .get();
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.database.sqlite.open) {
      this.database.sqlite.close();
    }
  }
}
