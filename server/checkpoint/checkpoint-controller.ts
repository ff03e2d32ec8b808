import type { ObjectRecord } from "@shared/schema";
import type { CheckpointStore } from "../types";
import { CheckpointWriteError, getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { withRetry } from "../utils/retry";

export interface CheckpointOptions {
  flushEvery: number;
  flushRetryAttempts: number;
  flushRetryDelayMs: number;
}

interface PendingRecord {
  position: number;
  record: ObjectRecord;
}

/**
 * Owns the run's checkpoint state: the last completed position and the records
 * not yet written to the store. Positions are 0-based indexes into the full ID list.
 */
export class CheckpointController {
  private pending: PendingRecord[] = [];
  private pendingIds = new Set<string>();
  private lastCompletedIndex: number;
  private persistedIndex: number;
  private readonly logger: QueuedLogger;

  private constructor(
    private readonly store: CheckpointStore,
    private readonly options: CheckpointOptions,
    restoredIndex: number,
    logger?: QueuedLogger,
  ) {
    this.lastCompletedIndex = restoredIndex;
    this.persistedIndex = restoredIndex;
    this.logger = logger ?? createLogger("Checkpoint");
  }

  static async open(
    store: CheckpointStore,
    options: CheckpointOptions,
    logger?: QueuedLogger,
  ): Promise<CheckpointController> {
    const state = await store.load();
    const controller = new CheckpointController(store, options, state.lastCompletedIndex, logger);
    if (state.lastCompletedIndex >= 0) {
      controller.logger.info(`Resuming after position ${state.lastCompletedIndex} (next: ${state.lastCompletedIndex + 1})`);
    }
    return controller;
  }

  shouldProcess(objectId: string, index: number): boolean {
    return index > this.lastCompletedIndex && !this.pendingIds.has(objectId);
  }

  record(objectId: string, index: number, record: ObjectRecord): void {
    if (!this.shouldProcess(objectId, index)) {
      this.logger.warn(`Ignoring duplicate record for ${objectId} at position ${index}`);
      return;
    }

    this.pending.push({ position: index, record });
    this.pendingIds.add(objectId);
    this.lastCompletedIndex = index;
  }

  /**
   * Persists the buffer once it holds `flushEvery` records, or immediately when forced.
   * Returns true when something was written.
   */
  async flush(force: boolean = false): Promise<boolean> {
    if (!force && this.pending.length < this.options.flushEvery) {
      return false;
    }
    if (this.pending.length === 0 && this.lastCompletedIndex === this.persistedIndex) {
      return false;
    }

    const batch = [...this.pending];
    const lastCompletedIndex = this.lastCompletedIndex;

    try {
      await withRetry(() => this.store.commit({ lastCompletedIndex, records: batch }), {
        attempts: this.options.flushRetryAttempts,
        baseDelayMs: this.options.flushRetryDelayMs,
        onRetry: (error, attempt, delay) => {
          this.logger.warn(
            `Checkpoint write failed (attempt ${attempt}/${this.options.flushRetryAttempts}): ${getErrorMessage(error)}; retrying in ${delay}ms`,
          );
        },
      });
    } catch (error) {
      this.logger.error(`Checkpoint write failed permanently: ${getErrorMessage(error)}`);
      throw new CheckpointWriteError(
        `Could not persist ${batch.length} record(s) up to position ${lastCompletedIndex}: ${getErrorMessage(error)}`,
        this.options.flushRetryAttempts,
        error,
      );
    }

    this.pending = this.pending.slice(batch.length);
    for (const { record } of batch) {
      this.pendingIds.delete(record.objectId);
    }
    this.persistedIndex = lastCompletedIndex;
    this.logger.info(`Checkpoint saved: ${batch.length} record(s), last position ${lastCompletedIndex}`);
    return true;
  }

  /**
   * Final forced flush; marks the run finished in the store.
   */
  async retire(total: number): Promise<void> {
    await this.flush(true);
    await this.store.markFinished(total);
  }

  getLastCompletedIndex(): number {
    return this.lastCompletedIndex;
  }

  getPersistedIndex(): number {
    return this.persistedIndex;
  }

  getPendingCount(): number {
    return this.pending.length;
  }
}
