import type { CheckpointController } from "./checkpoint/checkpoint-controller";
import type { ObjectProcessor } from "./types";
import { FailedObjectsLogger } from "./utils/failed-objects-logger";
import { createLogger, type QueuedLogger } from "./utils/queued-logger";
import { WaitTimeHelper } from "./utils/wait-time-helper";

export interface BatchRunOptions {
  startOffset?: number;
  limit?: number;
  signal?: AbortSignal;
}

export interface BatchSummary {
  processed: number;
  skipped: number;
  complete: number;
  degraded: number;
  errors: number;
  lastCompletedIndex: number;
  interrupted: boolean;
}

export interface OrchestratorDependencies {
  pipeline: ObjectProcessor;
  controller: CheckpointController;
  runName?: string;
  failedObjects?: FailedObjectsLogger;
  pacing?: WaitTimeHelper;
  logger?: QueuedLogger;
}

/**
 * Drives one sequential pass over the ID list through the pipeline and the
 * checkpoint controller. Only checkpoint write failures escape `run`.
 */
export class BatchOrchestrator {
  private readonly logger: QueuedLogger;
  private readonly pacing: WaitTimeHelper;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.logger = deps.logger ?? createLogger("Orchestrator");
    this.pacing = deps.pacing ?? WaitTimeHelper.none();
  }

  async run(objectIds: readonly string[], options: BatchRunOptions = {}): Promise<BatchSummary> {
    const { pipeline, controller, failedObjects } = this.deps;
    const start = Math.min(Math.max(0, options.startOffset ?? 0), objectIds.length);
    const end = options.limit !== undefined ? Math.min(objectIds.length, start + options.limit) : objectIds.length;
    const total = end - start;

    const summary: BatchSummary = {
      processed: 0,
      skipped: 0,
      complete: 0,
      degraded: 0,
      errors: 0,
      lastCompletedIndex: controller.getLastCompletedIndex(),
      interrupted: false,
    };

    failedObjects?.startRun(this.deps.runName ?? "default");
    this.logger.info(`Starting batch: ${total} object(s) from offset ${start} of ${objectIds.length}`);

    for (let index = start; index < end; index++) {
      if (options.signal?.aborted) {
        summary.interrupted = true;
        this.logger.warn(`Interrupted before position ${index} - saving progress`);
        break;
      }

      const objectId = objectIds[index];
      const progress = `[${index - start + 1}/${total}]`;

      if (!controller.shouldProcess(objectId, index)) {
        summary.skipped++;
        this.logger.debug(`${progress} ${objectId} already done - skipping`);
        continue;
      }

      const { outcome, record } = await pipeline.process(objectId);
      controller.record(objectId, index, record);
      summary.processed++;

      if (outcome === "complete") {
        summary.complete++;
        this.logger.info(`${progress} ✓ ${objectId}`);
      } else {
        if (outcome === "error") summary.errors++;
        else summary.degraded++;
        this.logger.warn(`${progress} ${objectId}: ${record.status}${record.notes.length ? ` (${record.notes.join(", ")})` : ""}`);
        failedObjects?.addFailure({
          objectId,
          position: index,
          status: record.status,
          reasons: record.error ? [...record.notes, record.error] : record.notes,
          timestamp: record.scrapedAt,
        });
      }

      await controller.flush();

      if (index < end - 1 && !options.signal?.aborted) {
        await this.pacing.wait();
      }
    }

    if (summary.interrupted || end < objectIds.length) {
      await controller.flush(true);
    } else {
      await controller.retire(objectIds.length);
    }
    summary.lastCompletedIndex = controller.getPersistedIndex();

    if (failedObjects && failedObjects.getFailureCount() > 0) {
      const logPath = await failedObjects.writeLogFile();
      this.logger.info(`Degraded or failed objects written to ${logPath}`);
    }

    this.logger.info(
      `Batch done: ${summary.processed} processed (${summary.complete} complete, ${summary.degraded} degraded, ${summary.errors} errors), ${summary.skipped} skipped`,
    );
    return summary;
  }
}
