#!/usr/bin/env tsx
import { ZodError } from "zod";
import { CheckpointController } from "./checkpoint/checkpoint-controller";
import { SqliteCheckpointStore } from "./checkpoint/sqlite-checkpoint-store";
import { USAGE, parseCliOptions, type CliInvocation } from "./cli-options";
import { DescriptionResolver } from "./extract/description-resolver";
import { ImageAssetManager } from "./extract/image-assets";
import { ObjectExtractionPipeline } from "./extract/pipeline";
import { TabContentExtractor } from "./extract/tab-extractor";
import { ThumbnailWriter } from "./extract/thumbnails";
import { RecordExporter } from "./export/record-exporter";
import { MetCollectionFeed, readObjectIdsFile } from "./feed/met-collection-feed";
import { BatchOrchestrator } from "./orchestrator";
import { PuppeteerRenderer } from "./render/puppeteer-renderer";
import { loadHarvesterConfig } from "./utils/config-loader";
import { checkAllDependencies } from "./utils/dependency-check";
import { CheckpointWriteError, getErrorMessage } from "./utils/error-types";
import { FailedObjectsLogger } from "./utils/failed-objects-logger";
import { withFileLock } from "./utils/file-locking";
import { flushLogs, getModuleLogger, setupErrorHandlers, setupLogging } from "./utils/logging-setup";
import { WaitTimeHelper } from "./utils/wait-time-helper";

async function main(): Promise<number> {
  let invocation: CliInvocation;
  try {
    invocation = parseCliOptions(process.argv.slice(2));
  } catch (error) {
    const message =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
        : getErrorMessage(error);
    console.error(`❌ ${message}\n\n${USAGE}`);
    return 1;
  }

  if (invocation.help) {
    console.log(USAGE);
    return 0;
  }

  const { options } = invocation;
  const config = loadHarvesterConfig(invocation.configPath);
  setupLogging(config.logging.file);
  setupErrorHandlers();
  const logger = getModuleLogger("Harvest");

  if (!checkAllDependencies(config)) {
    return 1;
  }

  const feed = new MetCollectionFeed({ baseUrl: config.feed.baseUrl, timeoutMs: config.feed.timeoutMs });
  const objectIds = options.idsFile
    ? await readObjectIdsFile(options.idsFile)
    : await feed.searchObjectIds({ q: options.query, departmentId: options.departmentId ?? undefined, hasImages: options.hasImages });

  if (objectIds.length === 0) {
    logger.warn("No object IDs to harvest");
    return 0;
  }
  logger.info(`${objectIds.length} object ID(s) queued`);

  const renderer = new PuppeteerRenderer(config);
  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received - finishing the current object and saving progress`);
    abort.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    // One harvester per checkpoint database
    return await withFileLock(options.checkpointPath, async () => {
      const store = SqliteCheckpointStore.open(options.checkpointPath, options.runName);
      try {
        const controller = await CheckpointController.open(store, {
          ...config.checkpoint,
          flushEvery: options.flushEvery ?? config.checkpoint.flushEvery,
        });

        const pipeline = new ObjectExtractionPipeline({
          feed,
          renderer,
          tabs: new TabContentExtractor(config.tabs),
          descriptions: new DescriptionResolver(config.description),
          images: new ImageAssetManager({ ...config.images, rootDir: options.imageRoot ?? config.images.rootDir }),
          thumbnails: config.thumbnails.enabled ? new ThumbnailWriter(config.thumbnails) : undefined,
          config,
        });

        const orchestrator = new BatchOrchestrator({
          pipeline,
          controller,
          runName: options.runName,
          failedObjects: new FailedObjectsLogger(),
          pacing: WaitTimeHelper.createFromConfig(
            config.pacing.politeDelayMs,
            config.pacing.minVarianceMs,
            config.pacing.maxVarianceMs,
          ),
        });

        const summary = await orchestrator.run(objectIds, {
          startOffset: options.startOffset,
          limit: options.limit,
          signal: abort.signal,
        });

        await new RecordExporter().export(await store.listRecords(), options.output, options.format);
        if (summary.interrupted) {
          logger.warn(`Stopped early; rerun to resume after position ${summary.lastCompletedIndex}`);
          return 130;
        }
        return 0;
      } finally {
        await store.close();
      }
    });
  } catch (error) {
    if (error instanceof CheckpointWriteError) {
      logger.error(`❌ Halting: ${error.message}. Progress up to the last saved checkpoint is kept.`);
      return 2;
    }
    logger.error(`❌ Harvest failed: ${getErrorMessage(error)}`);
    return 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await renderer.close().catch((error: unknown) => {
      logger.warn(`Failed to close browser: ${getErrorMessage(error)}`);
    });
  }
}

main()
  .then(async (code) => {
    await flushLogs();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error("❌ Fatal:", error);
    await flushLogs();
    process.exit(1);
  });
