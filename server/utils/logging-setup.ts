/**
 * Logging setup for the harvester CLI
 */

import path from 'path';
import { initializeLogQueue, getLogQueue, QueuedLogger } from './queued-logger';
import { sleep } from './retry';

/**
 * Initialize application logging. `null` keeps logging on the console only.
 */
export function setupLogging(logFile: string | null): void {
  if (!logFile) {
    initializeLogQueue();
    return;
  }

  const logFilePath = path.resolve(process.cwd(), logFile);
  initializeLogQueue(logFilePath);
  console.log(`[Logging] Log file: ${logFilePath}`);
}

export function getModuleLogger(moduleName: string): QueuedLogger {
  return new QueuedLogger(moduleName);
}

/**
 * Process-level handlers. Anything reaching them escaped the pipeline boundary.
 */
export function setupErrorHandlers(): void {
  const logger = getModuleLogger('ErrorHandler');

  process.on('uncaughtException', (error: Error) => {
    logger.error(`Uncaught Exception: ${error.message}`);
    logger.error(`Stack: ${error.stack}`);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    logger.error(`Unhandled Rejection: ${message}`);
  });
}

/**
 * Wait for all queued logs to be processed
 */
export async function flushLogs(timeoutMs: number = 5000): Promise<void> {
  const queue = getLogQueue();
  const startTime = Date.now();

  while (queue.isProcessing() || queue.getQueueSize() > 0) {
    if (Date.now() - startTime > timeoutMs) {
      console.warn('[Logging] Flush timeout - some logs may not have been written');
      break;
    }
    await sleep(50);
  }
}
