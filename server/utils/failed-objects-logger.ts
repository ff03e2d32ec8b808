import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { withFileLock } from './file-locking';
import type { RecordStatus } from '../../shared/schema';

export interface FailedObject {
  runName: string;
  objectId: string;
  position: number;
  status: RecordStatus;
  reasons: string[];
  timestamp: string;
}

/**
 * Collects degraded and failed objects for one run and appends them as a
 * readable block to failed-objects/failed-objects.txt
 */
export class FailedObjectsLogger {
  private logFilePath: string;
  private currentRun: string | null = null;
  private failures: FailedObject[] = [];
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(logDir: string = path.join(process.cwd(), 'failed-objects')) {
    this.logFilePath = path.join(logDir, 'failed-objects.txt');
  }

  startRun(runName: string): void {
    this.currentRun = runName;
    this.failures = [];
  }

  addFailure(failure: Omit<FailedObject, 'runName'>): void {
    if (!this.currentRun) {
      console.warn('⚠️  Cannot add failure: no active run');
      return;
    }

    this.failures.push({ ...failure, runName: this.currentRun });
  }

  async writeLogFile(): Promise<string | null> {
    if (this.failures.length === 0) {
      return null;
    }

    // Queue the write to prevent concurrent writes
    this.writeQueue = this.writeQueue.then(() => this.appendToLogFile());
    await this.writeQueue;

    return this.logFilePath;
  }

  private async appendToLogFile(): Promise<void> {
    if (this.failures.length === 0) {
      return;
    }

    const entries = [...this.failures];

    await withFileLock(this.logFilePath, async () => {
      let content = fs.existsSync(this.logFilePath) ? '\n\n' : '';

      content += [
        '═'.repeat(80),
        `RUN: ${this.currentRun}`,
        `Degraded or failed objects: ${entries.length}`,
        `Generated: ${format(new Date(), 'yyyy-MM-dd HH:mm:ss')}`,
        '═'.repeat(80),
        '',
      ].join('\n');

      content += entries.map((failure, index) => [
        `[${index + 1}/${entries.length}] Object ID: ${failure.objectId}`,
        `Position: ${failure.position}`,
        `Status: ${failure.status}`,
        `Reasons: ${failure.reasons.length > 0 ? failure.reasons.join(', ') : '-'}`,
        `Timestamp: ${failure.timestamp}`,
        '─'.repeat(80),
      ].join('\n')).join('\n');

      await fs.promises.appendFile(this.logFilePath, content + '\n', 'utf-8');
    });

    // Clear buffer after successful write to prevent duplicates
    this.failures = this.failures.slice(entries.length);
  }

  getFailureCount(): number {
    return this.failures.length;
  }

  getFailures(): FailedObject[] {
    return [...this.failures];
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }
}
