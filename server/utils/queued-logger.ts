/**
 * Queue-based logging for the harvester.
 * Entries are written one at a time, to the console and optionally to a log file,
 * so output from image downloads, tab waits and checkpoint flushes never interleaves.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  source?: string;
}

export class LogQueue {
  private queue: LogEntry[] = [];
  private processing = false;
  private logFile: string = '';
  private consoleOutput = true;
  private useFileLogging = false;

  constructor(logFilePath?: string) {
    if (logFilePath) {
      this.useFileLogging = true;
      this.logFile = logFilePath;
      this.ensureLogDirectory();
    }
  }

  private ensureLogDirectory(): void {
    const dir = path.dirname(this.logFile);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  enqueue(entry: LogEntry): void {
    this.queue.push(entry);
    void this.processQueue();
  }

  private async processQueue(): Promise<void> {
    if (this.processing || this.queue.length === 0) {
      return;
    }

    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const entry = this.queue.shift();
        if (entry) {
          await this.writeLog(entry);
        }
      }
    } finally {
      this.processing = false;
    }
  }

  private async writeLog(entry: LogEntry): Promise<void> {
    const timestamp = entry.timestamp.toISOString();
    const source = entry.source ? ` [${entry.source}]` : '';
    const formatted = `${timestamp}${source} [${entry.level.toUpperCase()}] ${entry.message}`;

    if (this.consoleOutput) {
      console[entry.level](formatted);
    }

    if (this.useFileLogging) {
      try {
        await fs.promises.appendFile(this.logFile, formatted + '\n', 'utf-8');
      } catch (error) {
        console.error('[LogQueue] Failed to write to log file:', error);
      }
    }
  }

  setConsoleOutput(enabled: boolean): void {
    this.consoleOutput = enabled;
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  isProcessing(): boolean {
    return this.processing;
  }
}

let globalLogQueue: LogQueue | null = null;

/**
 * Initialize the global log queue. A second call keeps the first queue.
 */
export function initializeLogQueue(logFilePath?: string): LogQueue {
  if (!globalLogQueue) {
    globalLogQueue = new LogQueue(logFilePath);
  }
  return globalLogQueue;
}

export function getLogQueue(): LogQueue {
  if (!globalLogQueue) {
    globalLogQueue = new LogQueue();
  }
  return globalLogQueue;
}

/**
 * Console-like adapter that routes through the queue
 */
export class QueuedLogger {
  constructor(private source?: string) {}

  private write(level: LogLevel, message: string): void {
    getLogQueue().enqueue({
      level,
      message,
      timestamp: new Date(),
      source: this.source,
    });
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }
}

export function createLogger(source: string): QueuedLogger {
  return new QueuedLogger(source);
}
