/**
 * File locking for files shared between harvester processes
 * (the failed-objects log and the checkpoint database)
 */

import * as Lockfile from 'proper-lockfile';
import fs from 'fs';
import path from 'path';

export interface FileLockOptions {
  staleMs?: number;
  maxRetries?: number;
  retryMinTimeout?: number;
  retryMaxTimeout?: number;
}

/**
 * Acquires a lock on a file and executes a callback
 * Automatically releases lock when callback completes
 */
export async function withFileLock<T>(
  filePath: string,
  callback: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const release = await Lockfile.lock(filePath, {
    stale: options.staleMs ?? 30000,
    retries: {
      retries: options.maxRetries ?? 5,
      minTimeout: options.retryMinTimeout ?? 100,
      maxTimeout: options.retryMaxTimeout ?? 1000,
    },
    realpath: false,
    lockfilePath: `${filePath}.lock`,
  }).catch((error: unknown) => {
    console.error(`[FileLock] Failed to acquire lock for ${filePath}:`, error);
    throw error;
  });

  try {
    return await callback();
  } finally {
    try {
      await release();
    } catch (unlockError) {
      console.warn(`[FileLock] Failed to release lock for ${filePath}:`, unlockError);
    }
  }
}

/**
 * Write a file through a sibling temp file and a rename, under the file's lock
 */
export async function writeFileAtomicWithLock(filePath: string, content: string): Promise<void> {
  await withFileLock(filePath, async () => {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tempPath, content, 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  });
}
