/**
 * Error classification for the harvester
 * Distinguishes between retryable (TransientError) and non-retryable (PermanentError) failures
 */

/**
 * PermanentError - Do NOT retry.
 * Examples: navigation timeouts, HTTP 404 on an image, malformed feed payloads
 */
export class PermanentError extends Error {
  constructor(message: string, public readonly objectId: string) {
    super(message);
    this.name = 'PermanentError';
  }
}

/**
 * TransientError - Can be retried. Temporary failure.
 * Examples: network glitches, request timeouts, HTTP 429/5xx
 */
export class TransientError extends Error {
  constructor(message: string, public readonly objectId: string) {
    super(message);
    this.name = 'TransientError';
  }
}

/**
 * NavigationError - the object page could not be rendered. Degrades the object to feed-only data.
 */
export class NavigationError extends PermanentError {
  constructor(objectId: string, message: string, public readonly httpStatus?: number) {
    super(`Navigation failed: ${message}`, objectId);
    this.name = 'NavigationError';
  }
}

/**
 * FeedError - the structured feed request failed
 */
export class FeedError extends TransientError {
  constructor(objectId: string, message: string, public readonly httpStatus?: number) {
    super(`Feed request failed: ${message}`, objectId);
    this.name = 'FeedError';
  }
}

/**
 * ImageDownloadError - retryable unless the server answered with a definitive 4xx
 */
export class ImageDownloadError extends TransientError {
  constructor(
    objectId: string,
    public readonly url: string,
    message: string,
    public readonly httpStatus?: number,
  ) {
    super(`Image download failed (${url}): ${message}`, objectId);
    this.name = 'ImageDownloadError';
  }

  get permanent(): boolean {
    return this.httpStatus !== undefined && this.httpStatus >= 400 && this.httpStatus < 500 && this.httpStatus !== 429;
  }
}

/**
 * CheckpointWriteError - the durable store rejected a flush. Halts the batch.
 */
export class CheckpointWriteError extends Error {
  constructor(message: string, public readonly attempts: number, public readonly lastError?: unknown) {
    super(message);
    this.name = 'CheckpointWriteError';
  }
}

/**
 * Check if error is retryable
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof ImageDownloadError) return !error.permanent;
  return error instanceof TransientError;
}

/**
 * Helper to get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
