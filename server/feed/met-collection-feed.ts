import fs from "fs";
import { z } from "zod";
import type { SearchQuery, StructuredFeed, StructuredRecord } from "../types";
import { FeedError, getErrorMessage, isRetryable } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { withRetry } from "../utils/retry";

// A field of the wrong type or null reads as absent instead of failing the whole record
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema
    .nullish()
    .catch(undefined)
    .transform((value) => value ?? undefined);
}

const structuredRecordSchema: z.ZodType<StructuredRecord, z.ZodTypeDef, unknown> = z.object({
  objectID: lenient(z.number().int()),
  objectName: lenient(z.string()),
  title: lenient(z.string()),
  objectBeginDate: lenient(z.number()),
  objectEndDate: lenient(z.number()),
  objectDate: lenient(z.string()),
  culture: lenient(z.string()),
  period: lenient(z.string()),
  dynasty: lenient(z.string()),
  reign: lenient(z.string()),
  artistDisplayName: lenient(z.string()),
  artistDisplayBio: lenient(z.string()),
  medium: lenient(z.string()),
  dimensions: lenient(z.string()),
  classification: lenient(z.string()),
  department: lenient(z.string()),
  creditLine: lenient(z.string()),
  repository: lenient(z.string()),
  objectURL: lenient(z.string()),
  primaryImage: lenient(z.string()),
  additionalImages: lenient(z.array(z.string())),
});

const searchResponseSchema = z.object({
  total: z.number().int().default(0),
  objectIDs: z.array(z.number().int()).nullable().default(null),
});

export interface MetCollectionFeedOptions {
  baseUrl: string;
  timeoutMs: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  fetchImpl?: typeof fetch;
  logger?: QueuedLogger;
}

/**
 * Collection API client. Object lookups are best effort: every failure is
 * logged and reported as a missing entry.
 */
export class MetCollectionFeed implements StructuredFeed {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: QueuedLogger;

  constructor(private readonly options: MetCollectionFeedOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger("Feed");
  }

  async fetchRecord(objectId: string): Promise<StructuredRecord | null> {
    const url = `${this.options.baseUrl}/objects/${encodeURIComponent(objectId)}`;

    try {
      const payload = await this.getJson(url, objectId);
      if (payload === null) {
        this.logger.warn(`[${objectId}] No feed entry (404)`);
        return null;
      }

      const result = structuredRecordSchema.safeParse(payload);
      if (!result.success) {
        this.logger.warn(`[${objectId}] Feed entry is not an object record`);
        return null;
      }
      return result.data;
    } catch (error) {
      this.logger.warn(`[${objectId}] Feed lookup failed: ${getErrorMessage(error)}`);
      return null;
    }
  }

  async searchObjectIds(query: SearchQuery, limit?: number): Promise<string[]> {
    const params = new URLSearchParams({ q: query.q });
    if (query.hasImages !== undefined) params.set("hasImages", String(query.hasImages));
    if (query.departmentId !== undefined) params.set("departmentId", String(query.departmentId));

    const payload = await this.getJson(`${this.options.baseUrl}/search?${params.toString()}`, "search");
    const parsed = searchResponseSchema.parse(payload ?? {});
    const ids = (parsed.objectIDs ?? []).map((id) => String(id));
    this.logger.info(`Search "${query.q}" returned ${parsed.total} object(s)`);
    return limit !== undefined ? ids.slice(0, limit) : ids;
  }

  /**
   * GET with timeout and bounded retries. Resolves `null` on 404.
   */
  private async getJson(url: string, objectId: string): Promise<unknown> {
    return withRetry(
      async () => {
        let response: Response;
        try {
          response = await this.fetchImpl(url, {
            headers: { Accept: "application/json" },
            signal: AbortSignal.timeout(this.options.timeoutMs),
          });
        } catch (error) {
          throw new FeedError(objectId, getErrorMessage(error));
        }

        if (response.status === 404) {
          return null;
        }
        if (response.status === 429 || response.status >= 500) {
          throw new FeedError(objectId, `HTTP ${response.status}`, response.status);
        }
        if (!response.ok) {
          throw new Error(`Feed request failed: HTTP ${response.status} for ${url}`);
        }

        try {
          const body: unknown = await response.json();
          return body;
        } catch (error) {
          throw new Error(`Feed returned invalid JSON for ${url}: ${getErrorMessage(error)}`);
        }
      },
      {
        attempts: this.options.retryAttempts ?? 2,
        baseDelayMs: this.options.retryBaseDelayMs ?? 1000,
        shouldRetry: (error) => isRetryable(error),
        onRetry: (error, attempt, delay) => {
          this.logger.warn(`[${objectId}] ${getErrorMessage(error)}; retry ${attempt} in ${delay}ms`);
        },
      },
    );
  }
}

/**
 * Reads a newline-separated list of object IDs; blank lines and `#` comments are skipped.
 */
export async function readObjectIdsFile(filePath: string): Promise<string[]> {
  const content = await fs.promises.readFile(filePath, "utf-8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
