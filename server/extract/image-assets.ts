import fs from "fs";
import path from "path";
import type { ImageRole } from "@shared/schema";
import type { HarvesterConfig, ImageManifest, StructuredRecord } from "../types";
import { ImageDownloadError, getErrorMessage, isRetryable } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { withRetry } from "../utils/retry";

export type ImageSettings = HarvesterConfig["images"];

export interface PageImages {
  hero: string[];
  gallery: string[];
}

const ALLOWED_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "tif", "tiff", "bmp", "webp"]);
const DEFAULT_EXTENSION = "jpg";

/**
 * File extension from the URL path, lower-cased. Query strings and unknown
 * extensions fall back to jpg.
 */
export function parseExt(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_EXTENSION;
  }
  const dot = pathname.lastIndexOf(".");
  if (dot === -1 || dot < pathname.lastIndexOf("/")) return DEFAULT_EXTENSION;
  const ext = pathname.slice(dot + 1).toLowerCase();
  return ALLOWED_EXTENSIONS.has(ext) ? ext : DEFAULT_EXTENSION;
}

// Object IDs name a directory; keep them to a single path segment
function safeSegment(objectId: string): string {
  return objectId.replace(/[^\w.-]/g, "_");
}

export function imagePath(rootDir: string, objectId: string, index: number, url: string): string {
  const id = safeSegment(objectId);
  return path.join(rootDir, id, `${id}_${index}.${parseExt(url)}`);
}

/**
 * Notes describing images that did not make it to disk
 */
export function imageNotes(manifest: ImageManifest): string[] {
  if (manifest.length === 0) return ["no_images"];
  const notes: string[] = [];
  for (const entry of manifest) {
    if (entry.localPath) continue;
    if (entry.role === "primary") notes.push("primary_image_missing");
    notes.push(`image_failed:${entry.index}`);
  }
  return notes;
}

export class ImageAssetManager {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: QueuedLogger;

  constructor(
    private readonly settings: ImageSettings,
    options: { fetchImpl?: typeof fetch; logger?: QueuedLogger } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger("Images");
  }

  /**
   * Merges feed and page image URLs into one manifest in discovery order:
   * feed primary, page hero, feed additional, page gallery.
   */
  collect(pageImages: PageImages, structured: StructuredRecord | null): ImageManifest {
    const candidates: Array<{ url: string; role: ImageRole }> = [
      ...(structured?.primaryImage ? [{ url: structured.primaryImage, role: "primary" as const }] : []),
      ...pageImages.hero.map((url) => ({ url, role: "primary" as const })),
      ...(structured?.additionalImages ?? []).map((url) => ({ url, role: "additional" as const })),
      ...pageImages.gallery.map((url) => ({ url, role: "additional" as const })),
    ];

    const manifest: ImageManifest = [];
    const seen = new Set<string>();
    let hasPrimary = false;
    let additionalCount = 0;

    for (const candidate of candidates) {
      const url = candidate.url.trim();
      if (!/^https?:\/\//i.test(url) || seen.has(url)) continue;

      const role: ImageRole = candidate.role === "primary" && !hasPrimary ? "primary" : "additional";
      if (role === "additional") {
        if (additionalCount >= this.settings.maxAdditional) continue;
        additionalCount++;
      } else {
        hasPrimary = true;
      }

      seen.add(url);
      manifest.push({ index: manifest.length + 1, url, role, localPath: "" });
    }

    // Without a primary candidate the first image stands in for it
    if (!hasPrimary && manifest.length > 0) {
      manifest[0] = { ...manifest[0], role: "primary" };
    }

    return manifest;
  }

  /**
   * Downloads every entry sequentially. Files already on disk are kept;
   * failed entries come back with an empty `localPath`.
   */
  async materialize(manifest: ImageManifest, objectId: string): Promise<ImageManifest> {
    if (manifest.length === 0) return [];

    await fs.promises.mkdir(path.join(this.settings.rootDir, safeSegment(objectId)), { recursive: true });

    const result: ImageManifest = [];
    for (const entry of manifest) {
      const localPath = imagePath(this.settings.rootDir, objectId, entry.index, entry.url);

      if (fs.existsSync(localPath)) {
        this.logger.debug(`[${objectId}] Image ${entry.index} already on disk: ${localPath}`);
        result.push({ ...entry, localPath });
        continue;
      }

      try {
        await withRetry(() => this.download(entry.url, localPath, objectId), {
          attempts: this.settings.retryAttempts,
          baseDelayMs: this.settings.retryBaseDelayMs,
          shouldRetry: (error) => isRetryable(error),
          onRetry: (error, attempt, delay) => {
            this.logger.warn(`[${objectId}] ${getErrorMessage(error)}; retry ${attempt} in ${delay}ms`);
          },
        });
        result.push({ ...entry, localPath });
      } catch (error) {
        this.logger.error(`[${objectId}] Image ${entry.index} (${entry.role}) not saved: ${getErrorMessage(error)}`);
        result.push({ ...entry, localPath: "" });
      }
    }

    const saved = result.filter((entry) => entry.localPath).length;
    this.logger.info(`[${objectId}] Saved ${saved}/${result.length} image(s)`);
    return result;
  }

  private async download(url: string, localPath: string, objectId: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.settings.timeoutMs) });
    } catch (error) {
      throw new ImageDownloadError(objectId, url, getErrorMessage(error));
    }

    if (!response.ok) {
      throw new ImageDownloadError(objectId, url, `HTTP ${response.status}`, response.status);
    }

    let buffer: Buffer;
    try {
      buffer = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new ImageDownloadError(objectId, url, `Body read failed: ${getErrorMessage(error)}`);
    }
    const partialPath = `${localPath}.part`;
    await fs.promises.writeFile(partialPath, buffer);
    await fs.promises.rename(partialPath, localPath);
  }
}
