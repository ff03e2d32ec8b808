import fs from "fs";
import path from "path";
import sharp from "sharp";
import type { HarvesterConfig } from "../types";
import { getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";

export type ThumbnailSettings = HarvesterConfig["thumbnails"];

/**
 * Writes a small JPEG preview of an object's primary image
 */
export class ThumbnailWriter {
  private readonly logger: QueuedLogger;

  constructor(private readonly settings: ThumbnailSettings, logger?: QueuedLogger) {
    this.logger = logger ?? createLogger("Thumbnails");
  }

  /**
   * Resolves to the thumbnail path, or "" when it could not be produced.
   */
  async create(sourcePath: string, objectId: string): Promise<string> {
    if (!this.settings.enabled || !sourcePath) return "";

    const outputPath = path.join(this.settings.dir, `${objectId.replace(/[^\w.-]/g, "_")}.jpg`);
    try {
      await fs.promises.mkdir(this.settings.dir, { recursive: true });
      await sharp(sourcePath)
        .resize(this.settings.size, this.settings.size, { fit: "inside", withoutEnlargement: true })
        .jpeg({ quality: 82, progressive: true })
        .toFile(outputPath);
      return outputPath;
    } catch (error) {
      this.logger.warn(`[${objectId}] Thumbnail failed: ${getErrorMessage(error)}`);
      return "";
    }
  }
}
