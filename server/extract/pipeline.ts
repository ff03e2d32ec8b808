import { RECORD_FIELDS, type ObjectRecord, type RecordStatus } from "@shared/schema";
import type {
  FallbackDescription,
  HarvesterConfig,
  ImageManifest,
  ObjectProcessor,
  PageRenderer,
  PipelineOutcome,
  PipelineResult,
  RenderedDocument,
  StructuredFeed,
  StructuredRecord,
  TabContent,
} from "../types";
import { NavigationError, getErrorMessage } from "../utils/error-types";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { sanitizeDeep } from "../utils/sanitize";
import { NO_DESCRIPTION, type DescriptionResolver } from "./description-resolver";
import { imageNotes, type ImageAssetManager } from "./image-assets";
import type { TabContentExtractor } from "./tab-extractor";
import type { ThumbnailWriter } from "./thumbnails";

export interface PipelineDependencies {
  feed: StructuredFeed;
  renderer: PageRenderer;
  tabs: TabContentExtractor;
  descriptions: DescriptionResolver;
  images: ImageAssetManager;
  thumbnails?: ThumbnailWriter;
  config: Pick<HarvesterConfig, "site" | "tabs" | "images">;
  logger?: QueuedLogger;
  now?: () => Date;
}

interface RecordParts {
  objectId: string;
  status: RecordStatus;
  notes: string[];
  structured: StructuredRecord | null;
  heading?: string;
  pageUrl?: string;
  description?: FallbackDescription;
  tabs?: TabContent;
  images?: ImageManifest;
  primaryThumbnailPath?: string;
  error?: string | null;
}

export function objectPageUrl(template: string, objectId: string): string {
  return template.replace("{id}", encodeURIComponent(objectId));
}

/**
 * Feed values as strings in column order. The title falls back to the page
 * heading and the object URL to the rendered page.
 */
export function structuredFields(
  objectId: string,
  structured: StructuredRecord | null,
  page: { heading?: string; url?: string } = {},
): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const key of RECORD_FIELDS) {
    const value = structured?.[key];
    fields[key] = value === undefined ? "" : String(value);
  }
  fields.objectID = fields.objectID || objectId;
  fields.title = fields.title || page.heading || "";
  fields.objectURL = fields.objectURL || page.url || "";
  return fields;
}

/**
 * One object end to end: feed, render, tabs, description, images. Expected
 * failures degrade the record; anything else becomes an `extraction_error`
 * record. Nothing is thrown to the caller.
 */
export class ObjectExtractionPipeline implements ObjectProcessor {
  private readonly logger: QueuedLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.logger = deps.logger ?? createLogger("Pipeline");
    this.now = deps.now ?? (() => new Date());
  }

  async process(objectId: string): Promise<PipelineResult> {
    const { feed, renderer, tabs, descriptions, images, thumbnails, config } = this.deps;
    let structured: StructuredRecord | null = null;
    let document: RenderedDocument | null = null;

    try {
      structured = await feed.fetchRecord(objectId);
      const notes: string[] = structured ? [] : ["feed_missing"];
      const url = structured?.objectURL || objectPageUrl(config.site.objectPageUrl, objectId);

      try {
        document = await renderer.open(url, objectId);
      } catch (error) {
        if (!(error instanceof NavigationError)) throw error;
        this.logger.warn(`[${objectId}] ${error.message} - keeping feed fields only`);
        return this.result("degraded", {
          objectId,
          status: "render_failed",
          notes,
          structured,
          error: error.message,
        });
      }

      const heading = await document.heading();

      const tabResult = await tabs.extractTabs(document, config.tabs.labels, objectId);
      notes.push(...tabResult.missing.map((label) => `tab_missing:${label}`));
      notes.push(...tabResult.timedOut.map((label) => `tab_timeout:${label}`));

      const description = descriptions.resolveHtml(await document.snapshot());
      if (description.tier === "none") notes.push("description_not_found");

      const pageImages = {
        hero: await document.imageSources(config.images.heroSelector),
        gallery: await document.imageSources(config.images.gallerySelector),
      };
      const manifest = await images.materialize(images.collect(pageImages, structured), objectId);
      notes.push(...imageNotes(manifest));

      const primary = manifest.find((entry) => entry.role === "primary");
      const primaryThumbnailPath =
        thumbnails && primary?.localPath ? await thumbnails.create(primary.localPath, objectId) : "";

      return this.result(notes.length === 0 ? "complete" : "degraded", {
        objectId,
        status: notes.length === 0 ? "complete" : "partial",
        notes,
        structured,
        heading,
        pageUrl: document.url,
        description,
        tabs: tabResult.tabs,
        images: manifest,
        primaryThumbnailPath,
      });
    } catch (error) {
      this.logger.error(`[${objectId}] Extraction failed: ${getErrorMessage(error)}`);
      return this.result("error", {
        objectId,
        status: "extraction_error",
        notes: structured ? [] : ["feed_missing"],
        structured,
        error: getErrorMessage(error),
      });
    } finally {
      if (document) {
        try {
          await document.close();
        } catch (closeError) {
          this.logger.warn(`[${objectId}] Failed to close page: ${getErrorMessage(closeError)}`);
        }
      }
    }
  }

  private result(outcome: PipelineOutcome, parts: RecordParts): PipelineResult {
    const record: ObjectRecord = {
      objectId: parts.objectId,
      status: parts.status,
      notes: parts.notes,
      fields: structuredFields(parts.objectId, parts.structured, { heading: parts.heading, url: parts.pageUrl }),
      description: (parts.description ?? NO_DESCRIPTION).text,
      descriptionTier: (parts.description ?? NO_DESCRIPTION).tier,
      tabs: parts.tabs ?? {},
      images: parts.images ?? [],
      primaryThumbnailPath: parts.primaryThumbnailPath ?? "",
      error: parts.error ?? null,
      scrapedAt: this.now().toISOString(),
    };
    return { outcome, record: sanitizeDeep(record) };
  }
}
