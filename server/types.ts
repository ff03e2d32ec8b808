import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { DescriptionTier, ImageEntry, ObjectRecord } from "@shared/schema";
import * as sqliteSchema from "./db/sqlite-schema";

/**
 * Typed Drizzle database client for the checkpoint store
 */
export type CheckpointDatabase = BetterSQLite3Database<typeof sqliteSchema>;

/**
 * Fields read from the Collection API object endpoint.
 * Every field is optional: the feed omits or nulls them freely.
 */
export interface StructuredRecord {
  objectID?: number;
  objectName?: string;
  title?: string;
  objectBeginDate?: number;
  objectEndDate?: number;
  objectDate?: string;
  culture?: string;
  period?: string;
  dynasty?: string;
  reign?: string;
  artistDisplayName?: string;
  artistDisplayBio?: string;
  medium?: string;
  dimensions?: string;
  classification?: string;
  department?: string;
  creditLine?: string;
  repository?: string;
  objectURL?: string;
  primaryImage?: string;
  additionalImages?: string[];
}

export interface SearchQuery {
  q: string;
  departmentId?: number;
  hasImages?: boolean;
}

/**
 * Keyed lookup into the structured feed. Best effort: a missing entry is `null`.
 */
export interface StructuredFeed {
  fetchRecord(objectId: string): Promise<StructuredRecord | null>;
  searchObjectIds(query: SearchQuery, limit?: number): Promise<string[]>;
}

export interface QuiescenceOptions {
  quietWindowMs: number;
  maxWaitMs: number;
}

/**
 * A fully rendered object page. Owned by the pipeline for one object and
 * closed afterwards.
 */
export interface RenderedDocument {
  readonly url: string;
  /** Visible heading of the object page, or the document title */
  heading(): Promise<string>;
  /** Absolute image URLs matching the selector, in document order */
  imageSources(selector: string): Promise<string[]>;
  /** Clicks the first tab whose text is exactly `label`; false when there is none */
  activateTab(label: string, timeoutMs: number): Promise<boolean>;
  /** Resolves true once the content region stops mutating, false when `maxWaitMs` elapses first */
  waitForQuiescence(options: QuiescenceOptions): Promise<boolean>;
  /** Current text of the tab content region */
  regionText(): Promise<string>;
  /** Serialized DOM at the time of the call */
  snapshot(): Promise<string>;
  close(): Promise<void>;
}

export interface PageRenderer {
  open(url: string, objectId: string): Promise<RenderedDocument>;
  close(): Promise<void>;
}

export interface FallbackDescription {
  text: string;
  tier: DescriptionTier;
}

export type TabContent = Record<string, string>;

export interface TabExtraction {
  tabs: TabContent;
  timedOut: string[];
  missing: string[];
}

export type ImageManifest = ImageEntry[];

export type PipelineOutcome = "complete" | "degraded" | "error";

/**
 * Value handed from the pipeline to the orchestrator. Object-level faults
 * never cross this boundary as exceptions.
 */
export interface PipelineResult {
  outcome: PipelineOutcome;
  record: ObjectRecord;
}

export interface ObjectProcessor {
  process(objectId: string): Promise<PipelineResult>;
}

export interface PersistedCheckpoint {
  lastCompletedIndex: number;
  total: number | null;
  finishedAt: string | null;
}

export interface CheckpointCommit {
  lastCompletedIndex: number;
  records: Array<{ position: number; record: ObjectRecord }>;
}

/**
 * Durable store behind the checkpoint controller. `load` after a restart
 * must reproduce the last committed state exactly.
 */
export interface CheckpointStore {
  load(): Promise<PersistedCheckpoint>;
  commit(batch: CheckpointCommit): Promise<void>;
  markFinished(total: number): Promise<void>;
  listRecords(): Promise<ObjectRecord[]>;
  close(): Promise<void>;
}

export interface ViewportSize {
  width: number;
  height: number;
  deviceScaleFactor?: number;
}

/**
 * Harvester configuration loaded from harvester.config.json
 */
export interface HarvesterConfig {
  feed: {
    baseUrl: string;
    timeoutMs: number;
  };
  site: {
    objectPageUrl: string;
  };
  browser: {
    executablePath?: string;
    headless: boolean;
    viewport: ViewportSize;
    userAgent: string;
  };
  navigation: {
    timeoutMs: number;
    waitUntil: "load" | "domcontentloaded" | "networkidle0" | "networkidle2";
    settleMs: number;
  };
  tabs: {
    labels: string[];
    regionHeading: string;
    ignoredLines: string[];
    clickTimeoutMs: number;
    quietWindowMs: number;
    maxWaitMs: number;
    graceMs: number;
  };
  description: {
    containerSelector: string;
    wrapperClass: string;
    ancestorDepth: number;
    spanSelector: string;
    minChars: number;
    minWords: number;
    boilerplatePatterns: string[];
  };
  images: {
    rootDir: string;
    heroSelector: string;
    gallerySelector: string;
    maxAdditional: number;
    timeoutMs: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };
  thumbnails: {
    enabled: boolean;
    dir: string;
    size: number;
  };
  checkpoint: {
    flushEvery: number;
    flushRetryAttempts: number;
    flushRetryDelayMs: number;
  };
  pacing: {
    politeDelayMs: number;
    minVarianceMs: number;
    maxVarianceMs: number;
  };
  logging: {
    file: string | null;
  };
}
