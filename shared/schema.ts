import { z } from "zod";

export const exportFormatSchema = z.enum(["json", "csv"]);
export type ExportFormat = z.infer<typeof exportFormatSchema>;

export const harvestOptionsSchema = z
  .object({
    query: z.string().min(1).default("sword"),
    departmentId: z.number().int().positive().nullable().default(4),
    hasImages: z.boolean().default(true),
    idsFile: z.string().min(1).optional(),
    limit: z.number().int().min(1).optional(),
    startOffset: z.number().int().min(0).default(0),
    flushEvery: z.number().int().min(1).max(10000).optional(),
    output: z.string().min(1).default("met_objects_full.csv"),
    format: exportFormatSchema.default("csv"),
    checkpointPath: z.string().min(1).default("./data/checkpoint.db"),
    runName: z.string().min(1).default("default"),
    imageRoot: z.string().min(1).optional(),
  })
  .strict();

export type HarvestOptions = z.infer<typeof harvestOptionsSchema>;

export const descriptionTierSchema = z.enum([
  "framework-container",
  "descriptive-span",
  "meta-description",
  "og-description",
  "longest-paragraph",
  "none",
]);

export type DescriptionTier = z.infer<typeof descriptionTierSchema>;

export const imageRoleSchema = z.enum(["primary", "additional"]);
export type ImageRole = z.infer<typeof imageRoleSchema>;

export const imageEntrySchema = z.object({
  index: z.number().int().min(1),
  url: z.string(),
  role: imageRoleSchema,
  localPath: z.string(),
});

export type ImageEntry = z.infer<typeof imageEntrySchema>;

export const recordStatusSchema = z.enum([
  "complete",
  "partial",
  "render_failed",
  "extraction_error",
]);

export type RecordStatus = z.infer<typeof recordStatusSchema>;

// Structured fields exported per object, in column order
export const RECORD_FIELDS = [
  "objectID",
  "objectName",
  "title",
  "objectBeginDate",
  "objectEndDate",
  "objectDate",
  "culture",
  "period",
  "dynasty",
  "reign",
  "artistDisplayName",
  "artistDisplayBio",
  "medium",
  "dimensions",
  "classification",
  "department",
  "creditLine",
  "repository",
  "objectURL",
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

export const objectRecordSchema = z.object({
  objectId: z.string(),
  status: recordStatusSchema,
  notes: z.array(z.string()),
  fields: z.record(z.string()),
  description: z.string(),
  descriptionTier: descriptionTierSchema,
  tabs: z.record(z.string()),
  images: z.array(imageEntrySchema),
  primaryThumbnailPath: z.string(),
  error: z.string().nullable(),
  scrapedAt: z.string(),
});

export type ObjectRecord = z.infer<typeof objectRecordSchema>;
