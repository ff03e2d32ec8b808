import { stringify } from "csv-stringify/sync";
import { RECORD_FIELDS, type ExportFormat, type ObjectRecord } from "@shared/schema";
import { writeFileAtomicWithLock } from "../utils/file-locking";
import { createLogger, type QueuedLogger } from "../utils/queued-logger";
import { sanitize } from "../utils/sanitize";

// Tab labels and the columns that carry their text
export const TAB_COLUMNS: ReadonlyArray<{ label: string; key: string }> = [
  { label: "Overview", key: "artworkOverviewText" },
  { label: "Signatures, Inscriptions, and Markings", key: "signaturesInscriptionsMarkingsText" },
  { label: "Provenance", key: "provenanceText" },
  { label: "References", key: "referencesText" },
];

export const ADDITIONAL_IMAGE_SLOTS = 8;

export function legacyColumns(additionalSlots: number = ADDITIONAL_IMAGE_SLOTS): string[] {
  const columns = [
    "primaryImageThumbnail",
    ...RECORD_FIELDS,
    "longDescription",
    ...TAB_COLUMNS.map((tab) => tab.key),
    "primaryImageURL",
    "primaryImageLocalPath",
  ];
  for (let i = 1; i <= additionalSlots; i++) {
    columns.push(`additionalImage_${i}_URL`, `additionalImage_${i}_LocalPath`);
  }
  columns.push("status", "notes", "descriptionTier");
  return columns;
}

/**
 * Flattens a record into the column layout of the legacy spreadsheet export
 */
export function toLegacyRow(record: ObjectRecord, additionalSlots: number = ADDITIONAL_IMAGE_SLOTS): Record<string, string> {
  const row: Record<string, string> = { primaryImageThumbnail: record.primaryThumbnailPath };

  for (const field of RECORD_FIELDS) {
    row[field] = record.fields[field] ?? "";
  }
  row.longDescription = record.description;
  for (const tab of TAB_COLUMNS) {
    row[tab.key] = record.tabs[tab.label] ?? "";
  }

  const primary = record.images.find((image) => image.role === "primary");
  row.primaryImageURL = primary?.url ?? "";
  row.primaryImageLocalPath = primary?.localPath ?? "";

  const additional = record.images.filter((image) => image.role === "additional");
  for (let i = 1; i <= additionalSlots; i++) {
    const image = additional[i - 1];
    row[`additionalImage_${i}_URL`] = image?.url ?? "";
    row[`additionalImage_${i}_LocalPath`] = image?.localPath ?? "";
  }

  row.status = record.status;
  row.notes = record.notes.join("; ");
  row.descriptionTier = record.descriptionTier;

  for (const key of Object.keys(row)) {
    row[key] = sanitize(row[key]);
  }
  return row;
}

export function renderCsv(records: readonly ObjectRecord[]): string {
  const columns = legacyColumns();
  return stringify(
    records.map((record) => toLegacyRow(record)),
    { header: true, columns: columns.map((key) => ({ key, header: key })) },
  );
}

export function renderJson(records: readonly ObjectRecord[], exportedAt: Date): string {
  return JSON.stringify({ exportedAt: exportedAt.toISOString(), total: records.length, records }, null, 2);
}

export class RecordExporter {
  private readonly logger: QueuedLogger;

  constructor(logger?: QueuedLogger) {
    this.logger = logger ?? createLogger("Export");
  }

  async export(records: readonly ObjectRecord[], outputPath: string, format: ExportFormat): Promise<void> {
    const content = format === "csv" ? renderCsv(records) : renderJson(records, new Date());
    await writeFileAtomicWithLock(outputPath, content);
    this.logger.info(`Exported ${records.length} record(s) to ${outputPath} (${format})`);
  }
}
