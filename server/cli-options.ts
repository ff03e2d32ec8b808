import { parseArgs } from "util";
import { harvestOptionsSchema, type HarvestOptions } from "@shared/schema";

export interface CliInvocation {
  options: HarvestOptions;
  configPath?: string;
  help: boolean;
}

export const USAGE = `Usage: met-harvest [options]

  --query <text>             search term for the Collection API (default: sword)
  --department <id>          search department (default: 4, Arms and Armor)
  --all-departments          search every department
  --include-without-images   also harvest objects the API lists without images
  --ids-file <path>          newline-separated object IDs instead of a search
  --limit <n>                process at most n objects
  --start-offset <n>         first position in the ID list (env START_OFFSET)
  --flush-every <n>          records per checkpoint write
  --output <path>            export file (env OUTPUT_PATH)
  --format <csv|json>        export format (default: csv)
  --checkpoint <path>        checkpoint database (env CHECKPOINT_DB_PATH)
  --run <name>               checkpoint run name (default: default)
  --images-dir <path>        image root directory (env IMAGE_ROOT_DIR)
  --config <path>            harvester.config.json location
  -h, --help                 show this help`;

function toNumber(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number(value);
}

/**
 * Parses argv into validated harvest options. Flags win over environment
 * variables; anything invalid throws (a ZodError for bad values).
 */
export function parseCliOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): CliInvocation {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      query: { type: "string" },
      department: { type: "string" },
      "all-departments": { type: "boolean", default: false },
      "include-without-images": { type: "boolean", default: false },
      "ids-file": { type: "string" },
      limit: { type: "string" },
      "start-offset": { type: "string" },
      "flush-every": { type: "string" },
      output: { type: "string" },
      format: { type: "string" },
      checkpoint: { type: "string" },
      run: { type: "string" },
      "images-dir": { type: "string" },
      config: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const options = harvestOptionsSchema.parse({
    query: values.query,
    departmentId: values["all-departments"] ? null : toNumber(values.department),
    hasImages: !values["include-without-images"],
    idsFile: values["ids-file"],
    limit: toNumber(values.limit),
    startOffset: toNumber(values["start-offset"] ?? env.START_OFFSET),
    flushEvery: toNumber(values["flush-every"]),
    output: values.output ?? (env.OUTPUT_PATH || undefined),
    format: values.format,
    checkpointPath: values.checkpoint ?? (env.CHECKPOINT_DB_PATH || undefined),
    runName: values.run,
    imageRoot: values["images-dir"] ?? (env.IMAGE_ROOT_DIR || undefined),
  });

  return { options, configPath: values.config, help: values.help === true };
}
