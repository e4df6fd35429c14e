import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  scan: {
    extensions: ["tif", "tiff"],
    batchSize: 1_000,
  },
  import: {
    column: "hh_id",
  },
  search: {
    threshold: 0.7,
    pageSize: 500,
    threads: "auto" as const,
  },
};

export const MIN_THRESHOLD = 0.5;
export const MAX_THRESHOLD = 1;

/** "TIF", ".tif" and " tif " all become "tif". */
const ExtensionSchema = z
  .string()
  .trim()
  .transform((ext) => ext.replace(/^\./, "").toLowerCase())
  .pipe(z.string().regex(/^[a-z0-9]+$/, "Extension must be alphanumeric"));

export const ThresholdSchema = z.number().min(MIN_THRESHOLD).max(MAX_THRESHOLD);

export const AppConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  scan: z
    .object({
      extensions: z
        .array(ExtensionSchema)
        .min(1)
        .default(DEFAULTS.scan.extensions),
      batchSize: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.scan.batchSize)
        .describe("Files upserted per transaction while scanning"),
    })
    .default(DEFAULTS.scan),
  import: z
    .object({
      column: z
        .string()
        .trim()
        .min(1)
        .default(DEFAULTS.import.column)
        .describe("Header of the identifier column in imported tables"),
    })
    .default(DEFAULTS.import),
  search: z
    .object({
      threshold: ThresholdSchema.default(DEFAULTS.search.threshold),
      pageSize: z.number().int().min(1).default(DEFAULTS.search.pageSize),
      threads: z
        .union([z.literal("auto"), z.number().int().min(0)])
        .default(DEFAULTS.search.threads)
        .describe(
          'Scoring worker threads; "auto" sizes the pool to the machine, 0 scores on the main thread',
        ),
    })
    .default(DEFAULTS.search),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LoggingConfig = AppConfig["logging"];
export type ScanConfig = AppConfig["scan"];
export type SearchConfig = AppConfig["search"];
