import { z } from "zod";
import type { Logger } from "pino";
import { ValidationError } from "../errors/catalog.js";
import type { IndexStore } from "../storage/index/store.js";

/** Header row plus data rows, as handed over by the CSV-parsing collaborator. */
export const IdentifierTableSchema = z.object({
  headers: z.array(z.string()),
  rows: z.array(z.array(z.string())),
});

export type IdentifierTable = z.infer<typeof IdentifierTableSchema>;

export interface ImportDeps {
  store: IndexStore;
  logger: Logger;
}

export interface ImportOptions {
  /** Timestamp source for importedAt. */
  now?: () => string;
}

export interface TableImportOptions extends ImportOptions {
  /** Identifier column header, matched trimmed and case-insensitively. */
  column: string;
}

export interface ImportReport {
  processed: number;
  imported: number;
  /** Duplicates, whether already stored or repeated within the input. */
  skipped: number;
  /** Empty values. */
  rejected: number;
  errors: string[];
}

export function findIdentifierColumn(
  headers: readonly string[],
  column: string,
): number {
  const wanted = column.trim().toLowerCase();
  const index = headers.findIndex((h) => h.trim().toLowerCase() === wanted);
  if (index === -1) {
    throw new ValidationError(
      `Identifier table must contain a '${column}' column`,
      { column, headers: [...headers] },
    );
  }
  return index;
}

/**
 * Trims and upserts one identifier per value. `lineOffset` maps a value's
 * position to the line number reported for rejected values.
 */
function importValues(
  deps: ImportDeps,
  values: readonly (string | undefined)[],
  options: ImportOptions,
  lineOffset: number,
): ImportReport {
  const logger = deps.logger.child({ component: "importer" });
  const now = options.now ?? (() => new Date().toISOString());

  const accepted: string[] = [];
  const errors: string[] = [];
  for (const [i, raw] of values.entries()) {
    const value = raw?.trim() ?? "";
    if (value === "") {
      errors.push(`Line ${i + lineOffset}: Empty identifier value`);
      continue;
    }
    accepted.push(value);
  }

  const { inserted, skipped } = deps.store.upsertReferenceIds(accepted, now());

  const report: ImportReport = {
    processed: values.length,
    imported: inserted,
    skipped,
    rejected: errors.length,
    errors,
  };

  logger.info(
    {
      processed: report.processed,
      imported: report.imported,
      skipped: report.skipped,
      rejected: report.rejected,
    },
    "Identifier import complete",
  );
  return report;
}

/** Imports a plain list of raw identifier strings. */
export function importIdentifierValues(
  deps: ImportDeps,
  values: readonly string[],
  options: ImportOptions = {},
): ImportReport {
  return importValues(deps, values, options, 1);
}

/**
 * Imports the identifier column of a parsed table. The column is located
 * before anything is written; a missing column or empty table leaves the
 * store untouched.
 */
export function importIdentifierTable(
  deps: ImportDeps,
  input: unknown,
  options: TableImportOptions,
): ImportReport {
  const parsed = IdentifierTableSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Malformed identifier table", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  const table = parsed.data;
  const columnIndex = findIdentifierColumn(table.headers, options.column);
  if (table.rows.length === 0) {
    throw new ValidationError("Identifier table does not contain any records");
  }

  // Header is line 1, so the first record is line 2
  return importValues(
    deps,
    table.rows.map((row) => row[columnIndex]),
    options,
    2,
  );
}
