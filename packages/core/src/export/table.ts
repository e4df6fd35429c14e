import { ValidationError } from "../errors/catalog.js";
import type { MatchResult } from "../search/rank.js";

export interface ResultRow {
  name: string;
  /** Rounded to three decimals. */
  score: number;
  path: string;
}

export interface DelimitedOptions {
  /** Single character. Default: "," */
  delimiter?: string;
}

const COLUMNS = ["name", "score", "path"] as const;

export function toResultRows(results: readonly MatchResult[]): ResultRow[] {
  return results.map((result) => ({
    name: result.file.name,
    score: Math.round(result.score * 1000) / 1000,
    path: result.file.path,
  }));
}

function quoteField(value: string, delimiter: string): string {
  if (
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

/** Header line plus one line per row, CRLF-separated, fields quoted as needed. */
export function toDelimited(
  rows: readonly ResultRow[],
  options: DelimitedOptions = {},
): string {
  const delimiter = options.delimiter ?? ",";
  if (delimiter.length !== 1 || /["\r\n]/.test(delimiter)) {
    throw new ValidationError(
      "Delimiter must be a single character other than a quote or line break",
      { delimiter },
    );
  }

  const lines = [COLUMNS.join(delimiter)];
  for (const row of rows) {
    lines.push(
      [row.name, String(row.score), row.path]
        .map((field) => quoteField(field, delimiter))
        .join(delimiter),
    );
  }
  return lines.join("\r\n");
}
