import { extensionOf } from "./extensions.js";

const SEPARATORS = /[_\-.\s]+/g;

/** Drops one trailing extension when it is in `extensions`. */
export function stripExtension(
  name: string,
  extensions: ReadonlySet<string>,
): string {
  const ext = extensionOf(name);
  if (ext === "" || !extensions.has(ext)) return name;
  return name.slice(0, name.length - ext.length - 1);
}

/**
 * Comparison form of a file name or query: recognized extension stripped,
 * separators (underscore, hyphen, period, whitespace) removed, lowercased.
 *
 * "scan_HH001_final.TIF" → "scanhh001final"
 */
export function normalizeName(
  name: string,
  extensions: ReadonlySet<string>,
): string {
  return stripExtension(name.trim(), extensions)
    .replace(SEPARATORS, "")
    .toLowerCase();
}
