/** "TIF", ".tif" → "tif". */
export function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, "").toLowerCase();
}

/** Lowercase extension of a file name without the dot, or "" when there is none. */
export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0 || dot === fileName.length - 1) return "";
  return fileName.slice(dot + 1).toLowerCase();
}

export function hasRecognizedExtension(
  fileName: string,
  extensions: ReadonlySet<string>,
): boolean {
  const ext = extensionOf(fileName);
  return ext !== "" && extensions.has(ext);
}

export function toExtensionSet(extensions: readonly string[]): Set<string> {
  return new Set(extensions.map(normalizeExtension));
}
