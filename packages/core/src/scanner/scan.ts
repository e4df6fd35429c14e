import { stat, access, constants } from "node:fs/promises";
import { basename, resolve } from "node:path";
import fg from "fast-glob";
import type { Logger } from "pino";
import { ScanError, errorMessage } from "../errors/catalog.js";
import type { IndexStore } from "../storage/index/store.js";
import {
  hasRecognizedExtension,
  toExtensionSet,
} from "../search/extensions.js";

export interface DiscoveredFile {
  path: string;
  name: string;
}

export interface ScanOptions {
  /** Recognized image-container extensions, without the dot. */
  extensions: readonly string[];
  /** Files upserted per transaction. Default: 1000 */
  batchSize?: number;
  /** Timestamp source for discoveredAt. */
  now?: () => string;
  /** Called after each committed batch. */
  onProgress?: (processed: number, total: number) => void;
}

export interface ScanDeps {
  store: IndexStore;
  logger: Logger;
}

export interface ScanReport {
  root: string;
  /** Matching files found on disk during this scan. */
  discovered: number;
  /** Of those, how many were new to the index. */
  indexed: number;
  /** Of those, how many were already indexed. */
  existing: number;
}

async function assertReadableDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (err) {
    const code =
      err instanceof Error && "code" in err ? String(err.code) : undefined;
    const message =
      code === "ENOENT"
        ? `Directory does not exist: ${root}`
        : `Cannot access directory ${root}: ${errorMessage(err)}`;
    throw new ScanError(message, { root, code }, { cause: err });
  }

  if (!isDirectory) {
    throw new ScanError(`Not a directory: ${root}`, { root });
  }

  try {
    await access(root, constants.R_OK | constants.X_OK);
  } catch (err) {
    throw new ScanError(`Directory is not readable: ${root}`, { root }, {
      cause: err,
    });
  }
}

/**
 * Recursively lists files under `root` whose extension is recognized.
 * Symbolic links are followed; unreadable subdirectories are skipped.
 */
export async function scanDirectory(
  root: string,
  options: Pick<ScanOptions, "extensions">,
): Promise<DiscoveredFile[]> {
  const absoluteRoot = resolve(root);
  await assertReadableDirectory(absoluteRoot);

  const extensions = toExtensionSet(options.extensions);

  // fast-glob reads sibling directories concurrently; the per-entry
  // extension check below shares no state.
  const entries = await fg("**/*", {
    cwd: absoluteRoot,
    absolute: true,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: true,
    suppressErrors: true,
  });

  const files: DiscoveredFile[] = [];
  for (const entry of entries) {
    const name = basename(entry);
    if (hasRecognizedExtension(name, extensions)) {
      files.push({ path: resolve(entry), name });
    }
  }
  return files;
}

/**
 * Scans `root` and upserts every matching file. Batches commit independently,
 * so files stored before a failure stay indexed.
 */
export async function scanAndStore(
  deps: ScanDeps,
  root: string,
  options: ScanOptions,
): Promise<ScanReport> {
  const { store } = deps;
  const logger = deps.logger.child({ component: "scanner" });
  const batchSize = options.batchSize ?? 1_000;
  const now = options.now ?? (() => new Date().toISOString());
  const absoluteRoot = resolve(root);

  logger.info({ root: absoluteRoot }, "Starting directory scan");

  const files = await scanDirectory(absoluteRoot, options);
  const discoveredAt = now();
  const total = files.length;

  let indexed = 0;
  for (let offset = 0; offset < total; offset += batchSize) {
    const batch = files
      .slice(offset, offset + batchSize)
      .map((file) => ({ ...file, discoveredAt }));
    indexed += store.upsertFiles(batch);

    const processed = Math.min(offset + batchSize, total);
    options.onProgress?.(processed, total);
    logger.debug({ processed, total }, "Scan batch committed");
  }

  const report: ScanReport = {
    root: absoluteRoot,
    discovered: total,
    indexed,
    existing: total - indexed,
  };

  logger.info(report, "Directory scan complete");
  return report;
}
