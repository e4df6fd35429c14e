import { ValidationError } from "../errors/catalog.js";
import type { IndexStore } from "../storage/index/store.js";
import type { IndexedFile } from "../storage/index/types.js";
import { MAX_THRESHOLD, MIN_THRESHOLD } from "../schemas/app-config.js";
import { toExtensionSet } from "./extensions.js";
import { normalizeName } from "./normalize.js";
import { compareMatches, mergeRanked, type MatchResult } from "./rank.js";
import { similarity } from "./score.js";

/** One partition of a search, scored by a single executor slot. */
export interface ScoreTask {
  /** Already normalized. */
  query: string;
  threshold: number;
  extensions: readonly string[];
  files: readonly IndexedFile[];
}

/**
 * Runs partition scoring somewhere other than the caller's turn of the event
 * loop. Results for each task come back sorted by compareMatches.
 */
export interface ScoringExecutor {
  /** Upper bound on partitions per search. */
  readonly concurrency: number;
  score(task: ScoreTask): Promise<MatchResult[]>;
  close(): Promise<void>;
}

export interface SearchOptions {
  threshold: number;
  extensions: readonly string[];
  /** Default: an inline executor. */
  executor?: ScoringExecutor;
  /** Partitions are not split below this many files. Default: 256 */
  minPartitionSize?: number;
}

const DEFAULT_MIN_PARTITION_SIZE = 256;

/** Scores every file in one partition and returns the sorted matches. */
export function scorePartition(task: ScoreTask): MatchResult[] {
  const extensions = toExtensionSet(task.extensions);
  const matches: MatchResult[] = [];
  for (const file of task.files) {
    const normalizedName = normalizeName(file.name, extensions);
    const score = similarity(task.query, normalizedName);
    if (score >= task.threshold) {
      matches.push({ file, normalizedName, score });
    }
  }
  return matches.sort(compareMatches);
}

/**
 * Validates a raw query and threshold, returning the normalized query.
 * Throws ValidationError before any scoring work starts.
 */
export function prepareQuery(
  query: string,
  options: Pick<SearchOptions, "threshold" | "extensions">,
): string {
  const { threshold } = options;
  if (
    !Number.isFinite(threshold) ||
    threshold < MIN_THRESHOLD ||
    threshold > MAX_THRESHOLD
  ) {
    throw new ValidationError(
      `Threshold must be between ${MIN_THRESHOLD} and ${MAX_THRESHOLD}`,
      { threshold },
    );
  }

  if (query.trim() === "") {
    throw new ValidationError("Search query must not be empty");
  }
  const normalized = normalizeName(query, toExtensionSet(options.extensions));
  if (normalized === "") {
    throw new ValidationError(
      "Search query contains no identifier characters",
      { query },
    );
  }
  return normalized;
}

/** Splits `files` into at most `count` contiguous slices of near-equal size. */
export function partition<T>(files: readonly T[], count: number): T[][] {
  const slices = Math.max(1, Math.min(count, files.length));
  const size = Math.ceil(files.length / slices);
  const parts: T[][] = [];
  for (let offset = 0; offset < files.length; offset += size) {
    parts.push(files.slice(offset, offset + size));
  }
  return parts;
}

/** Files scored between two yields to the event loop. */
export const DEFAULT_SLICE_SIZE = 500;

function yieldToEventLoop(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

async function scoreInSlices(
  task: ScoreTask,
  sliceSize: number,
): Promise<MatchResult[]> {
  const partials: MatchResult[][] = [];
  for (let offset = 0; offset < task.files.length; offset += sliceSize) {
    await yieldToEventLoop();
    partials.push(
      scorePartition({
        ...task,
        files: task.files.slice(offset, offset + sliceSize),
      }),
    );
  }
  return mergeRanked(partials);
}

/**
 * Scores on the calling thread, one task at a time, yielding to the event
 * loop before every slice of `sliceSize` files. Timers and I/O keep running
 * between slices.
 */
export function createInlineExecutor(
  sliceSize = DEFAULT_SLICE_SIZE,
): ScoringExecutor {
  const size = Math.max(1, Math.floor(sliceSize));
  let queue: Promise<unknown> = Promise.resolve();

  return {
    concurrency: 1,
    score(task) {
      const run = queue.then(() => scoreInSlices(task, size));
      // Keep the queue moving after a failed task; the caller sees the error
      queue = run.catch(() => undefined);
      return run;
    },
    async close() {},
  };
}

async function runSearch(
  files: readonly IndexedFile[],
  query: string,
  options: SearchOptions,
): Promise<MatchResult[]> {
  if (files.length === 0) return [];

  const executor = options.executor ?? createInlineExecutor();
  const minSize = options.minPartitionSize ?? DEFAULT_MIN_PARTITION_SIZE;
  const count = Math.min(
    executor.concurrency,
    Math.ceil(files.length / Math.max(1, minSize)),
  );

  const partials = await Promise.all(
    partition(files, count).map((slice) =>
      executor.score({
        query,
        threshold: options.threshold,
        extensions: options.extensions,
        files: slice,
      }),
    ),
  );
  return mergeRanked(partials);
}

/**
 * Ranks `files` against `query`. The result holds every file scoring at or
 * above the threshold, in compareMatches order, regardless of how the work
 * was partitioned.
 */
export async function searchFiles(
  files: readonly IndexedFile[],
  query: string,
  options: SearchOptions,
): Promise<MatchResult[]> {
  const normalized = prepareQuery(query, options);
  return runSearch(files, normalized, options);
}

/** Reads a snapshot of the indexed files and ranks it against `query`. */
export async function searchIndex(
  store: IndexStore,
  query: string,
  options: SearchOptions,
): Promise<MatchResult[]> {
  const normalized = prepareQuery(query, options);
  return runSearch(store.listFiles(), normalized, options);
}
