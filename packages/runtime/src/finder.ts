import { mkdir } from "node:fs/promises";
import type { AppConfig } from "@idmatch/core/schemas";
import {
  DEFAULT_ROOT_PATH,
  loadConfig,
  resolveDatabasePath,
  resolveRootPath,
} from "@idmatch/core/config";
import { createLogger, type Logger } from "@idmatch/core/logger";
import {
  initializeDatabase,
  createIndexStore,
  type IndexStore,
} from "@idmatch/core/storage/index";
import { scanAndStore } from "@idmatch/core/scanner";
import {
  importIdentifierTable,
  importIdentifierValues,
  type IdentifierTable,
} from "@idmatch/core/importer";
import {
  createInlineExecutor,
  createThreadExecutor,
  resolveThreadCount,
  searchIndex,
  type ScoringExecutor,
} from "@idmatch/core/search";
import { TaskChannel } from "./channel.js";
import { TaskOrchestrator } from "./orchestrator.js";
import type { TaskMessage } from "./messages.js";
import { revealFile, type Launcher, type RevealResult } from "./reveal.js";

export interface FinderContext {
  config: AppConfig;
  logger: Logger;
  startedAt: Date;
  storageRoot: string;
  databasePath: string;
  store: IndexStore;
  channel: TaskChannel<TaskMessage>;
  orchestrator: TaskOrchestrator;
  /** Each returns the invocation id; the outcome arrives on `channel`. */
  scan: (root: string) => string;
  importIdentifiers: (input: IdentifierTable | readonly string[]) => string;
  search: (query: string, threshold?: number) => string;
  clearCache: () => string;
  reveal: (path: string) => Promise<RevealResult>;
  /** Resolves once no task is running. */
  idle: () => Promise<void>;
  cleanup: () => Promise<void>;
}

export interface CreateFinderOptions {
  rootPath?: string;
  /** Default: index.db under the root. ":memory:" keeps nothing on disk. */
  databasePath?: string;
  /** Default: built from config.logging. */
  logger?: Logger;
  /** Default: thread pool unless config.search.threads is 0, else inline. */
  executor?: ScoringExecutor;
  launcher?: Launcher;
  platform?: NodeJS.Platform;
}

export async function createFinder(
  config: AppConfig,
  options?: CreateFinderOptions,
): Promise<FinderContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const storageRoot = resolveRootPath(options?.rootPath ?? DEFAULT_ROOT_PATH);
  const databasePath = resolveDatabasePath(storageRoot, options?.databasePath);
  await mkdir(storageRoot, { recursive: true });

  const db = initializeDatabase(databasePath);
  const store = createIndexStore(db);

  const threads = resolveThreadCount(config.search.threads);
  const executor =
    options?.executor ??
    (threads > 0
      ? createThreadExecutor({ threads, logger })
      : createInlineExecutor());

  const channel = new TaskChannel<TaskMessage>();
  const orchestrator = new TaskOrchestrator({ channel, logger });

  logger.info(
    { storageRoot, databasePath, threads },
    "Finder ready",
  );

  const cleanup = async () => {
    await orchestrator.idle();
    await executor.close();
    store.close();
  };

  return {
    config,
    logger,
    startedAt,
    storageRoot,
    databasePath,
    store,
    channel,
    orchestrator,

    scan: (root) =>
      orchestrator.submit("scan", () =>
        scanAndStore({ store, logger }, root, {
          extensions: config.scan.extensions,
          batchSize: config.scan.batchSize,
        }),
      ),

    importIdentifiers: (input) =>
      orchestrator.submit("import", () =>
        "headers" in input
          ? importIdentifierTable({ store, logger }, input, {
              column: config.import.column,
            })
          : importIdentifierValues({ store, logger }, input),
      ),

    search: (query, threshold = config.search.threshold) =>
      orchestrator.submit("search", async () => ({
        query,
        threshold,
        results: await searchIndex(store, query, {
          threshold,
          extensions: config.scan.extensions,
          executor,
        }),
      })),

    clearCache: () => orchestrator.submit("clear", () => store.clearAll()),

    reveal: (path) =>
      revealFile(path, {
        logger,
        launcher: options?.launcher,
        platform: options?.platform,
      }),

    idle: () => orchestrator.idle(),
    cleanup,
  };
}

/** Loads config.json from the storage root, then starts the finder there. */
export async function startFinder(
  options?: CreateFinderOptions,
): Promise<FinderContext> {
  const rootPath = resolveRootPath(options?.rootPath ?? DEFAULT_ROOT_PATH);
  const config = await loadConfig({ rootPath });
  return createFinder(config, { ...options, rootPath });
}
