import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import { availableParallelism } from "node:os";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Worker } from "node:worker_threads";
import type { Logger } from "pino";
import type { MatchResult } from "./rank.js";
import type { ScoreTask, ScoringExecutor } from "./engine.js";
import {
  ScoreResponseSchema,
  UNKNOWN_REQUEST_ID,
  type ScoreRequest,
  type ScoreResponse,
} from "./thread-protocol.js";

/** The slice of a worker thread the executor talks to. */
export interface ScoringWorker {
  post(request: ScoreRequest): void;
  onResponse(listener: (response: ScoreResponse) => void): void;
  onFailure(listener: (err: Error) => void): void;
  terminate(): Promise<void>;
}

export interface ThreadExecutorOptions {
  threads: number;
  logger: Logger;
  /** Default: a node:worker_threads Worker running score-worker. */
  spawn?: () => ScoringWorker;
}

interface Pending {
  slot: number;
  resolve: (results: MatchResult[]) => void;
  reject: (err: Error) => void;
}

/** "auto" leaves one core to the interactive thread. */
export function resolveThreadCount(threads: number | "auto"): number {
  return threads === "auto" ? Math.max(1, availableParallelism() - 1) : threads;
}

export interface WorkerEntry {
  url: URL;
  execArgv?: string[];
}

/**
 * Locates score-worker. The compiled build ships score-worker.js beside this
 * module; running from sources, the .ts entry is started with the tsx loader.
 */
export function resolveWorkerEntry(): WorkerEntry {
  const compiled = new URL("./score-worker.js", import.meta.url);
  if (existsSync(fileURLToPath(compiled))) {
    return { url: compiled };
  }

  // Resolved against this package, not process.cwd()
  const require = createRequire(import.meta.url);
  let loader: string;
  try {
    loader = require.resolve("tsx");
  } catch (err) {
    throw new Error(
      "score-worker.js is not built and tsx is not installed to run score-worker.ts",
      { cause: err },
    );
  }
  return {
    url: new URL("./score-worker.ts", import.meta.url),
    execArgv: ["--import", pathToFileURL(loader).href],
  };
}

/** Starts score-worker in a thread and validates what it sends back. */
export function spawnScoringThread(
  entry: WorkerEntry = resolveWorkerEntry(),
): ScoringWorker {
  const worker = new Worker(entry.url, { execArgv: entry.execArgv });
  return {
    post(request) {
      worker.postMessage(request);
    },
    onResponse(listener) {
      worker.on("message", (message: unknown) => {
        const parsed = ScoreResponseSchema.safeParse(message);
        listener(
          parsed.success
            ? parsed.data
            : { id: UNKNOWN_REQUEST_ID, error: "Malformed score response" },
        );
      });
    },
    onFailure(listener) {
      worker.on("error", listener);
      worker.on("exit", (code: number) => {
        if (code !== 0) {
          listener(new Error(`Scoring thread exited with code ${code}`));
        }
      });
    },
    async terminate() {
      await worker.terminate();
    },
  };
}

/**
 * Fixed-size pool of scoring threads. Tasks are dealt round-robin; a thread
 * that fails rejects only its own pending tasks and is replaced on next use.
 */
export function createThreadExecutor(
  options: ThreadExecutorOptions,
): ScoringExecutor {
  const threads = Math.max(1, options.threads);
  const spawn = options.spawn ?? (() => spawnScoringThread());
  const logger = options.logger.child({ component: "scoring-pool" });

  const workers: (ScoringWorker | undefined)[] = new Array(threads).fill(
    undefined,
  );
  const pending = new Map<number, Pending>();
  let nextId = 0;
  let closed = false;

  function failSlot(slot: number, err: Error): void {
    workers[slot] = undefined;
    for (const [id, entry] of pending) {
      if (entry.slot === slot) {
        pending.delete(id);
        entry.reject(err);
      }
    }
  }

  function workerFor(slot: number): ScoringWorker {
    const existing = workers[slot];
    if (existing) return existing;

    const worker = spawn();
    worker.onResponse((response) => {
      const entry = pending.get(response.id);
      if (!entry) {
        logger.error({ slot, response: response.id }, "Unroutable scoring response");
        if (workers[slot] === worker) {
          failSlot(slot, new Error("Scoring thread sent an unroutable response"));
        }
        return;
      }
      pending.delete(response.id);
      if ("error" in response) {
        entry.reject(new Error(response.error));
      } else {
        entry.resolve(response.results);
      }
    });
    worker.onFailure((err) => {
      if (workers[slot] !== worker) return;
      logger.error({ slot, err }, "Scoring thread failed");
      failSlot(slot, err);
    });
    workers[slot] = worker;
    logger.debug({ slot }, "Scoring thread started");
    return worker;
  }

  return {
    concurrency: threads,

    score(task: ScoreTask) {
      if (closed) {
        return Promise.reject(new Error("Scoring pool is closed"));
      }
      const id = nextId++;
      const slot = id % threads;
      let worker: ScoringWorker;
      try {
        worker = workerFor(slot);
      } catch (err) {
        logger.error({ slot, err }, "Scoring thread could not start");
        return Promise.reject(err);
      }
      return new Promise<MatchResult[]>((resolve, reject) => {
        pending.set(id, { slot, resolve, reject });
        worker.post({
          id,
          task: {
            query: task.query,
            threshold: task.threshold,
            extensions: [...task.extensions],
            files: [...task.files],
          },
        });
      });
    },

    async close() {
      closed = true;
      const running = workers.filter(
        (w): w is ScoringWorker => w !== undefined,
      );
      workers.fill(undefined);
      for (const [id, entry] of pending) {
        pending.delete(id);
        entry.reject(new Error("Scoring pool is closed"));
      }
      await Promise.all(running.map((w) => w.terminate()));
    },
  };
}
