import { DEFAULTS } from "@idmatch/core/schemas";
import { ResultPaginator } from "@idmatch/core/paginate";
import type { MatchResult } from "@idmatch/core/search";
import type { ScanReport } from "@idmatch/core/scanner";
import type { ImportReport } from "@idmatch/core/importer";
import type { ClearResult } from "@idmatch/core/storage/index";
import type { TaskChannel } from "./channel.js";
import type { TaskKind, TaskMessage } from "./messages.js";

export type SearchView =
  | { kind: "no-search" }
  | {
      kind: "loaded";
      query: string;
      threshold: number;
      paginator: ResultPaginator<MatchResult>;
    };

/**
 * What the interactive layer shows. Each message yields a new state object,
 * but a loaded view's paginator carries its own page cursor: states derived
 * from one another share it.
 */
export interface InteractiveState {
  pageSize: number;
  search: SearchView;
  lastScan: ScanReport | null;
  lastImport: ImportReport | null;
  lastClear: ClearResult | null;
  /** One-line status for the most recent message. */
  notice: string | null;
}

const TASK_LABELS: Record<TaskKind, string> = {
  scan: "Scan",
  import: "Import",
  search: "Search",
  clear: "Clearing the cache",
};

export function createInteractiveState(
  pageSize: number = DEFAULTS.search.pageSize,
): InteractiveState {
  return {
    pageSize,
    search: { kind: "no-search" },
    lastScan: null,
    lastImport: null,
    lastClear: null,
    notice: null,
  };
}

/** Folds one task message into a new state. */
export function applyTaskMessage(
  state: InteractiveState,
  message: TaskMessage,
): InteractiveState {
  if (message.status === "failed") {
    return {
      ...state,
      notice: `${TASK_LABELS[message.kind]} failed: ${message.error.message}`,
    };
  }

  switch (message.kind) {
    case "scan": {
      const report = message.payload;
      return {
        ...state,
        lastScan: report,
        notice: `Indexed ${report.indexed} new of ${report.discovered} files found`,
      };
    }
    case "import": {
      const report = message.payload;
      return {
        ...state,
        lastImport: report,
        notice: `Imported ${report.imported} identifiers (${report.skipped} duplicates, ${report.rejected} rejected)`,
      };
    }
    case "search": {
      const { query, threshold, results } = message.payload;
      return {
        ...state,
        search: {
          kind: "loaded",
          query,
          threshold,
          paginator: new ResultPaginator(results, state.pageSize),
        },
        notice:
          results.length === 0
            ? `No matches for "${query}"`
            : `${results.length} matches for "${query}"`,
      };
    }
    case "clear": {
      const cleared = message.payload;
      return {
        ...state,
        // Loaded results point at records that no longer exist
        search: { kind: "no-search" },
        lastClear: cleared,
        notice: `Cleared ${cleared.files} files and ${cleared.referenceIds} identifiers`,
      };
    }
  }
}

/** Drains whatever is queued, without waiting, and folds it in order. */
export function pumpMessages(
  channel: TaskChannel<TaskMessage>,
  state: InteractiveState,
): InteractiveState {
  let next = state;
  for (
    let message = channel.tryReceive();
    message !== undefined;
    message = channel.tryReceive()
  ) {
    next = applyTaskMessage(next, message);
  }
  return next;
}
