import type { ErrorDescription } from "@idmatch/core/errors";
import type { ScanReport } from "@idmatch/core/scanner";
import type { ImportReport } from "@idmatch/core/importer";
import type { MatchResult } from "@idmatch/core/search";
import type { ClearResult } from "@idmatch/core/storage/index";

export type TaskKind = "scan" | "import" | "search" | "clear";

export const TASK_KINDS: readonly TaskKind[] = [
  "scan",
  "import",
  "search",
  "clear",
];

export interface SearchOutcome {
  /** Query as the user typed it. */
  query: string;
  threshold: number;
  results: MatchResult[];
}

export interface TaskPayloads {
  scan: ScanReport;
  import: ImportReport;
  search: SearchOutcome;
  clear: ClearResult;
}

export type CompletedMessage = {
  [K in TaskKind]: {
    id: string;
    kind: K;
    status: "completed";
    payload: TaskPayloads[K];
  };
}[TaskKind];

export interface FailedMessage {
  id: string;
  kind: TaskKind;
  status: "failed";
  error: ErrorDescription;
}

export type TaskMessage = CompletedMessage | FailedMessage;
