export {
  normalizeExtension,
  extensionOf,
  hasRecognizedExtension,
  toExtensionSet,
} from "./extensions.js";
export { normalizeName, stripExtension } from "./normalize.js";
export {
  similarity,
  subsequenceScore,
  windowedScore,
  SCORE_MATCH,
  BONUS_BOUNDARY,
  BONUS_TRANSITION,
  BONUS_CONSECUTIVE,
  PENALTY_GAP_START,
  PENALTY_GAP_EXTENSION,
} from "./score.js";
export { compareMatches, mergeRanked } from "./rank.js";
export type { MatchResult } from "./rank.js";
export {
  scorePartition,
  prepareQuery,
  partition,
  createInlineExecutor,
  searchFiles,
  searchIndex,
} from "./engine.js";
export type { ScoreTask, ScoringExecutor, SearchOptions } from "./engine.js";
export {
  ScoreRequestSchema,
  ScoreResponseSchema,
  UNKNOWN_REQUEST_ID,
  handleScoreRequest,
} from "./thread-protocol.js";
export type { ScoreRequest, ScoreResponse } from "./thread-protocol.js";
export {
  createThreadExecutor,
  resolveThreadCount,
  resolveWorkerEntry,
  spawnScoringThread,
} from "./thread-executor.js";
export type {
  ScoringWorker,
  ThreadExecutorOptions,
  WorkerEntry,
} from "./thread-executor.js";
