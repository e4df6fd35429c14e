export { TaskChannel, type ChannelListener } from "./channel.js";
export {
  InvocationStateMachine,
  type InvocationState,
  type InvocationTransitionEvent,
  type InvocationListener,
} from "./invocation.js";
export {
  TASK_KINDS,
  type TaskKind,
  type TaskPayloads,
  type SearchOutcome,
  type CompletedMessage,
  type FailedMessage,
  type TaskMessage,
} from "./messages.js";
export {
  TaskOrchestrator,
  type TaskOrchestratorOptions,
  type OrchestratorEvents,
  type TaskWork,
} from "./orchestrator.js";
export {
  createInteractiveState,
  applyTaskMessage,
  pumpMessages,
  type SearchView,
  type InteractiveState,
} from "./session.js";
export {
  revealFile,
  revealCommands,
  spawnDetached,
  type Launcher,
  type RevealCommand,
  type RevealOptions,
  type RevealResult,
} from "./reveal.js";
export {
  createFinder,
  startFinder,
  type FinderContext,
  type CreateFinderOptions,
} from "./finder.js";
