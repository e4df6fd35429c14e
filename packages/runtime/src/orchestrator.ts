import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { BusyError, describeError } from "@idmatch/core/errors";
import type { Logger } from "@idmatch/core/logger";
import type { TaskChannel } from "./channel.js";
import { InvocationStateMachine } from "./invocation.js";
import type { TaskKind, TaskMessage, TaskPayloads } from "./messages.js";

export interface TaskOrchestratorOptions {
  channel: TaskChannel<TaskMessage>;
  logger: Logger;
  /** Default: crypto.randomUUID */
  generateId?: () => string;
}

export interface OrchestratorEvents {
  /** Emitted when the last running invocation finishes. */
  idle: [];
}

export type TaskWork<K extends TaskKind> = () =>
  | Promise<TaskPayloads[K]>
  | TaskPayloads[K];

type CompletionBuilders = {
  [K in TaskKind]: (id: string, payload: TaskPayloads[K]) => TaskMessage;
};

const complete: CompletionBuilders = {
  scan: (id, payload) => ({ id, kind: "scan", status: "completed", payload }),
  import: (id, payload) => ({ id, kind: "import", status: "completed", payload }),
  search: (id, payload) => ({ id, kind: "search", status: "completed", payload }),
  clear: (id, payload) => ({ id, kind: "clear", status: "completed", payload }),
};

interface Invocation {
  id: string;
  machine: InvocationStateMachine;
}

/**
 * Runs scan, import, search and clear work off the caller's turn of the
 * event loop. One invocation per kind at a time; each ends with exactly one
 * message on the channel.
 */
export class TaskOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly running = new Map<TaskKind, Invocation>();
  private readonly channel: TaskChannel<TaskMessage>;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(options: TaskOrchestratorOptions) {
    super();
    this.channel = options.channel;
    this.logger = options.logger.child({ component: "orchestrator" });
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Accepts `work` and returns its invocation id. Work starts on a later
   * macrotask. Throws BusyError, without creating an invocation, while
   * another invocation of `kind` is running.
   */
  submit<K extends TaskKind>(kind: K, work: TaskWork<K>): string {
    return this.start<TaskPayloads[K]>(kind, work, complete[kind]);
  }

  isRunning(kind: TaskKind): boolean {
    return this.running.has(kind);
  }

  runningKinds(): TaskKind[] {
    return [...this.running.keys()];
  }

  /** Resolves once no invocation is running. */
  async idle(): Promise<void> {
    if (this.running.size === 0) return;
    await new Promise<void>((resolve) => this.once("idle", () => resolve()));
  }

  private start<P>(
    kind: TaskKind,
    work: () => Promise<P> | P,
    build: (id: string, payload: P) => TaskMessage,
  ): string {
    if (this.running.has(kind)) {
      throw new BusyError(kind);
    }

    const id = this.generateId();
    const machine = new InvocationStateMachine();
    const log = this.logger.child({ invocation: id, kind });
    machine.onStateChange((event) => {
      log.debug(
        { from: event.from, to: event.to, reason: event.reason },
        "Invocation state changed",
      );
    });

    this.running.set(kind, { id, machine });
    log.info("Task requested");

    setImmediate(() => {
      this.execute(kind, id, machine, work, build, log).catch((err) => {
        log.error({ err }, "Task bookkeeping failed");
      });
    });
    return id;
  }

  private async execute<P>(
    kind: TaskKind,
    id: string,
    machine: InvocationStateMachine,
    work: () => Promise<P> | P,
    build: (id: string, payload: P) => TaskMessage,
    log: Logger,
  ): Promise<void> {
    let message: TaskMessage;
    try {
      machine.transition("running");
      const payload = await work();
      machine.transition("completed");
      message = build(id, payload);
      log.info("Task completed");
    } catch (err) {
      const error = describeError(err);
      if (machine.canTransition("failed")) {
        machine.transition("failed", error.message);
      }
      message = { id, kind, status: "failed", error };
      log.warn({ err }, "Task failed");
    } finally {
      this.running.delete(kind);
    }

    try {
      this.channel.send(message);
    } finally {
      if (this.running.size === 0) {
        this.emit("idle");
      }
    }
  }
}
