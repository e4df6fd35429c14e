/**
 * Lifecycle of one background task invocation.
 *
 * States:
 * - requested: accepted by the orchestrator, not started yet
 * - running: work executing on a later macrotask
 * - completed: work returned, result message sent
 * - failed: work threw, error message sent
 */

export type InvocationState = "requested" | "running" | "completed" | "failed";

const VALID_TRANSITIONS: Record<
  InvocationState,
  ReadonlySet<InvocationState>
> = {
  requested: new Set(["running"]),
  running: new Set(["completed", "failed"]),
  completed: new Set(),
  failed: new Set(),
};

export interface InvocationTransitionEvent {
  from: InvocationState;
  to: InvocationState;
  timestamp: Date;
  reason?: string;
}

export type InvocationListener = (event: InvocationTransitionEvent) => void;

export class InvocationStateMachine {
  private state: InvocationState = "requested";
  private listeners: InvocationListener[] = [];

  getState(): InvocationState {
    return this.state;
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].size === 0;
  }

  canTransition(to: InvocationState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /** Throws if the transition is not valid. */
  transition(to: InvocationState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid invocation transition: ${this.state} -> ${to}`);
    }

    const event: InvocationTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Returns an unsubscribe function. */
  onStateChange(listener: InvocationListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
