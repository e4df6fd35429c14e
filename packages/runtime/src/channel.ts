export type ChannelListener<T> = (message: T) => void;

/**
 * FIFO hand-off from background tasks to the interactive layer. Receiving
 * never blocks: an empty channel yields undefined.
 */
export class TaskChannel<T> {
  private queue: T[] = [];
  private listeners: ChannelListener<T>[] = [];

  get size(): number {
    return this.queue.length;
  }

  send(message: T): void {
    this.queue.push(message);
    for (const listener of this.listeners) {
      listener(message);
    }
  }

  tryReceive(): T | undefined {
    return this.queue.shift();
  }

  /** Removes and returns everything queued, oldest first. */
  drain(): T[] {
    const messages = this.queue;
    this.queue = [];
    return messages;
  }

  /**
   * Notifies after each send. The message stays queued; listeners that want
   * it call tryReceive or drain. Returns an unsubscribe function.
   */
  onMessage(listener: ChannelListener<T>): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
