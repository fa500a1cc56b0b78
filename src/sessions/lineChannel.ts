export interface LineSender {
  send(line: string): boolean;
  close(): void;
}

/**
 * Multi-producer, single-consumer line queue. Producers only enqueue; the
 * consumer takes everything queued so far with `drain()`, which never waits.
 */
export class LineChannel {
  private queue: string[] = [];

  private openSenders = 0;

  private receiverClosed = false;

  sender(): LineSender {
    this.openSenders += 1;
    let open = true;

    return {
      send: (line) => {
        if (!open || this.receiverClosed) {
          return false;
        }
        this.queue.push(line);
        return true;
      },
      close: () => {
        if (!open) {
          return;
        }
        open = false;
        this.openSenders -= 1;
      },
    };
  }

  drain(): string[] {
    if (this.queue.length === 0) {
      return [];
    }

    const lines = this.queue;
    this.queue = [];
    return lines;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** True once every sender has closed and nothing is left to drain. */
  get disconnected(): boolean {
    return this.openSenders === 0 && this.queue.length === 0;
  }

  get closed(): boolean {
    return this.receiverClosed;
  }

  /** Drops the receiving end; queued lines are discarded and later sends are refused. */
  close(): void {
    this.receiverClosed = true;
    this.queue = [];
  }
}
