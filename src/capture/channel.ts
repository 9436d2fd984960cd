import type { CaptureSignal } from "../rpc/types.js";

/** Producer half. Shared by every request handler. */
export interface CaptureSender {
  /** Never blocks. Returns false when the receiver is gone. */
  send(signal: CaptureSignal): boolean;
}

/** Consumer half. Owned by the capture worker. */
export interface CaptureReceiver extends AsyncIterable<CaptureSignal> {
  /** Next signal in arrival order; null once closed and drained. */
  recv(): Promise<CaptureSignal | null>;
  close(): void;
}

/**
 * Unbounded multi-producer/single-consumer queue of capture signals.
 * No acknowledgment: a send only means the signal was queued.
 */
export class CaptureChannel {
  private readonly queue: CaptureSignal[] = [];
  private waiter: ((signal: CaptureSignal | null) => void) | null = null;
  private closed = false;
  private receiverTaken = false;

  readonly sender: CaptureSender = {
    send: (signal) => this.push(signal),
  };

  receiver(): CaptureReceiver {
    if (this.receiverTaken) {
      throw new Error("Capture channel receiver already taken");
    }
    this.receiverTaken = true;

    const recv = () => this.pull();
    const close = () => this.close();
    return {
      recv,
      close,
      async *[Symbol.asyncIterator]() {
        while (true) {
          const signal = await recv();
          if (signal === null) return;
          yield signal;
        }
      },
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  private push(signal: CaptureSignal): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(signal);
      return true;
    }
    this.queue.push(signal);
    return true;
  }

  private pull(): Promise<CaptureSignal | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error("Capture channel supports a single pending receive"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
