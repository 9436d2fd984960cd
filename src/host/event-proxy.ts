/**
 * Event Proxy - hands host events to the event loop for delivery
 */

import type { Logger } from "../log.js";
import { errorMessage } from "../rpc/errors.js";
import type { EventSink, HostEvent } from "../rpc/types.js";

type EventHandler = (event: HostEvent) => void | Promise<void>;

/**
 * Queues events from handlers and background tasks and delivers them to a
 * single handler, in send order, on a later turn of the event loop.
 * Delivery is fire-and-forget: nothing is acknowledged or retried.
 */
export class EventProxy implements EventSink {
  private handler: EventHandler | null = null;
  private readonly pending: HostEvent[] = [];
  private flushing: Promise<void> | null = null;
  private closed = false;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "event-proxy" });
  }

  /**
   * Set the consumer. Only one consumer exists at a time.
   */
  attach(handler: EventHandler): void {
    this.handler = handler;
  }

  send(event: HostEvent): boolean {
    if (this.closed) {
      this.logger.warn({ type: event.type }, "event loop closed, event dropped");
      return false;
    }
    this.pending.push(event);
    this.scheduleFlush();
    return true;
  }

  /**
   * Resolves once every event sent so far has been handed to the handler.
   */
  async drained(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
  }

  /**
   * Stop accepting events. Already queued events are still delivered.
   */
  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private scheduleFlush(): void {
    if (this.flushing) return;
    this.flushing = new Promise<void>((resolve) => {
      setImmediate(() => {
        void this.flush().finally(() => {
          this.flushing = null;
          resolve();
          if (this.pending.length > 0) this.scheduleFlush();
        });
      });
    });
  }

  private async flush(): Promise<void> {
    while (this.pending.length > 0) {
      const event = this.pending.shift();
      if (!event) break;
      const handler = this.handler;
      if (!handler) {
        this.logger.warn({ type: event.type }, "no event handler attached, event dropped");
        continue;
      }
      try {
        await handler(event);
      } catch (err) {
        this.logger.error({ type: event.type, error: errorMessage(err) }, "event handler error");
      }
    }
  }
}
