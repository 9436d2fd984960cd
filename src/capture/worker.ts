import type { Logger } from "../log.js";
import { errorMessage } from "../rpc/errors.js";
import type { CaptureSignal, EventSink, JsonValue } from "../rpc/types.js";
import type { CaptureReceiver } from "./channel.js";
import type { ForegroundInspector } from "./foreground.js";

export interface CaptureSampler {
  sample(targetName: string): Promise<JsonValue>;
}

/** Reports whether the capture target still holds the foreground. */
export class ForegroundSampler implements CaptureSampler {
  private readonly inspector: ForegroundInspector;

  constructor(inspector: ForegroundInspector) {
    this.inspector = inspector;
  }

  async sample(targetName: string): Promise<JsonValue> {
    const foreground = await this.inspector.currentApp();
    return { foreground, focused: foreground === targetName };
  }
}

export type CaptureStatus = {
  capturing: boolean;
  target?: string;
  samples: number;
};

/**
 * Single consumer of the capture channel. Signals are applied in arrival
 * order; while capturing, samples are pushed to the UI as broadcasts.
 */
export class CaptureWorker {
  private readonly receiver: CaptureReceiver;
  private readonly events: EventSink;
  private readonly sampler: CaptureSampler;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private target: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private sampling = false;
  private samples = 0;

  constructor(params: {
    receiver: CaptureReceiver;
    events: EventSink;
    sampler: CaptureSampler;
    intervalMs: number;
    logger: Logger;
  }) {
    this.receiver = params.receiver;
    this.events = params.events;
    this.sampler = params.sampler;
    this.intervalMs = params.intervalMs;
    this.logger = params.logger.child({ component: "capture-worker" });
  }

  get status(): CaptureStatus {
    return this.target === null
      ? { capturing: false, samples: this.samples }
      : { capturing: true, target: this.target, samples: this.samples };
  }

  /** Runs until the channel is closed. */
  async run(): Promise<void> {
    this.logger.debug("capture worker started");
    try {
      for await (const signal of this.receiver) {
        this.apply(signal);
      }
    } finally {
      this.stopTimer();
      this.target = null;
      this.logger.debug("capture worker stopped");
    }
  }

  private apply(signal: CaptureSignal): void {
    switch (signal.type) {
      case "start": {
        const previous = this.target;
        this.target = signal.targetName;
        this.logger.info({ target: signal.targetName, previous }, "capture started");
        this.stopTimer();
        this.timer = setInterval(() => {
          void this.sample();
        }, this.intervalMs);
        this.timer.unref?.();
        this.publishState();
        return;
      }
      case "stop": {
        if (this.target === null) {
          this.logger.debug("stop received while idle");
          return;
        }
        this.logger.info({ target: this.target, samples: this.samples }, "capture stopped");
        this.stopTimer();
        this.target = null;
        this.publishState();
        return;
      }
    }
  }

  private async sample(): Promise<void> {
    const target = this.target;
    if (target === null || this.sampling) return;
    this.sampling = true;
    try {
      const sample = await this.sampler.sample(target);
      if (this.target !== target) return;
      this.samples += 1;
      this.events.send({
        type: "broadcast",
        detail: { type: "capture-sample", target, sample, at: Date.now() },
      });
    } catch (err) {
      this.logger.warn({ target, error: errorMessage(err) }, "capture sample failed");
    } finally {
      this.sampling = false;
    }
  }

  private publishState(): void {
    const detail: JsonValue = this.target === null
      ? { type: "capture-state", capturing: false }
      : { type: "capture-state", capturing: true, target: this.target };
    if (!this.events.send({ type: "broadcast", detail })) {
      this.logger.warn("capture state not delivered");
    }
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
