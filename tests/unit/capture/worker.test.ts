import { describe, it, expect, afterEach } from "vitest";

import { CaptureChannel } from "../../../src/capture/channel.js";
import { CaptureWorker, ForegroundSampler, type CaptureSampler } from "../../../src/capture/worker.js";
import type { JsonValue } from "../../../src/rpc/types.js";
import { FixedForeground, RecordingEvents, waitFor } from "../../helpers/context.js";
import { createTestLogger, LEVEL } from "../../helpers/logger.js";

class CountingSampler implements CaptureSampler {
  readonly targets: string[] = [];
  failWith: Error | null = null;

  async sample(targetName: string): Promise<JsonValue> {
    this.targets.push(targetName);
    if (this.failWith) throw this.failWith;
    return { n: this.targets.length };
  }
}

describe("CaptureWorker", () => {
  let channel: CaptureChannel;
  let running: Promise<void> | null = null;

  function startWorker(sampler: CaptureSampler = new CountingSampler()) {
    channel = new CaptureChannel();
    const events = new RecordingEvents();
    const test = createTestLogger();
    const worker = new CaptureWorker({
      receiver: channel.receiver(),
      events,
      sampler,
      intervalMs: 5,
      logger: test.logger,
    });
    running = worker.run();
    return { worker, events, ...test };
  }

  afterEach(async () => {
    channel.close();
    await running;
    running = null;
  });

  it("publishes the state change and samples while capturing", async () => {
    const sampler = new CountingSampler();
    const { worker, events } = startWorker(sampler);

    channel.sender.send({ type: "start", targetName: "game.exe" });
    await waitFor(() => events.sent.length >= 3);

    expect(events.sent[0]).toEqual({
      type: "broadcast",
      detail: { type: "capture-state", capturing: true, target: "game.exe" },
    });
    expect(events.sent[1]).toEqual({
      type: "broadcast",
      detail: { type: "capture-sample", target: "game.exe", sample: { n: 1 }, at: expect.any(Number) },
    });
    expect(worker.status).toMatchObject({ capturing: true, target: "game.exe" });
    expect(sampler.targets.every((target) => target === "game.exe")).toBe(true);
  });

  it("stops sampling on stop", async () => {
    const sampler = new CountingSampler();
    const { worker, events } = startWorker(sampler);

    channel.sender.send({ type: "start", targetName: "game.exe" });
    await waitFor(() => sampler.targets.length >= 1);
    channel.sender.send({ type: "stop" });
    await waitFor(() => !worker.status.capturing);

    const stateEvents = events.sent.filter(
      (event) => event.type === "broadcast" && JSON.stringify(event.detail).includes("capture-state"),
    );
    expect(stateEvents.at(-1)).toEqual({ type: "broadcast", detail: { type: "capture-state", capturing: false } });

    const count = sampler.targets.length;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(sampler.targets.length).toBe(count);
  });

  it("ignores stop while idle", async () => {
    const { events } = startWorker();

    channel.sender.send({ type: "stop" });
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(events.sent).toEqual([]);
  });

  it("switches target on a second start", async () => {
    const sampler = new CountingSampler();
    const { worker, events } = startWorker(sampler);

    channel.sender.send({ type: "start", targetName: "a.exe" });
    channel.sender.send({ type: "start", targetName: "b.exe" });
    await waitFor(() => worker.status.target === "b.exe");

    expect(events.sent.slice(0, 2)).toEqual([
      { type: "broadcast", detail: { type: "capture-state", capturing: true, target: "a.exe" } },
      { type: "broadcast", detail: { type: "capture-state", capturing: true, target: "b.exe" } },
    ]);
  });

  it("logs sample failures and keeps going", async () => {
    const sampler = new CountingSampler();
    sampler.failWith = new Error("inspector offline");
    const { records } = startWorker(sampler);

    channel.sender.send({ type: "start", targetName: "game.exe" });
    await waitFor(() => sampler.targets.length >= 2);

    expect(records).toContainEqual(
      expect.objectContaining({
        level: LEVEL.warn,
        component: "capture-worker",
        target: "game.exe",
        error: "inspector offline",
        msg: "capture sample failed",
      }),
    );
  });

  it("finishes when the channel closes", async () => {
    const { worker } = startWorker();
    channel.sender.send({ type: "start", targetName: "game.exe" });
    await waitFor(() => worker.status.capturing);

    channel.close();
    await running;

    expect(worker.status.capturing).toBe(false);
  });
});

describe("ForegroundSampler", () => {
  it("reports whether the target holds the foreground", async () => {
    const inspector = new FixedForeground("game.exe");
    const sampler = new ForegroundSampler(inspector);

    expect(await sampler.sample("game.exe")).toEqual({ foreground: "game.exe", focused: true });
    inspector.app = "explorer.exe";
    expect(await sampler.sample("game.exe")).toEqual({ foreground: "explorer.exe", focused: false });
  });
});
