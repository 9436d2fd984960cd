import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ReadableStream } from "node:stream/web";

import {
  DisabledUpdateService,
  FeedUpdateService,
  UpdateEventName,
  compareVersions,
  type UpdateService,
} from "../../../src/services/update.js";
import { RecordingEvents, RecordingOpener } from "../../helpers/context.js";
import { createTestLogger } from "../../helpers/logger.js";

const FEED_URL = "https://updates.example.test/feed.json";
const INSTALLER_URL = "https://updates.example.test/files/setup-1.2.0.exe";

type Route = { status?: number; body: string } | { stalled: true };

/** A body whose headers arrive but whose bytes never finish. */
function stalledBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new Uint8Array([77, 90]));
    },
  });
}

function stubFetch(routes: Record<string, Route>): typeof fetch {
  return async (input) => {
    const url = String(input);
    const route = routes[url];
    if (!route) throw new TypeError(`fetch failed: ${url}`);
    if ("stalled" in route) return new Response(stalledBody());
    return new Response(route.body, { status: route.status ?? 200 });
  };
}

describe("FeedUpdateService", () => {
  let dir: string;
  let events: RecordingEvents;
  let opener: RecordingOpener;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "hostbridge-update-"));
    events = new RecordingEvents();
    opener = new RecordingOpener();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function service(routes: Record<string, Route>, currentVersion = "1.0.0", timeoutMs = 1000) {
    return new FeedUpdateService({
      feedUrl: FEED_URL,
      currentVersion,
      downloadDir: path.join(dir, "updates"),
      timeoutMs,
      opener,
      logger: createTestLogger().logger,
      fetch: stubFetch(routes),
    });
  }

  it("announces a newer version", async () => {
    const manifest = { version: "1.2.0", url: INSTALLER_URL, notes: "Faster saves" };
    await service({ [FEED_URL]: { body: JSON.stringify(manifest) } }).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: UpdateEventName.Available,
        detail: { version: "1.2.0", notes: "Faster saves" },
      },
    ]);
  });

  it("reports when the current version is the latest", async () => {
    const manifest = { version: "1.0", url: INSTALLER_URL };
    await service({ [FEED_URL]: { body: JSON.stringify(manifest) } }).check(events);

    expect(events.sent).toEqual([
      { type: "dispatch-custom-event", name: "update-not-available", detail: { version: "1.0.0" } },
    ]);
  });

  it("turns HTTP failures into an error event", async () => {
    await service({ [FEED_URL]: { status: 503, body: "down" } }).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: `Update request failed: HTTP 503 for ${FEED_URL}` },
      },
    ]);
  });

  it("turns network failures into an error event", async () => {
    await service({}).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: `Update request failed for ${FEED_URL}: fetch failed: ${FEED_URL}` },
      },
    ]);
  });

  it("rejects a malformed manifest", async () => {
    const manifest = { version: "latest", url: INSTALLER_URL };
    await service({ [FEED_URL]: { body: JSON.stringify(manifest) } }).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: "Update feed returned an invalid manifest: version Invalid" },
      },
    ]);
  });

  it("rejects a feed that is not JSON", async () => {
    await service({ [FEED_URL]: { body: "<html>" } }).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: "Update feed returned invalid JSON" },
      },
    ]);
  });

  it("downloads, launches the installer and closes the window", async () => {
    const manifest = { version: "1.2.0", url: INSTALLER_URL };
    await service({
      [FEED_URL]: { body: JSON.stringify(manifest) },
      [INSTALLER_URL]: { body: "MZ\u0001\u0002" },
    }).downloadAndInstall(events);

    const target = path.join(dir, "updates", "setup-1.2.0.exe");
    expect(events.sent).toEqual([
      { type: "dispatch-custom-event", name: "update-downloaded", detail: { version: "1.2.0", path: target } },
      { type: "close-window" },
    ]);
    expect(opener.opened).toEqual([target]);
    expect([...(await fs.readFile(target))]).toEqual([77, 90, 1, 2]);
  });

  it("times out a feed whose body never completes", async () => {
    await service({ [FEED_URL]: { stalled: true } }, "1.0.0", 50).check(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: `Update request timed out after 50ms: ${FEED_URL}` },
      },
    ]);
  });

  it("times out an installer download that stalls", async () => {
    const manifest = { version: "1.2.0", url: INSTALLER_URL };

    await service(
      { [FEED_URL]: { body: JSON.stringify(manifest) }, [INSTALLER_URL]: { stalled: true } },
      "1.0.0",
      50,
    ).downloadAndInstall(events);

    expect(events.sent).toEqual([
      {
        type: "dispatch-custom-event",
        name: "update-error",
        detail: { message: `Update request timed out after 50ms: ${INSTALLER_URL}` },
      },
    ]);
    expect(opener.opened).toEqual([]);
  });

  it("keeps the window open when the installer cannot be launched", async () => {
    opener.failWith = new Error("Failed to open installer");
    const manifest = { version: "1.2.0", url: INSTALLER_URL };

    await service({
      [FEED_URL]: { body: JSON.stringify(manifest) },
      [INSTALLER_URL]: { body: "x" },
    }).downloadAndInstall(events);

    expect(events.sent.map((event) => (event.type === "dispatch-custom-event" ? event.name : event.type))).toEqual([
      "update-downloaded",
      "update-error",
    ]);
  });
});

describe("DisabledUpdateService", () => {
  it("never emits anything", async () => {
    const events = new RecordingEvents();
    const updates: UpdateService = new DisabledUpdateService();

    await updates.check(events);
    await updates.downloadAndInstall(events);

    expect(events.sent).toEqual([]);
  });
});

describe("compareVersions", () => {
  const cases: Array<[string, string, number]> = [
    ["1.2.0", "1.10.0", -1],
    ["2.0", "1.9.9", 1],
    ["1.0", "1.0.0", 0],
    ["0.10", "0.9", 1],
  ];

  it.each(cases)("compares %s with %s", (a, b, expected) => {
    expect(compareVersions(a, b)).toBe(expected);
  });
});
