import { describe, it, expect, afterEach, vi } from "vitest";

import { BridgeClient, BridgeRemoteError } from "../../../src/client/bridge-client.js";
import type { WindowAction } from "../../../src/rpc/types.js";

function createClient(timeoutMs = 1000) {
  const sent: string[] = [];
  const scripts: string[] = [];
  const actions: WindowAction[] = [];
  const client = new BridgeClient({
    send: (data) => sent.push(data),
    timeoutMs,
    onScript: (script) => scripts.push(script),
    onWindow: (action) => actions.push(action),
  });
  return { client, sent, scripts, actions };
}

describe("BridgeClient", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("frames a call with its single param", () => {
    const { client, sent } = createClient();

    void client.call("reload_save", "/saves/a.sav").catch(() => undefined);
    void client.call("stop_capture").catch(() => undefined);

    expect(sent).toEqual([
      '{"id":1,"method":"reload_save","params":["/saves/a.sav"]}',
      '{"id":2,"method":"stop_capture"}',
    ]);
    client.close();
  });

  it("resolves a call from its response frame", async () => {
    const { client } = createClient();

    const pending = client.call("get_front_app");
    client.handleFrame({ kind: "response", response: { id: 1, result: "game.exe" } });

    await expect(pending).resolves.toBe("game.exe");
    expect(client.pendingCount).toBe(0);
  });

  it("rejects a call from an error frame", async () => {
    const { client } = createClient();

    const pending = client.call("nope");
    client.handleFrame({ kind: "response", response: { id: 1, error: "Wrong RPC method, got: nope" } });

    await expect(pending).rejects.toThrow(new BridgeRemoteError("nope", "Wrong RPC method, got: nope"));
  });

  it("ignores responses it is not waiting for", () => {
    const { client } = createClient();
    void client.call("stop_capture").catch(() => undefined);

    client.handleFrame({ kind: "response", response: { id: 42, result: null } });
    client.handleFrame({ kind: "response", response: { id: "1", result: null } });

    expect(client.pendingCount).toBe(1);
    client.close();
  });

  it("sends notifications without tracking them", () => {
    const { client, sent } = createClient();

    client.notify("init");

    expect(sent).toEqual(['{"id":1,"method":"init"}']);
    expect(client.pendingCount).toBe(0);
  });

  it("times out calls without an answer", async () => {
    vi.useFakeTimers();
    const { client } = createClient(100);

    const pending = client.call("check_for_update");
    vi.advanceTimersByTime(100);

    await expect(pending).rejects.toThrow("Bridge request timed out: check_for_update");
    expect(client.pendingCount).toBe(0);
  });

  it("routes eval and window frames to the page", () => {
    const { client, scripts, actions } = createClient();

    client.handleFrame({ kind: "eval", script: "window.x = 1;" });
    client.handleFrame({ kind: "window", action: "minimize" });

    expect(scripts).toEqual(["window.x = 1;"]);
    expect(actions).toEqual(["minimize"]);
  });

  it("rejects a call when the transport throws", async () => {
    const client = new BridgeClient({
      send: () => {
        throw new Error("socket closed");
      },
      timeoutMs: 1000,
    });

    await expect(client.call("stop_capture")).rejects.toThrow("socket closed");
    expect(client.pendingCount).toBe(0);
  });

  it("rejects outstanding calls on close", async () => {
    const { client } = createClient();
    const pending = client.call("get_front_app");

    client.close("page unloading");

    await expect(pending).rejects.toThrow("page unloading");
  });
});
