/**
 * UI-side client for the host bridge. Transport-agnostic: the page passes in
 * a send function and feeds received frames to `handleFrame`.
 */

import type { HostFrame, JsonValue, RpcRequest, WindowAction } from "../rpc/types.js";

export type BridgeSend = (data: string) => void;

export class BridgeRemoteError extends Error {
  readonly method: string;

  constructor(method: string, message: string) {
    super(message);
    this.name = "BridgeRemoteError";
    this.method = method;
  }
}

type PendingCall = {
  method: string;
  resolve: (value: JsonValue) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

export class BridgeClient {
  private readonly pending = new Map<number, PendingCall>();
  private readonly send: BridgeSend;
  private readonly timeoutMs: number;
  private readonly onScript?: (script: string) => void;
  private readonly onWindow?: (action: WindowAction) => void;
  private nextId = 1;

  constructor(params: {
    send: BridgeSend;
    timeoutMs: number;
    onScript?: (script: string) => void;
    onWindow?: (action: WindowAction) => void;
  }) {
    this.send = params.send;
    this.timeoutMs = params.timeoutMs;
    this.onScript = params.onScript;
    this.onWindow = params.onWindow;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Fire-and-forget request for notify methods; no response will come back. */
  notify(method: string): void {
    const request: RpcRequest = { id: this.nextId++, method };
    this.send(JSON.stringify(request));
  }

  call(method: string, ...param: [] | [JsonValue]): Promise<JsonValue> {
    const id = this.nextId++;
    const request: RpcRequest = param.length === 0 ? { id, method } : { id, method, params: [param[0]] };

    return new Promise<JsonValue>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`Bridge request timed out: ${method}`));
      }, this.timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });
      try {
        this.send(JSON.stringify(request));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  handleFrame(frame: HostFrame): void {
    switch (frame.kind) {
      case "response": {
        const { response } = frame;
        if (typeof response.id !== "number") return;
        const pending = this.pending.get(response.id);
        if (!pending) return;
        clearTimeout(pending.timer);
        this.pending.delete(response.id);
        if ("error" in response) {
          pending.reject(new BridgeRemoteError(pending.method, response.error));
        } else {
          pending.resolve(response.result);
        }
        return;
      }
      case "eval":
        this.onScript?.(frame.script);
        return;
      case "window":
        this.onWindow?.(frame.action);
        return;
    }
  }

  /** Rejects every outstanding call. */
  close(reason = "Bridge client closed"): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(new Error(reason));
    }
    this.pending.clear();
  }
}
