/**
 * Wire and host-side types shared by the router, the event bridge and the capture channel.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** UI → host. `params` carries at most one value for the methods in the catalog. */
export type RpcRequest = {
  id: JsonValue;
  method: string;
  params?: JsonValue[];
};

export type RpcSuccess = {
  id: JsonValue;
  result: JsonValue;
};

export type RpcFailure = {
  id: JsonValue;
  error: string;
};

export type RpcResponse = RpcSuccess | RpcFailure;

export type Base64File = {
  declaredSize: number;
  encoded: string;
};

/** File envelope, in either direction. */
export type RpcFile = {
  path: string;
  file: Base64File;
};

export type HostEvent =
  | { type: "close-window" }
  | { type: "dispatch-custom-event"; name: string; detail: JsonValue }
  | { type: "broadcast"; detail: JsonValue };

export type UiEvent = Exclude<HostEvent, { type: "close-window" }>;

export type CaptureSignal =
  | { type: "start"; targetName: string }
  | { type: "stop" };

export type WindowAction = "show" | "minimize" | "toggle-maximize" | "drag";

/** Host → UI WebSocket frame. */
export type HostFrame =
  | { kind: "response"; response: RpcResponse }
  | { kind: "eval"; script: string }
  | { kind: "window"; action: WindowAction };

/** Anything that accepts host events; `false` means the event was dropped. */
export interface EventSink {
  send(event: HostEvent): boolean;
}
