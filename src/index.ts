export { loadConfig, parseConfig, resolveConfigPath, type HostBridgeConfig } from "./config.js";
export { createLogger, createLoggerWithCleanup, type Logger, type LogLevel } from "./log.js";

export * from "./rpc/types.js";
export * from "./rpc/errors.js";
export { encode, decode } from "./rpc/transcoder.js";
export { FileGateway } from "./rpc/file-gateway.js";
export { EventBridge, renderEventScript, type ScriptSurface } from "./rpc/event-bridge.js";
export { RpcRouter, STARTUP_SAVE_METHOD, call, callWithParam, notify, type RpcCommand } from "./rpc/router.js";
export { buildCommandTable, startCapture, stopCapture } from "./rpc/commands.js";
export type { RpcContext, WindowControl } from "./rpc/context.js";

export { CaptureChannel, type CaptureReceiver, type CaptureSender } from "./capture/channel.js";
export { CaptureWorker, ForegroundSampler, type CaptureSampler } from "./capture/worker.js";
export { CommandForegroundInspector, type ForegroundInspector } from "./capture/foreground.js";

export { ControlFlow } from "./host/control-flow.js";
export { EventProxy } from "./host/event-proxy.js";
export { HostServer, RPC_PATH } from "./host/server.js";
export { startHost, createServices, type HostOptions, type HostServices, type RunningHost } from "./host/run.js";

export { BridgeClient, BridgeRemoteError } from "./client/bridge-client.js";

export { HeadlessFileDialog, type FileDialog } from "./services/dialog.js";
export { SystemLinkOpener, type LinkOpener } from "./services/opener.js";
export { DisabledUpdateService, FeedUpdateService, UpdateEventName, compareVersions, type UpdateService } from "./services/update.js";
