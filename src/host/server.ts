/**
 * Host Server - HTTP + WebSocket endpoint for the embedded UI
 *
 * - Serves the UI bundle and a health route over express
 * - Accepts RPC requests on ws://host:port/rpc and replies with response frames
 * - Acts as the script surface and window control for the bridge
 */

import { createServer, type IncomingMessage, type Server } from "node:http";
import fsSync from "node:fs";
import crypto from "node:crypto";

import express from "express";
import { WebSocketServer, WebSocket, type RawData } from "ws";

import type { Logger } from "../log.js";
import type { WindowControl } from "../rpc/context.js";
import { errorMessage } from "../rpc/errors.js";
import type { ScriptSurface } from "../rpc/event-bridge.js";
import type { RpcRouter } from "../rpc/router.js";
import { RpcRequestSchema, peekRequestId } from "../rpc/schema.js";
import type { HostFrame, RpcRequest, WindowAction } from "../rpc/types.js";

export const RPC_PATH = "/rpc";

/**
 * Host server configuration
 */
export interface HostServerConfig {
  host: string;
  port: number;
  staticDir?: string;
}

export class SurfaceUnavailableError extends Error {
  constructor() {
    super("No UI surface is connected");
    this.name = "SurfaceUnavailableError";
  }
}

export class HostServer implements ScriptSurface, WindowControl {
  private wss: WebSocketServer | null = null;
  private httpServer: Server | null = null;
  private readonly connections = new Map<string, WebSocket>();
  private readonly config: HostServerConfig;
  private router: RpcRouter | null = null;
  private readonly logger: Logger;
  private dispatchChain: Promise<void> = Promise.resolve();
  private accepting = true;
  private boundPort: number | null = null;

  constructor(params: { config: HostServerConfig; logger: Logger }) {
    this.config = params.config;
    this.logger = params.logger.child({ component: "host-server" });
  }

  get port(): number | null {
    return this.boundPort;
  }

  get url(): string {
    return `http://${this.config.host}:${this.boundPort ?? this.config.port}`;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async start(router: RpcRouter): Promise<void> {
    this.router = router;
    const app = express();
    app.get("/api/health", (_req, res) => {
      res.json({ ok: true, status: "ok", time: Date.now() });
    });

    const staticDir = this.config.staticDir;
    if (staticDir && fsSync.existsSync(staticDir)) {
      app.use(express.static(staticDir));
      app.get("*", (_req, res) => {
        res.sendFile("index.html", { root: staticDir });
      });
    } else if (staticDir) {
      this.logger.warn({ staticDir }, "UI directory not found, serving API only");
    }

    const httpServer = createServer(app);
    const wss = new WebSocketServer({ server: httpServer, path: RPC_PATH });
    wss.on("connection", (ws, request) => {
      this.handleConnection(ws, request);
    });
    wss.on("error", (error) => {
      this.logger.error({ error: error.message }, "WebSocket server error");
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });

    const address = httpServer.address();
    this.boundPort = typeof address === "object" && address ? address.port : this.config.port;
    this.httpServer = httpServer;
    this.wss = wss;
    this.logger.info({ host: this.config.host, port: this.boundPort }, "host server listening");
  }

  /**
   * Stops reading new requests, lets the in-flight dispatches finish, then
   * closes every connection and the listeners.
   */
  async stop(): Promise<void> {
    this.accepting = false;
    await this.dispatchChain;

    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;
    if (!wss || !httpServer) return;

    for (const ws of this.connections.values()) {
      ws.close(1000, "Host shutting down");
    }
    this.connections.clear();

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        httpServer.close((closeErr) => {
          if (closeErr) reject(closeErr);
          else resolve();
        });
      });
    });
    this.logger.info("host server stopped");
  }

  evaluateScript(script: string): void {
    const delivered = this.broadcast({ kind: "eval", script });
    if (delivered === 0) {
      throw new SurfaceUnavailableError();
    }
  }

  setVisible(visible: boolean): void {
    if (visible) this.sendWindowAction("show");
  }

  setMinimized(minimized: boolean): void {
    if (minimized) this.sendWindowAction("minimize");
  }

  toggleMaximized(): void {
    this.sendWindowAction("toggle-maximize");
  }

  dragWindow(): void {
    this.sendWindowAction("drag");
  }

  private sendWindowAction(action: WindowAction): void {
    if (this.broadcast({ kind: "window", action }) === 0) {
      this.logger.debug({ action }, "window action without a connected UI");
    }
  }

  private broadcast(frame: HostFrame): number {
    const data = JSON.stringify(frame);
    let delivered = 0;
    for (const ws of this.connections.values()) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      ws.send(data);
      delivered += 1;
    }
    return delivered;
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const connectionId = crypto.randomUUID();
    this.connections.set(connectionId, ws);
    this.logger.info({ connectionId, remoteAddress: request.socket.remoteAddress }, "UI connected");

    ws.on("message", (data) => {
      this.handleMessage(ws, data);
    });

    ws.on("close", (code, reason) => {
      this.connections.delete(connectionId);
      this.logger.info({ connectionId, code, reason: reason.toString() }, "UI disconnected");
    });

    ws.on("error", (error) => {
      this.logger.error({ connectionId, error: error.message }, "WebSocket error");
    });
  }

  private handleMessage(ws: WebSocket, data: RawData): void {
    if (!this.accepting) {
      this.logger.debug("host stopping, frame ignored");
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(rawDataToString(data));
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, "Message parse error");
      return;
    }

    const parsed = RpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const id = peekRequestId(raw);
      const issue = parsed.error.issues[0];
      const message = `Invalid request: ${issue ? `${issue.path.join(".") || "frame"} ${issue.message}` : "malformed"}`;
      this.logger.warn({ id, error: message }, "invalid rpc frame");
      if (id !== undefined) {
        this.send(ws, { kind: "response", response: { id, error: message } });
      }
      return;
    }

    this.enqueue(ws, parsed.data);
  }

  /** Requests run one at a time, in arrival order. */
  private enqueue(ws: WebSocket, request: RpcRequest): void {
    const router = this.router;
    if (!router) return;
    this.dispatchChain = this.dispatchChain
      .then(async () => {
        const response = await router.dispatch(request);
        if (response) {
          this.send(ws, { kind: "response", response });
        }
      })
      .catch((err: unknown) => {
        this.logger.error({ method: request.method, error: errorMessage(err) }, "response not sent");
      });
  }

  private send(ws: WebSocket, frame: HostFrame): void {
    if (ws.readyState !== WebSocket.OPEN) {
      this.logger.warn({ kind: frame.kind }, "UI connection closed, frame dropped");
      return;
    }
    ws.send(JSON.stringify(frame));
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}
