import { CaptureChannel } from "../capture/channel.js";
import { CommandForegroundInspector, type ForegroundInspector } from "../capture/foreground.js";
import { CaptureWorker, ForegroundSampler, type CaptureSampler } from "../capture/worker.js";
import type { HostBridgeConfig } from "../config.js";
import type { Logger } from "../log.js";
import { buildCommandTable } from "../rpc/commands.js";
import type { RpcContext } from "../rpc/context.js";
import { errorMessage } from "../rpc/errors.js";
import { EventBridge } from "../rpc/event-bridge.js";
import { FileGateway } from "../rpc/file-gateway.js";
import { RpcRouter } from "../rpc/router.js";
import { HeadlessFileDialog, type FileDialog } from "../services/dialog.js";
import { SystemLinkOpener, type LinkOpener } from "../services/opener.js";
import { DisabledUpdateService, FeedUpdateService, type UpdateService } from "../services/update.js";
import { ControlFlow } from "./control-flow.js";
import { EventProxy } from "./event-proxy.js";
import { HostServer } from "./server.js";

/** External collaborators; each can be replaced by the embedder. */
export type HostServices = {
  dialog: FileDialog;
  opener: LinkOpener;
  foreground: ForegroundInspector;
  updates: UpdateService;
  sampler: CaptureSampler;
};

export type HostOptions = {
  logger: Logger;
  /** Save file named on the command line. */
  startupSave?: string;
  cwd?: string;
  services?: Partial<HostServices>;
};

export type RunningHost = {
  server: HostServer;
  router: RpcRouter;
  controlFlow: ControlFlow;
  events: EventProxy;
  worker: CaptureWorker;
  /** Resolves once shutdown has finished. */
  closed: Promise<void>;
  stop: () => Promise<void>;
};

export function createServices(cfg: HostBridgeConfig, logger: Logger, overrides: Partial<HostServices> = {}): HostServices {
  const opener = overrides.opener ?? new SystemLinkOpener();
  const foreground = overrides.foreground ?? new CommandForegroundInspector();
  const feedUrl = cfg.update.feedUrl;
  const updates =
    overrides.updates ??
    (feedUrl
      ? new FeedUpdateService({
          feedUrl,
          currentVersion: cfg.update.currentVersion,
          downloadDir: cfg.resolved.updateDir,
          timeoutMs: cfg.update.timeoutMs,
          opener,
          logger,
        })
      : new DisabledUpdateService());

  return {
    dialog: overrides.dialog ?? new HeadlessFileDialog(logger),
    opener,
    foreground,
    updates,
    sampler: overrides.sampler ?? new ForegroundSampler(foreground),
  };
}

export async function startHost(cfg: HostBridgeConfig, options: HostOptions): Promise<RunningHost> {
  const logger = options.logger;
  const services = createServices(cfg, logger, options.services);

  const controlFlow = new ControlFlow();
  const events = new EventProxy(logger);
  const channel = new CaptureChannel();
  const server = new HostServer({
    config: { host: cfg.server.host, port: cfg.server.port, staticDir: cfg.resolved.staticDir },
    logger,
  });

  const bridge = new EventBridge({ surface: server, controlFlow, logger });
  events.attach((event) => bridge.handle(event));

  const context: RpcContext = {
    window: server,
    events,
    files: new FileGateway({ logger, backupSuffix: cfg.files.backupSuffix }),
    dialog: services.dialog,
    updates: services.updates,
    opener: services.opener,
    foreground: services.foreground,
    capture: channel.sender,
    captions: cfg.capture.captions,
    filters: { save: cfg.dialog.saveFilters, headMorph: cfg.dialog.headMorphFilters },
    startupSave: options.startupSave,
    cwd: options.cwd ?? process.cwd(),
    databaseDir: cfg.resolved.databaseDir,
    logger,
  };
  const router = new RpcRouter({ commands: buildCommandTable(), context });

  const worker = new CaptureWorker({
    receiver: channel.receiver(),
    events,
    sampler: services.sampler,
    intervalMs: cfg.capture.intervalMs,
    logger,
  });
  const workerDone = worker.run().catch((err: unknown) => {
    logger.error({ error: errorMessage(err) }, "capture worker crashed");
  });

  try {
    await server.start(router);
  } catch (err) {
    channel.close();
    await workerDone;
    events.close();
    throw err;
  }

  const closed = controlFlow.wait().then(async () => {
    logger.info("shutting down");
    await server.stop();
    channel.close();
    await workerDone;
    events.close();
    await events.drained();
    logger.info("host stopped");
  });

  if (cfg.server.autoOpen) {
    services.opener.open(server.url).catch((err: unknown) => {
      logger.warn({ url: server.url, error: errorMessage(err) }, "failed to open UI");
    });
  }

  return {
    server,
    router,
    controlFlow,
    events,
    worker,
    closed,
    stop: async () => {
      controlFlow.exit();
      await closed;
    },
  };
}
