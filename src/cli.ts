#!/usr/bin/env node
/**
 * hostbridge CLI - starts the host and serves the embedded UI bridge.
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command, InvalidArgumentError } from "commander";

import { formatError, handleError, toConfigError } from "./cli/error-handler.js";
import { OutputFormatter } from "./cli/output-formatter.js";
import { loadConfig, resolveConfigPath, type HostBridgeConfig } from "./config.js";
import { startHost } from "./host/run.js";
import { createLoggerWithCleanup } from "./log.js";
import { buildCommandTable } from "./rpc/commands.js";
import { STARTUP_SAVE_METHOD } from "./rpc/router.js";

export const program = new Command();

type StartOptions = {
  port?: number;
  open?: boolean;
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}

async function readConfig(explicitPath?: string): Promise<HostBridgeConfig> {
  try {
    return await loadConfig(explicitPath);
  } catch (err) {
    throw toConfigError(err, resolveConfigPath(explicitPath));
  }
}

function readConfigOption(cmd: Command): string | undefined {
  const value: unknown = cmd.optsWithGlobals().config;
  return typeof value === "string" ? value : undefined;
}

export async function start(
  cfg: HostBridgeConfig,
  save: string | undefined,
  options: StartOptions,
): Promise<void> {
  const effective: HostBridgeConfig = {
    ...cfg,
    server: {
      ...cfg.server,
      port: options.port ?? cfg.server.port,
      autoOpen: options.open ?? cfg.server.autoOpen,
    },
  };
  const out = new OutputFormatter();
  const { logger, close } = createLoggerWithCleanup(
    effective.logging.level,
    effective.resolved.logFilePath,
    effective.resolved.logFileLevel,
  );

  const host = await startHost(effective, { logger, startupSave: save });
  out.success(`hostbridge listening on ${host.server.url}`);
  if (save) out.keyValue("startup save", save);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "signal received");
    host.controlFlow.exit();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await host.closed;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await close();
  }
}

export function listMethods(out: OutputFormatter = new OutputFormatter()): void {
  const rows = buildCommandTable().map((command) => ({ method: command.method, arity: command.arity }));
  rows.push({ method: STARTUP_SAVE_METHOD, arity: "call" });
  out.table(rows, [
    { key: "method", header: "METHOD" },
    { key: "arity", header: "ARITY" },
  ]);
}

program
  .name("hostbridge")
  .description("Bridge between a local host process and its embedded web UI")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to hostbridge.config.json");

program
  .command("start", { isDefault: true })
  .description("Start the host and serve the UI bridge")
  .argument("[save]", "Save file to open on startup")
  .option("-p, --port <port>", "Port to listen on", parsePort)
  .option("--open", "Open the UI in the default browser")
  .action(async (save: string | undefined, options: StartOptions, cmd: Command) => {
    await handleError(async () => {
      const cfg = await readConfig(readConfigOption(cmd));
      await start(cfg, save, options);
    });
  });

program
  .command("methods")
  .description("List the RPC methods the host answers")
  .action(async () => {
    await handleError(async () => listMethods());
  });

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
