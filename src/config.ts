import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

const DEFAULT_CONFIG_PATH = "hostbridge.config.json";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const DialogFilterSchema = z.tuple([z.string().min(1), z.array(z.string().min(1))]);

const ServerSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(7420),
  staticDir: z.string().default("ui/dist"),
  autoOpen: z.boolean().default(false),
});

const FilesSchema = z.object({
  backupSuffix: z
    .string()
    .regex(/^\.[^/\\]+$/, "files.backupSuffix must start with '.' and contain no separators")
    .default(".bak"),
  databaseDir: z.string().optional(),
});

const DialogSchema = z.object({
  saveFilters: z.array(DialogFilterSchema).default([["Save files", ["*"]]]),
  headMorphFilters: z.array(DialogFilterSchema).default([["Head morph", ["ron"]]]),
});

const CaptionsSchema = z.object({
  started: z.string().default("结束采集"),
  mismatch: z.string().default("结束采集(请打开游戏)"),
  stopped: z.string().default("开始采集"),
});

const CaptureSchema = z.object({
  intervalMs: z.number().int().positive().default(1_000),
  captions: CaptionsSchema.default({}),
});

const UpdateSchema = z.object({
  feedUrl: z.string().url().optional(),
  currentVersion: z.string().regex(/^\d+(\.\d+)*$/).default("0.1.0"),
  timeoutMs: z.number().int().positive().default(30_000),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const ConfigSchema = z.object({
  workspaceDir: z.string().default("."),
  stateDir: z.string().optional(),
  server: ServerSchema.default({}),
  files: FilesSchema.default({}),
  dialog: DialogSchema.default({}),
  capture: CaptureSchema.default({}),
  update: UpdateSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type CaptureCaptions = z.infer<typeof CaptionsSchema>;

export type DialogFilter = z.infer<typeof DialogFilterSchema>;

export type HostBridgeConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configPath: string;
    workspaceDir: string;
    stateDir: string;
    staticDir: string;
    databaseDir: string;
    updateDir: string;
    logFilePath: string;
    logFileLevel: z.infer<typeof LogLevelSchema>;
  };
};

export async function loadConfig(explicitPath?: string): Promise<HostBridgeConfig> {
  const configPath = resolveConfigPath(explicitPath);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const isDefault = !explicitPath?.trim() && !process.env.HOSTBRIDGE_CONFIG?.trim();
    if (isDefault && isMissingFile(err)) {
      return parseConfig({}, configPath);
    }
    throw err;
  }
  return parseConfig(JSON.parse(raw), configPath);
}

export function parseConfig(input: unknown, configPath: string): HostBridgeConfig {
  const base = ConfigSchema.parse(input);
  return resolveConfig(base, configPath);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.HOSTBRIDGE_CONFIG?.trim();
  return resolveUserPath(explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, configPath: string): HostBridgeConfig {
  const configDir = path.dirname(configPath);
  const workspaceDir = resolveUserPath(base.workspaceDir, configDir);
  const stateDir = resolveUserPath(
    base.stateDir?.trim() || path.join(workspaceDir, ".hostbridge"),
    workspaceDir,
  );
  const staticDir = resolveUserPath(base.server.staticDir, workspaceDir);
  const databaseDir = resolveUserPath(base.files.databaseDir?.trim() || workspaceDir, workspaceDir);
  const logFilePath = resolveUserPath(
    base.logging.filePath?.trim() || path.join(stateDir, "hostbridge.log"),
    workspaceDir,
  );

  return {
    ...base,
    resolved: {
      configPath,
      workspaceDir,
      stateDir,
      staticDir,
      databaseDir,
      updateDir: path.join(stateDir, "updates"),
      logFilePath,
      logFileLevel: base.logging.fileLevel ?? base.logging.level,
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
