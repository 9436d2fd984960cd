import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: { console?: boolean },
): Logger {
  return createLoggerWithCleanup(level, filePath, fileLevel, opts).logger;
}

export function createLoggerWithCleanup(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: { console?: boolean },
): { logger: Logger; close: () => Promise<void> } {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    const logger = consoleEnabled ? pino({ level }) : pino({ level: "silent" });
    return { logger, close: async () => {} };
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    console.error(`Failed to create log directory: ${dir}`, err);
    throw new Error(`Cannot create log directory: ${dir}`);
  }

  const dest = pino.destination({ dest: filePath, sync: true });
  const logger = consoleEnabled
    ? pino(
        { level: "trace" },
        multistream([
          { level, stream: process.stdout },
          { level: fileLevel ?? level, stream: dest },
        ]),
      )
    : pino({ level: fileLevel ?? level }, dest);

  return {
    logger,
    close: async () => {
      try {
        dest.flushSync();
      } catch {
        // nothing buffered
      }
      await new Promise<void>((resolve) => {
        const timeout = setTimeout(resolve, 2000);
        timeout.unref?.();
        dest.once("close", () => {
          clearTimeout(timeout);
          resolve();
        });
        dest.end();
      });
    },
  };
}
