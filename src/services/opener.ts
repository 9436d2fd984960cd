import { spawn, type SpawnOptions } from "node:child_process";

import { ExternalServiceError, errorMessage } from "../rpc/errors.js";

export interface LinkOpener {
  open(target: string): Promise<void>;
}

/** The part of a child process the opener waits on. */
export interface SpawnedOpener {
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "spawn", listener: () => void): unknown;
  unref(): void;
}

export type SpawnOpener = (command: string, args: string[], options: SpawnOptions) => SpawnedOpener;

export function openerCommand(
  platform: NodeJS.Platform,
  target: string,
): { command: string; args: string[] } {
  if (platform === "darwin") return { command: "open", args: [target] };
  // rundll32 hands the target to the shell's default handler without a cmd.exe parse.
  if (platform === "win32") return { command: "rundll32", args: ["url.dll,FileProtocolHandler", target] };
  return { command: "xdg-open", args: [target] };
}

/** Hands a URL or path to the platform's default handler, detached. */
export class SystemLinkOpener implements LinkOpener {
  private readonly platform: NodeJS.Platform;
  private readonly spawnFn: SpawnOpener;

  constructor(params: { platform?: NodeJS.Platform; spawn?: SpawnOpener } = {}) {
    this.platform = params.platform ?? process.platform;
    this.spawnFn = params.spawn ?? spawn;
  }

  open(target: string): Promise<void> {
    const trimmed = target.trim();
    if (!trimmed) {
      return Promise.reject(new ExternalServiceError("Nothing to open"));
    }
    const { command, args } = openerCommand(this.platform, trimmed);

    return new Promise<void>((resolve, reject) => {
      let child: SpawnedOpener;
      try {
        child = this.spawnFn(command, args, { detached: true, stdio: "ignore", windowsHide: true });
      } catch (err) {
        reject(new ExternalServiceError(`Failed to open ${trimmed}: ${errorMessage(err)}`, { cause: err }));
        return;
      }
      child.once("error", (err) => {
        reject(new ExternalServiceError(`Failed to open ${trimmed}: ${err.message}`, { cause: err }));
      });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
  }
}
