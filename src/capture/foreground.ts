/**
 * Foreground process inspection: the name of the application the user is
 * currently interacting with. A point-in-time snapshot, not a lock.
 */

import fs from "node:fs/promises";

import { ExternalServiceError } from "../rpc/errors.js";
import { runCommand, type CommandRunner } from "../services/process.js";

export interface ForegroundInspector {
  currentApp(): Promise<string>;
}

const INSPECT_TIMEOUT_MS = 5_000;

const WINDOWS_SCRIPT = [
  "Add-Type @\"",
  "using System;",
  "using System.Runtime.InteropServices;",
  "public static class HostBridgeForeground {",
  "  [DllImport(\"user32.dll\")] public static extern IntPtr GetForegroundWindow();",
  "  [DllImport(\"user32.dll\")] public static extern uint GetWindowThreadProcessId(IntPtr hWnd, out uint processId);",
  "}",
  "\"@",
  "$processId = 0",
  "[void][HostBridgeForeground]::GetWindowThreadProcessId([HostBridgeForeground]::GetForegroundWindow(), [ref]$processId)",
  "(Get-Process -Id $processId).ProcessName + '.exe'",
].join("\n");

const MAC_SCRIPT =
  'tell application "System Events" to get name of first application process whose frontmost is true';

export class CommandForegroundInspector implements ForegroundInspector {
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private readonly readFile: (filePath: string) => Promise<string>;

  constructor(params: {
    platform?: NodeJS.Platform;
    run?: CommandRunner;
    readFile?: (filePath: string) => Promise<string>;
  } = {}) {
    this.platform = params.platform ?? process.platform;
    this.run = params.run ?? runCommand;
    this.readFile = params.readFile ?? ((filePath) => fs.readFile(filePath, "utf-8"));
  }

  async currentApp(): Promise<string> {
    switch (this.platform) {
      case "win32":
        return this.query("powershell", ["-NoProfile", "-NonInteractive", "-Command", WINDOWS_SCRIPT]);
      case "darwin":
        return this.query("osascript", ["-e", MAC_SCRIPT]);
      case "linux": {
        const pid = await this.query("xdotool", ["getactivewindow", "getwindowpid"]);
        if (!/^\d+$/.test(pid)) {
          throw new ExternalServiceError(`Unexpected foreground pid: ${pid}`);
        }
        try {
          const name = (await this.readFile(`/proc/${pid}/comm`)).trim();
          if (name) return name;
        } catch (err) {
          throw new ExternalServiceError(`Failed to read foreground process ${pid}`, { cause: err });
        }
        throw new ExternalServiceError(`Foreground process ${pid} has no name`);
      }
      default:
        throw new ExternalServiceError(`Foreground inspection is not supported on ${this.platform}`);
    }
  }

  private async query(command: string, args: string[]): Promise<string> {
    const result = await this.run({ command, args, timeoutMs: INSPECT_TIMEOUT_MS });
    if (!result.ok) {
      const reason = result.timedOut ? "timed out" : result.stderr.trim() || `exit code ${result.code}`;
      throw new ExternalServiceError(`Foreground inspection failed (${command}): ${reason}`);
    }
    const output = result.stdout.trim();
    if (!output) {
      throw new ExternalServiceError(`Foreground inspection returned nothing (${command})`);
    }
    return output;
  }
}
