import { describe, it, expect } from "vitest";

import { CommandForegroundInspector } from "../../../src/capture/foreground.js";
import { ExternalServiceError } from "../../../src/rpc/errors.js";
import type { CommandResult, CommandRunner } from "../../../src/services/process.js";

type Call = { command: string; args: string[]; timeoutMs: number };

function fakeRunner(results: Partial<CommandResult>[]): { run: CommandRunner; calls: Call[] } {
  const calls: Call[] = [];
  const run: CommandRunner = async (params) => {
    calls.push(params);
    const next = results.shift() ?? {};
    return { ok: true, code: 0, stdout: "", stderr: "", timedOut: false, ...next };
  };
  return { run, calls };
}

describe("CommandForegroundInspector", () => {
  it("asks System Events on macOS", async () => {
    const { run, calls } = fakeRunner([{ stdout: "Finder\n" }]);
    const inspector = new CommandForegroundInspector({ platform: "darwin", run });

    expect(await inspector.currentApp()).toBe("Finder");
    expect(calls[0]?.command).toBe("osascript");
    expect(calls[0]?.args[0]).toBe("-e");
  });

  it("queries user32 through PowerShell on Windows", async () => {
    const { run, calls } = fakeRunner([{ stdout: "game.exe\r\n" }]);
    const inspector = new CommandForegroundInspector({ platform: "win32", run });

    expect(await inspector.currentApp()).toBe("game.exe");
    expect(calls[0]?.command).toBe("powershell");
    expect(calls[0]?.args.slice(0, 3)).toEqual(["-NoProfile", "-NonInteractive", "-Command"]);
  });

  it("resolves the active window's process name on Linux", async () => {
    const { run, calls } = fakeRunner([{ stdout: "4242\n" }]);
    const reads: string[] = [];
    const inspector = new CommandForegroundInspector({
      platform: "linux",
      run,
      readFile: async (filePath) => {
        reads.push(filePath);
        return "game\n";
      },
    });

    expect(await inspector.currentApp()).toBe("game");
    expect(calls[0]).toEqual({ command: "xdotool", args: ["getactivewindow", "getwindowpid"], timeoutMs: 5000 });
    expect(reads).toEqual(["/proc/4242/comm"]);
  });

  it("rejects a malformed pid", async () => {
    const { run } = fakeRunner([{ stdout: "abc" }]);
    const inspector = new CommandForegroundInspector({ platform: "linux", run, readFile: async () => "x" });

    await expect(inspector.currentApp()).rejects.toThrow("Unexpected foreground pid: abc");
  });

  it("wraps a failed process read", async () => {
    const { run } = fakeRunner([{ stdout: "7" }]);
    const inspector = new CommandForegroundInspector({
      platform: "linux",
      run,
      readFile: async () => {
        throw new Error("ENOENT");
      },
    });

    await expect(inspector.currentApp()).rejects.toThrow("Failed to read foreground process 7");
  });

  it("reports command failures", async () => {
    const { run } = fakeRunner([{ ok: false, code: 1, stderr: "not authorized\n" }]);
    const inspector = new CommandForegroundInspector({ platform: "darwin", run });

    const failure = inspector.currentApp();
    await expect(failure).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(failure).rejects.toThrow("Foreground inspection failed (osascript): not authorized");
  });

  it("reports exit codes when stderr is empty", async () => {
    const { run } = fakeRunner([{ ok: false, code: 3 }]);
    const inspector = new CommandForegroundInspector({ platform: "darwin", run });

    await expect(inspector.currentApp()).rejects.toThrow("Foreground inspection failed (osascript): exit code 3");
  });

  it("reports timeouts", async () => {
    const { run } = fakeRunner([{ ok: false, code: null, timedOut: true }]);
    const inspector = new CommandForegroundInspector({ platform: "darwin", run });

    await expect(inspector.currentApp()).rejects.toThrow("Foreground inspection failed (osascript): timed out");
  });

  it("rejects empty output", async () => {
    const { run } = fakeRunner([{ stdout: "  \n" }]);
    const inspector = new CommandForegroundInspector({ platform: "darwin", run });

    await expect(inspector.currentApp()).rejects.toThrow("Foreground inspection returned nothing (osascript)");
  });

  it("rejects unsupported platforms", async () => {
    const { run, calls } = fakeRunner([]);
    const inspector = new CommandForegroundInspector({ platform: "aix", run });

    await expect(inspector.currentApp()).rejects.toThrow("Foreground inspection is not supported on aix");
    expect(calls).toEqual([]);
  });
});
