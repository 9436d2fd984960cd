/**
 * Update service - checks a release feed and installs new versions.
 *
 * Results reach the UI only as custom events; callers never await them.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { Logger } from "../log.js";
import { ExternalServiceError, errorMessage } from "../rpc/errors.js";
import type { EventSink } from "../rpc/types.js";
import type { LinkOpener } from "./opener.js";

export interface UpdateService {
  check(events: EventSink): Promise<void>;
  downloadAndInstall(events: EventSink): Promise<void>;
}

export const UpdateEventName = {
  Available: "update-available",
  NotAvailable: "update-not-available",
  Downloaded: "update-downloaded",
  Error: "update-error",
} as const;

const ManifestSchema = z.object({
  version: z.string().regex(/^\d+(\.\d+)*$/),
  url: z.string().url(),
  notes: z.string().optional(),
});

export type UpdateManifest = z.infer<typeof ManifestSchema>;

/** Used when no feed is configured. */
export class DisabledUpdateService implements UpdateService {
  async check(): Promise<void> {}

  async downloadAndInstall(): Promise<void> {}
}

export class FeedUpdateService implements UpdateService {
  private readonly feedUrl: string;
  private readonly currentVersion: string;
  private readonly downloadDir: string;
  private readonly timeoutMs: number;
  private readonly opener: LinkOpener;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(params: {
    feedUrl: string;
    currentVersion: string;
    downloadDir: string;
    timeoutMs: number;
    opener: LinkOpener;
    logger: Logger;
    fetch?: typeof fetch;
  }) {
    this.feedUrl = params.feedUrl;
    this.currentVersion = params.currentVersion;
    this.downloadDir = params.downloadDir;
    this.timeoutMs = params.timeoutMs;
    this.opener = params.opener;
    this.fetchFn = params.fetch ?? fetch;
    this.logger = params.logger.child({ component: "update" });
  }

  async check(events: EventSink): Promise<void> {
    try {
      const manifest = await this.fetchManifest();
      if (compareVersions(manifest.version, this.currentVersion) > 0) {
        this.logger.info({ current: this.currentVersion, latest: manifest.version }, "update available");
        events.send({
          type: "dispatch-custom-event",
          name: UpdateEventName.Available,
          detail: { version: manifest.version, notes: manifest.notes ?? null },
        });
        return;
      }
      this.logger.debug({ current: this.currentVersion }, "no update available");
      events.send({
        type: "dispatch-custom-event",
        name: UpdateEventName.NotAvailable,
        detail: { version: this.currentVersion },
      });
    } catch (err) {
      this.reportError(events, "update check failed", err);
    }
  }

  async downloadAndInstall(events: EventSink): Promise<void> {
    try {
      const manifest = await this.fetchManifest();
      const installer = await this.download(manifest);
      events.send({
        type: "dispatch-custom-event",
        name: UpdateEventName.Downloaded,
        detail: { version: manifest.version, path: installer },
      });
      await this.opener.open(installer);
      this.logger.info({ version: manifest.version, installer }, "installer launched, closing");
      events.send({ type: "close-window" });
    } catch (err) {
      this.reportError(events, "update install failed", err);
    }
  }

  private async fetchManifest(): Promise<UpdateManifest> {
    const body = await this.request(this.feedUrl, async (res): Promise<unknown> => {
      try {
        return await res.json();
      } catch (err) {
        throw new ExternalServiceError("Update feed returned invalid JSON", { cause: err });
      }
    });
    const parsed = ManifestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExternalServiceError(
        `Update feed returned an invalid manifest: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`,
      );
    }
    return parsed.data;
  }

  private async download(manifest: UpdateManifest): Promise<string> {
    const bytes = await this.request(manifest.url, async (res) => Buffer.from(await res.arrayBuffer()));
    const fileName = path.basename(new URL(manifest.url).pathname) || `update-${manifest.version}`;
    const target = path.join(this.downloadDir, fileName);
    await fs.mkdir(this.downloadDir, { recursive: true });
    await fs.writeFile(target, bytes);
    this.logger.info({ version: manifest.version, target, size: bytes.length }, "update downloaded");
    return target;
  }

  /**
   * Fetches `url` and reads its body with `read`. The timeout covers the
   * whole exchange, body included.
   */
  private async request<T>(url: string, read: (res: Response) => Promise<T>): Promise<T> {
    const ctrl = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      ctrl.signal.addEventListener(
        "abort",
        () => reject(new ExternalServiceError(`Update request timed out after ${this.timeoutMs}ms: ${url}`)),
        { once: true },
      );
    });
    const timeout = setTimeout(() => ctrl.abort(), this.timeoutMs);
    try {
      return await Promise.race([this.fetchAndRead(url, ctrl.signal, read), timedOut]);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async fetchAndRead<T>(url: string, signal: AbortSignal, read: (res: Response) => Promise<T>): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchFn(url, { signal });
    } catch (err) {
      throw new ExternalServiceError(`Update request failed for ${url}: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new ExternalServiceError(`Update request failed: HTTP ${res.status} for ${url}`);
    }
    try {
      return await read(res);
    } catch (err) {
      if (err instanceof ExternalServiceError) throw err;
      throw new ExternalServiceError(`Update request failed for ${url}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private reportError(events: EventSink, message: string, err: unknown): void {
    this.logger.error({ error: errorMessage(err) }, message);
    events.send({
      type: "dispatch-custom-event",
      name: UpdateEventName.Error,
      detail: { message: errorMessage(err) },
    });
  }
}

/** Compares dotted numeric versions; missing parts count as 0. */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map(Number);
  const right = b.split(".").map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff > 0 ? 1 : -1;
  }
  return 0;
}
