import fs from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../log.js";
import { IoError, NotFoundError, errorMessage } from "./errors.js";
import { decode, encode } from "./transcoder.js";
import type { RpcFile } from "./types.js";

export const DEFAULT_BACKUP_SUFFIX = ".bak";

export class FileGateway {
  private readonly logger: Logger;
  private readonly backupSuffix: string;

  constructor(params: { logger: Logger; backupSuffix?: string }) {
    this.logger = params.logger.child({ component: "file-gateway" });
    this.backupSuffix = params.backupSuffix ?? DEFAULT_BACKUP_SUFFIX;
  }

  /**
   * Reads a file into an envelope. The returned `path` is the canonical one,
   * so a later save lands on the same resolved location.
   */
  async load(filePath: string): Promise<RpcFile> {
    let canonical: string;
    try {
      canonical = await fs.realpath(filePath);
    } catch (err) {
      throw new NotFoundError(`File not found: ${filePath}`, { cause: err });
    }

    let bytes: Buffer;
    try {
      bytes = await fs.readFile(canonical);
    } catch (err) {
      if (isErrno(err, "ENOENT")) {
        throw new NotFoundError(`File not found: ${filePath}`, { cause: err });
      }
      throw new IoError(`Failed to read ${canonical}: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.debug({ path: canonical, size: bytes.length }, "file loaded");
    return { path: canonical, file: encode(bytes) };
  }

  /**
   * Overwrites the destination with the decoded payload, keeping a single
   * backup generation next to it when the file exists and has an extension.
   * The write is not atomic.
   */
  async save(envelope: RpcFile): Promise<void> {
    const bytes = decode(envelope.file);
    const destination = envelope.path;

    const backup = this.backupPathFor(destination);
    if (backup && (await exists(destination))) {
      try {
        await fs.copyFile(destination, backup);
      } catch (err) {
        throw new IoError(`Failed to back up ${destination}: ${errorMessage(err)}`, { cause: err });
      }
      this.logger.debug({ path: destination, backup }, "backup written");
    }

    try {
      await fs.writeFile(destination, bytes);
    } catch (err) {
      throw new IoError(`Failed to write ${destination}: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info({ path: destination, size: bytes.length }, "file saved");
  }

  /** `a.ext` → `a.ext.bak`, `a.` → `a..bak`; null when the path has no extension. */
  backupPathFor(filePath: string): string | null {
    if (!path.extname(filePath)) return null;
    return `${filePath}${this.backupSuffix}`;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
