import type { DialogFilter } from "../config.js";
import type { Logger } from "../log.js";

export type OpenDialogOptions = {
  title: string;
  filters: DialogFilter[];
  /** Start in the directory used last time. */
  lastDir?: boolean;
};

export type SaveDialogOptions = {
  title: string;
  filters: DialogFilter[];
  defaultPath?: string;
};

/** Native file picker. Resolves to the chosen path, or null when cancelled. */
export interface FileDialog {
  open(options: OpenDialogOptions): Promise<string | null>;
  save(options: SaveDialogOptions): Promise<string | null>;
}

/**
 * Used when no native picker is wired in: every dialog reads as cancelled.
 */
export class HeadlessFileDialog implements FileDialog {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "dialog" });
  }

  async open(options: OpenDialogOptions): Promise<string | null> {
    this.logger.warn({ title: options.title }, "no file picker available, open dialog cancelled");
    return null;
  }

  async save(options: SaveDialogOptions): Promise<string | null> {
    this.logger.warn({ title: options.title }, "no file picker available, save dialog cancelled");
    return null;
  }
}
