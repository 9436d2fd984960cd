import type { CaptureSender } from "../capture/channel.js";
import type { ForegroundInspector } from "../capture/foreground.js";
import type { CaptureCaptions, DialogFilter } from "../config.js";
import type { Logger } from "../log.js";
import type { FileDialog } from "../services/dialog.js";
import type { LinkOpener } from "../services/opener.js";
import type { UpdateService } from "../services/update.js";
import type { FileGateway } from "./file-gateway.js";
import type { EventSink } from "./types.js";

/** Window operations exposed by the UI surface. */
export interface WindowControl {
  setVisible(visible: boolean): void;
  setMinimized(minimized: boolean): void;
  toggleMaximized(): void;
  dragWindow(): void;
}

/**
 * Everything a handler may touch. Built once at startup and shared by
 * every dispatch.
 */
export type RpcContext = {
  window: WindowControl;
  events: EventSink;
  files: FileGateway;
  dialog: FileDialog;
  updates: UpdateService;
  opener: LinkOpener;
  foreground: ForegroundInspector;
  capture: CaptureSender;
  captions: CaptureCaptions;
  filters: {
    save: DialogFilter[];
    headMorph: DialogFilter[];
  };
  /** Save path from the command line, as given. */
  startupSave?: string;
  /** Base for a relative `startupSave`. */
  cwd: string;
  /** Base for relative `load_database` paths. */
  databaseDir: string;
  logger: Logger;
};
