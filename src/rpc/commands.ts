/**
 * Method catalog. Names are a contract with the UI and must not change.
 */

import path from "node:path";

import { z } from "zod";

import type { RpcContext } from "./context.js";
import { call, callWithParam, notify, type RpcCommand } from "./router.js";
import type { RpcFile } from "./types.js";

const PathParam = z.string().min(1, "path must not be empty");

const RpcFileParam: z.ZodType<RpcFile, z.ZodTypeDef, unknown> = z.object({
  path: PathParam,
  file: z.object({
    declaredSize: z.number().int().nonnegative(),
    encoded: z.string(),
  }),
});

const SaveDialogParam = z.object({
  path: z.string(),
  filters: z.array(z.tuple([z.string(), z.array(z.string())])),
});

const StartCaptureParam = z.object({
  name: z.string(),
});

export function buildCommandTable(): RpcCommand[] {
  return [
    notify("init", (ctx) => ctx.window.setVisible(true)),
    notify("minimize", (ctx) => ctx.window.setMinimized(true)),
    notify("toggle_maximize", (ctx) => ctx.window.toggleMaximized()),
    notify("drag_window", (ctx) => ctx.window.dragWindow()),
    notify("close", (ctx) => {
      ctx.events.send({ type: "close-window" });
    }),

    call("check_for_update", (ctx) => {
      void ctx.updates.check(ctx.events).catch((err: unknown) => {
        ctx.logger.error({ error: String(err) }, "update check crashed");
      });
      return null;
    }),
    call("download_and_install_update", (ctx) => {
      void ctx.updates.downloadAndInstall(ctx.events).catch((err: unknown) => {
        ctx.logger.error({ error: String(err) }, "update install crashed");
      });
      return null;
    }),
    call("import_head_morph", async (ctx) => {
      const chosen = await ctx.dialog.open({ title: "Import head morph", filters: ctx.filters.headMorph });
      return chosen === null ? null : ctx.files.load(chosen);
    }),
    call("export_head_morph_dialog", (ctx) =>
      ctx.dialog.save({ title: "Export head morph", filters: ctx.filters.headMorph }),
    ),
    call("stop_capture", (ctx) => stopCapture(ctx)),
    call("get_front_app", (ctx) => ctx.foreground.currentApp()),

    callWithParam("open_external_link", PathParam, async (ctx, link) => {
      await ctx.opener.open(link);
      return null;
    }),
    callWithParam("open_save", z.boolean(), async (ctx, lastDir) => {
      const chosen = await ctx.dialog.open({ title: "Open save", filters: ctx.filters.save, lastDir });
      return chosen === null ? null : ctx.files.load(chosen);
    }),
    callWithParam("save_file", RpcFileParam, async (ctx, file) => {
      await ctx.files.save(file);
      return null;
    }),
    callWithParam("save_save_dialog", SaveDialogParam, (ctx, params) =>
      ctx.dialog.save({ title: "Save", filters: params.filters, defaultPath: params.path || undefined }),
    ),
    callWithParam("reload_save", PathParam, (ctx, filePath) => ctx.files.load(filePath)),
    callWithParam("load_database", PathParam, (ctx, filePath) =>
      ctx.files.load(path.resolve(ctx.databaseDir, filePath)),
    ),
    callWithParam("start_capture", StartCaptureParam, (ctx, args) => startCapture(ctx, args.name)),
  ];
}

/**
 * The returned strings are captions for the toggle button's next action,
 * not a status report.
 */
export async function startCapture(ctx: RpcContext, targetName: string): Promise<string> {
  ctx.logger.info({ target: targetName }, "start_capture");
  const foreground = await ctx.foreground.currentApp();
  if (foreground !== targetName) {
    ctx.logger.info({ target: targetName, foreground }, "foreground mismatch, capture not started");
    return ctx.captions.mismatch;
  }
  if (!ctx.capture.send({ type: "start", targetName })) {
    ctx.logger.warn({ target: targetName }, "capture worker unavailable, start signal dropped");
  }
  return ctx.captions.started;
}

export function stopCapture(ctx: RpcContext): string {
  if (!ctx.capture.send({ type: "stop" })) {
    ctx.logger.warn("capture worker unavailable, stop signal dropped");
  }
  ctx.logger.info("stop_capture");
  return ctx.captions.stopped;
}
