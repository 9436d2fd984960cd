/**
 * RPC router: resolves a request's method against a registration table built
 * once at startup, invokes the handler under its arity class and frames the
 * outcome as a response.
 */

import path from "node:path";

import type { z } from "zod";

import type { Logger } from "../log.js";
import type { RpcContext } from "./context.js";
import { ArgumentError, UnknownMethodError, errorCode, errorMessage } from "./errors.js";
import type { JsonValue, RpcRequest, RpcResponse } from "./types.js";

export type CommandArity = "notify" | "call" | "call-with-param";

type HandlerResult = JsonValue | undefined;

export type RpcCommand =
  | {
      method: string;
      arity: "notify";
      invoke: (ctx: RpcContext) => void | Promise<void>;
    }
  | {
      method: string;
      arity: "call";
      invoke: (ctx: RpcContext) => HandlerResult | Promise<HandlerResult>;
    }
  | {
      method: string;
      arity: "call-with-param";
      invoke: (ctx: RpcContext, param: JsonValue) => HandlerResult | Promise<HandlerResult>;
    };

export const STARTUP_SAVE_METHOD = "open_command_line_save";

export function notify(
  method: string,
  run: (ctx: RpcContext) => void | Promise<void>,
): RpcCommand {
  return { method, arity: "notify", invoke: run };
}

export function call(
  method: string,
  run: (ctx: RpcContext) => HandlerResult | Promise<HandlerResult>,
): RpcCommand {
  return { method, arity: "call", invoke: run };
}

/**
 * The single parameter is validated against `schema` before `run` sees it.
 */
export function callWithParam<P>(
  method: string,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  run: (ctx: RpcContext, param: P) => HandlerResult | Promise<HandlerResult>,
): RpcCommand {
  return {
    method,
    arity: "call-with-param",
    invoke: (ctx, raw) => {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new ArgumentError(
          `Invalid argument for ${method}${where}: ${issue?.message ?? "unexpected value"}`,
        );
      }
      return run(ctx, parsed.data);
    },
  };
}

export class RpcRouter {
  private readonly table = new Map<string, RpcCommand>();
  private readonly context: RpcContext;
  private readonly logger: Logger;

  constructor(params: { commands: readonly RpcCommand[]; context: RpcContext }) {
    for (const command of params.commands) {
      if (command.method === STARTUP_SAVE_METHOD || this.table.has(command.method)) {
        throw new Error(`Duplicate RPC method registration: ${command.method}`);
      }
      this.table.set(command.method, command);
    }
    this.context = params.context;
    this.logger = params.context.logger.child({ component: "rpc" });
  }

  get methods(): string[] {
    return [...this.table.keys()];
  }

  arityOf(method: string): CommandArity | undefined {
    return this.table.get(method)?.arity;
  }

  /**
   * Returns the response frame, or null for notify methods.
   */
  async dispatch(request: RpcRequest): Promise<RpcResponse | null> {
    this.logger.debug({ method: request.method }, "rpc request");
    try {
      const outcome = await this.handle(request);
      if (outcome === null) return null;
      return { id: request.id, result: outcome.value ?? null };
    } catch (err) {
      this.logger.error(
        { method: request.method, code: errorCode(err), error: errorMessage(err) },
        "rpc request failed",
      );
      return { id: request.id, error: errorMessage(err) };
    }
  }

  private async handle(request: RpcRequest): Promise<{ value: HandlerResult } | null> {
    if (request.method === STARTUP_SAVE_METHOD) {
      return { value: await this.openStartupSave() };
    }

    const command = this.table.get(request.method);
    if (!command) {
      throw new UnknownMethodError(request.method);
    }

    switch (command.arity) {
      case "notify":
        try {
          await command.invoke(this.context);
        } catch (err) {
          this.logger.warn({ method: request.method, error: errorMessage(err) }, "notify handler failed");
        }
        return null;
      case "call":
        return { value: await command.invoke(this.context) };
      case "call-with-param":
        return { value: await command.invoke(this.context, singleParam(request)) };
    }
  }

  private async openStartupSave(): Promise<HandlerResult> {
    const raw = this.context.startupSave?.trim();
    if (!raw) return null;
    const resolved = path.isAbsolute(raw) ? raw : path.join(this.context.cwd, raw);
    return this.context.files.load(resolved);
  }
}

function singleParam(request: RpcRequest): JsonValue {
  const params = request.params;
  if (params === undefined) {
    throw new ArgumentError("argument required");
  }
  if (params.length !== 1) {
    throw new ArgumentError(`expected exactly 1 argument, got ${params.length}`);
  }
  return params[0];
}
