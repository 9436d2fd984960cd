import type { ControlFlow } from "../host/control-flow.js";
import type { Logger } from "../log.js";
import { errorMessage } from "./errors.js";
import type { HostEvent, JsonValue, UiEvent } from "./types.js";

/** The UI side of the bridge: something that can evaluate a script in the page. */
export interface ScriptSurface {
  evaluateScript(script: string): void | Promise<void>;
}

/** Literal JSON text, with the line terminators that are unsafe in older script parsers escaped. */
function toScriptLiteral(value: JsonValue): string {
  return JSON.stringify(value).replace(/\u2028/g, "\\u2028").replace(/\u2029/g, "\\u2029");
}

export function renderEventScript(event: UiEvent): string {
  switch (event.type) {
    case "dispatch-custom-event":
      return [
        "(() => {",
        `  const event = new CustomEvent(${toScriptLiteral(event.name)}, {`,
        `    detail: ${toScriptLiteral(event.detail)}`,
        "  });",
        "  document.dispatchEvent(event);",
        "})();",
      ].join("\n");
    case "broadcast":
      return [
        "(() => {",
        "  var event = document.createEvent('Event');",
        "  event.initEvent('message', false, true);",
        `  event.data = ${toScriptLiteral(event.detail)};`,
        "  window.dispatchEvent(event);",
        "})();",
      ].join("\n");
  }
}

/**
 * Consumes host events. UI events become scripts on the surface (best effort,
 * at most once); close-window only touches the host control flow.
 */
export class EventBridge {
  private readonly surface: ScriptSurface;
  private readonly controlFlow: ControlFlow;
  private readonly logger: Logger;

  constructor(params: { surface: ScriptSurface; controlFlow: ControlFlow; logger: Logger }) {
    this.surface = params.surface;
    this.controlFlow = params.controlFlow;
    this.logger = params.logger.child({ component: "event-bridge" });
  }

  async handle(event: HostEvent): Promise<void> {
    if (event.type === "close-window") {
      if (this.controlFlow.exit()) {
        this.logger.info("close requested, exiting");
      }
      return;
    }

    const script = renderEventScript(event);
    try {
      await this.surface.evaluateScript(script);
    } catch (err) {
      this.logger.warn(
        { type: event.type, name: event.type === "dispatch-custom-event" ? event.name : undefined, error: errorMessage(err) },
        "event injection failed, dropped",
      );
    }
  }
}
