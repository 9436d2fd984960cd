export type ControlFlowState = "running" | "exit";

/**
 * Host control flow. Moves to `exit` once; later requests are no-ops.
 * Work already in flight is not aborted.
 */
export class ControlFlow {
  private state: ControlFlowState = "running";
  private readonly listeners = new Set<() => void>();

  get current(): ControlFlowState {
    return this.state;
  }

  get exited(): boolean {
    return this.state === "exit";
  }

  /** Returns true only for the call that performed the transition. */
  exit(): boolean {
    if (this.state === "exit") return false;
    this.state = "exit";
    for (const listener of this.listeners) {
      listener();
    }
    this.listeners.clear();
    return true;
  }

  onExit(listener: () => void): () => void {
    if (this.state === "exit") {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.onExit(resolve);
    });
  }
}
