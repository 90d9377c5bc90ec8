import { ControlState, ExitStatus, RunState, TerminalState } from "../types/types";

const CTRL_C = "\u0003";

export interface ControlEffects {
  persistCheckpoint(frame: number): void;
  terminateChild(): void;
}

/**
 * Job control for one encode: keystrokes and the child's exit move the job
 * from running into exactly one terminal state.
 */
export class ControlStateMachine {
  private current: ControlState = "running";

  constructor(
    private readonly runState: RunState,
    private readonly effects: ControlEffects
  ) {}

  /**
   * The terminal state, or undefined while the job is still running
   */
  get outcome(): TerminalState | undefined {
    return this.current === "running" ? undefined : this.current;
  }

  handleKey(key: string): ControlState {
    if (this.current !== "running") return this.current;

    const normalized = key.toLowerCase();
    if (normalized === "q" || key === CTRL_C) {
      this.requestQuit();
    } else if (normalized === "p" || key === " ") {
      this.requestPause();
    }
    return this.current;
  }

  requestQuit(): void {
    if (this.current !== "running") return;

    this.runState.quitRequested = true;
    this.current = "quit-requested";
    this.effects.terminateChild();
  }

  requestPause(): void {
    if (this.current !== "running") return;

    this.runState.pauseRequested = true;
    this.current = "pause-requested";
    try {
      this.effects.persistCheckpoint(this.runState.lastFrameSeen);
    } finally {
      this.effects.terminateChild();
    }
  }

  handleExit(status: ExitStatus): ControlState {
    if (this.current !== "running") return this.current;

    this.current = status.code === 0 ? "exited-ok" : "exited-fail";
    return this.current;
  }
}
