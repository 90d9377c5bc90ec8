import { ExitStatus, ProgressEvent, RunState, TerminalState } from "../types/types";
import { ProcessHandle } from "../ffmpeg/job-driver";
import { Inbox } from "./inbox";
import { KeystrokeSource } from "./keystrokes";
import { FrameProgressParser, advanceFrame } from "./progress-parser";
import { ControlStateMachine } from "./state-machine";

export const DEFAULT_POLL_INTERVAL_MS = 100;

type LoopEvent =
  | { kind: "output"; chunk: Buffer }
  | { kind: "key"; key: string }
  | { kind: "cancel" }
  | { kind: "exit"; status: ExitStatus };

export interface JobLoopOptions {
  handle: ProcessHandle;
  machine: ControlStateMachine;
  runState: RunState;
  keys?: KeystrokeSource;
  cancellation?: AbortSignal;
  pollIntervalMs?: number;
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * Drive one job until the control state machine reaches a terminal state.
 *
 * Each iteration waits at most pollIntervalMs. Keystrokes and cancellation
 * are dispatched before any output that arrived in the same batch; output
 * chunks are parsed in arrival order; the exit status is applied last. Raw
 * mode is held only for the duration of the loop.
 */
export async function runJobLoop(options: JobLoopOptions): Promise<TerminalState> {
  const {
    handle,
    machine,
    runState,
    keys,
    cancellation,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    onProgress,
  } = options;

  const inbox = new Inbox<LoopEvent>();
  const parser = new FrameProgressParser();

  const onOutput = (chunk: Buffer | string) => {
    inbox.push({ kind: "output", chunk: typeof chunk === "string" ? Buffer.from(chunk) : chunk });
  };
  handle.output.on("data", onOutput);
  void handle.exited.then(
    (status) => inbox.push({ kind: "exit", status }),
    (error: unknown) =>
      inbox.push({
        kind: "exit",
        status: { code: null, signal: null, error: error instanceof Error ? error : new Error(String(error)) },
      })
  );

  // Wakes the pending take so a quit beats the exit it causes
  const onCancel = () => inbox.push({ kind: "cancel" });
  cancellation?.addEventListener("abort", onCancel, { once: true });

  const release = keys?.acquire((key) => inbox.push({ kind: "key", key }));

  try {
    let outcome = machine.outcome;
    while (outcome === undefined) {
      if (cancellation?.aborted) {
        machine.requestQuit();
        break;
      }

      const batch = await inbox.take(pollIntervalMs);

      if (cancellation?.aborted) {
        machine.requestQuit();
        break;
      }

      for (const event of batch) {
        if (event.kind === "key") {
          machine.handleKey(event.key);
        } else if (event.kind === "cancel") {
          machine.requestQuit();
        }
        if (machine.outcome !== undefined) break;
      }

      if (machine.outcome === undefined) {
        for (const event of batch) {
          if (event.kind === "output") {
            for (const relativeFrame of parser.push(event.chunk)) {
              onProgress?.(advanceFrame(runState, relativeFrame));
            }
          } else if (event.kind === "exit") {
            machine.handleExit(event.status);
          }
        }
      }

      outcome = machine.outcome;
    }

    const terminal = machine.outcome;
    if (terminal === undefined) {
      throw new Error("Job loop ended without a terminal state");
    }
    return terminal;
  } finally {
    cancellation?.removeEventListener("abort", onCancel);
    release?.();
    handle.output.off("data", onOutput);
    // Keep the stream flowing so the child never blocks on a full pipe
    handle.output.resume();
  }
}
