import { spawn, ChildProcess } from "child_process";
import { sessionLogger } from "./session-logger";

/**
 * Keeps the machine from idle-sleeping while a batch runs.
 * Uses `caffeinate -i` on macOS and does nothing elsewhere.
 */
export class KeepAwake {
  private child: ChildProcess | null = null;

  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  start(): void {
    if (this.child || this.platform !== "darwin") return;

    const child = spawn("caffeinate", ["-i"], { stdio: "ignore" });
    child.on("error", (error) => {
      sessionLogger.debug("KEEP_AWAKE", `caffeinate unavailable: ${error.message}`);
      if (this.child === child) this.child = null;
    });
    this.child = child;
  }

  /**
   * Stop the helper. Safe to call repeatedly.
   */
  stop(): void {
    const child = this.child;
    this.child = null;
    if (!child || child.exitCode !== null || child.signalCode !== null) return;

    try {
      child.kill("SIGTERM");
    } catch (error) {
      sessionLogger.debug("KEEP_AWAKE", `Failed to stop caffeinate: ${error}`);
    }
  }
}
