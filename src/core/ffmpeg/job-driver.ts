import { spawn } from "child_process";
import { PassThrough, Readable } from "stream";
import { ExitStatus, Job } from "../types/types";
import { RuntimeContext, getChildEnvWithContext, getFfmpegPathsWithContext } from "../utils/ffmpeg-path";
import { sessionLogger } from "../utils/session-logger";
import { EncoderSettings, buildTranscodeArgs } from "./encoder-args";

/**
 * A running encode
 */
export interface ProcessHandle {
  /** Combined stdout and stderr of the child */
  readonly output: Readable;
  /** Settles once, after all output has been delivered */
  readonly exited: Promise<ExitStatus>;
  /** Ask the child to stop (SIGTERM). Idempotent and safe after exit. */
  terminate(): void;
  wait(): Promise<ExitStatus>;
}

export interface JobDriver {
  start(job: Job, resumeFrame: number): ProcessHandle;
  describe(job: Job, resumeFrame: number): string[];
}

export class FfmpegJobDriver implements JobDriver {
  constructor(
    private readonly context: RuntimeContext,
    private readonly settings: EncoderSettings
  ) {}

  describe(job: Job, resumeFrame: number): string[] {
    const { ffmpeg } = getFfmpegPathsWithContext(this.context);
    return [ffmpeg, ...buildTranscodeArgs(job, resumeFrame, this.settings)];
  }

  start(job: Job, resumeFrame: number): ProcessHandle {
    const [command, ...args] = this.describe(job, resumeFrame);
    sessionLogger.logCommand([command, ...args]);

    const child = spawn(command, args, {
      cwd: this.context.workingDirectory,
      env: getChildEnvWithContext(this.context),
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const output = new PassThrough();
    child.stdout.pipe(output, { end: false });
    child.stderr.pipe(output, { end: false });

    if (sessionLogger.isDebugEnabled()) {
      child.stderr.on("data", (data: Buffer) => {
        sessionLogger.logEncoderOutput(data.toString("utf8"));
      });
    }

    const exited = new Promise<ExitStatus>((resolve) => {
      const settle = (status: ExitStatus) => {
        if (!output.writableEnded) output.end();
        resolve(status);
      };
      child.once("close", (code, signal) => settle({ code, signal }));
      child.once("error", (error) => {
        sessionLogger.error(`Failed to start ${command}: ${error.message}`);
        settle({ code: null, signal: null, error });
      });
    });

    let terminationRequested = false;

    return {
      output,
      exited,
      terminate: () => {
        if (terminationRequested) return;
        terminationRequested = true;
        if (child.exitCode !== null || child.signalCode !== null || child.pid === undefined) return;
        try {
          child.kill("SIGTERM");
        } catch (error) {
          sessionLogger.debug("DRIVER", `Failed to signal ${command}: ${error}`);
        }
      },
      wait: () => exited,
    };
  }
}
