import { spawn } from "child_process";

export type RunCommandResult = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly code: number;
};

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    super(`Command "${command} ${args.join(" ")}" failed with exit code ${exitCode}`);
    this.name = "CommandError";
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = stderr.toString("utf8");
  }
}

/**
 * Run a short-lived command to completion and collect its output.
 * Rejects with CommandError on a non-zero exit and with the spawn error
 * when the executable cannot be started.
 */
export const runCommand = async (
  command: string,
  args: readonly string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv; timeoutMs?: number } = {},
): Promise<RunCommandResult> => {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

  const timeout = options.timeoutMs
    ? setTimeout(() => child.kill("SIGTERM"), options.timeoutMs)
    : undefined;

  let exitCode: number;
  try {
    exitCode = await new Promise<number>((resolve, reject) => {
      child.once("error", reject);
      child.once("close", (code) => resolve(code ?? -1));
    });
  } finally {
    if (timeout) clearTimeout(timeout);
  }

  const stdout = Buffer.concat(stdoutChunks);
  const stderr = Buffer.concat(stderrChunks);

  if (exitCode !== 0) {
    throw new CommandError(command, [...args], exitCode, stderr);
  }

  return { stdout, stderr, code: exitCode };
};
