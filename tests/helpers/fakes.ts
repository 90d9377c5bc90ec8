import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import type { BatchConfig, ExitStatus, Job } from '../../src/core/types/types';
import type { JobDriver, ProcessHandle } from '../../src/core/ffmpeg/job-driver';
import type { KeystrokeSource } from '../../src/core/control/keystrokes';
import { buildTranscodeArgs } from '../../src/core/ffmpeg/encoder-args';

/**
 * Stand-in for a running ffmpeg child
 */
export class FakeProcess implements ProcessHandle {
  readonly output = new PassThrough();
  readonly exited: Promise<ExitStatus>;
  terminateCalls = 0;
  private settleExit: (status: ExitStatus) => void = () => undefined;
  private finished = false;

  constructor() {
    this.exited = new Promise<ExitStatus>((resolve) => {
      this.settleExit = resolve;
    });
  }

  emit(text: string): void {
    if (!this.finished) this.output.write(text);
  }

  /** Exit after a short delay so earlier output is delivered first */
  exit(status: ExitStatus, delayMs = 20): void {
    setTimeout(() => this.finish(status), delayMs);
  }

  finish(status: ExitStatus): void {
    if (this.finished) return;
    this.finished = true;
    this.output.end();
    this.settleExit(status);
  }

  terminate(): void {
    this.terminateCalls++;
    setTimeout(() => this.finish({ code: null, signal: 'SIGTERM' }), 5);
  }

  wait(): Promise<ExitStatus> {
    return this.exited;
  }
}

export type FakeScript = (proc: FakeProcess, job: Job, resumeFrame: number) => void;

export interface FakeStart {
  job: Job;
  resumeFrame: number;
  process: FakeProcess;
}

export class FakeDriver implements JobDriver {
  readonly starts: FakeStart[] = [];
  readonly described: string[][] = [];

  constructor(private readonly script: FakeScript) {}

  describe(job: Job, resumeFrame: number): string[] {
    const command = ['ffmpeg', ...buildTranscodeArgs(job, resumeFrame, { encoder: 'x265' })];
    this.described.push(command);
    return command;
  }

  start(job: Job, resumeFrame: number): ProcessHandle {
    const proc = new FakeProcess();
    this.starts.push({ job, resumeFrame, process: proc });
    this.script(proc, job, resumeFrame);
    return proc;
  }
}

export class FakeKeys implements KeystrokeSource {
  acquired = 0;
  released = 0;
  private listener: ((key: string) => void) | undefined;

  acquire(onKey: (key: string) => void): () => void {
    this.acquired++;
    this.listener = onKey;
    let done = false;
    return () => {
      if (done) return;
      done = true;
      this.released++;
      this.listener = undefined;
    };
  }

  press(key: string): void {
    this.listener?.(key);
  }
}

export function makeTempDir(prefix = 'hevc-batch-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function makeConfig(workingDirectory: string, overrides: Partial<BatchConfig> = {}): BatchConfig {
  return {
    workingDirectory,
    outputSuffix: '_h265_mp3',
    targetCodec: 'hevc',
    encoder: 'x265',
    dryRun: false,
    watchMode: false,
    checkpointFile: path.join(workingDirectory, '.hevc-batch-resume.json'),
    logDirectory: workingDirectory,
    debug: false,
    keepAwake: false,
    pollIntervalMs: 10,
    ...overrides,
  };
}
