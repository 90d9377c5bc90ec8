import * as path from 'path';
import * as fs from 'fs';
import {
  BatchConfig,
  BatchSummary,
  Checkpoint,
  ExitStatus,
  Job,
  ProgressCallback,
  RunState,
  TerminalState,
  VideoMetadata,
} from '../core/types/types';
import { CheckpointStore } from '../core/checkpoint/checkpoint-store';
import { JobDriver, ProcessHandle } from '../core/ffmpeg/job-driver';
import {
  SegmentChainError,
  SegmentJoiner,
  listSegments,
  removeSegments,
  segmentPath,
} from '../core/ffmpeg/segments';
import { KeystrokeSource } from '../core/control/keystrokes';
import { ControlStateMachine } from '../core/control/state-machine';
import { runJobLoop } from '../core/control/multiplexer';
import { sessionLogger } from '../core/utils/session-logger';

export type ResumeDecision = 'resume' | 'decline' | 'ignore';

export interface OrchestratorOptions {
  config: BatchConfig;
  driver: JobDriver;
  checkpoints: CheckpointStore;
  probe: (filePath: string) => Promise<VideoMetadata>;
  joinSegments: SegmentJoiner;
  keys?: KeystrokeSource;
  keepAwake?: { start(): void; stop(): void };
  confirmResume?: (checkpoint: Checkpoint) => Promise<ResumeDecision>;
  onFileStart?: (job: Job, resumeFrame: number) => void;
  onProgress?: ProgressCallback;
  onFileSettled?: (job: Job, outcome: TerminalState) => void;
  onFileComplete?: (file: string) => void;
  onFileFailed?: (file: string, error: Error) => void;
  onFileSkipped?: (file: string, reason: string) => void;
}

interface JobResult {
  outcome: TerminalState;
  status: ExitStatus;
  runState: RunState;
}

/**
 * Final output name for an input: `<stem><suffix>.mp4` beside the input
 */
export function outputPathFor(inputPath: string, suffix: string): string {
  const ext = path.extname(inputPath);
  return path.join(path.dirname(inputPath), `${path.basename(inputPath, ext)}${suffix}.mp4`);
}

function describeExit(status: ExitStatus): string {
  if (status.error) return status.error.message;
  if (status.signal) return `ffmpeg was stopped by ${status.signal}`;
  return `ffmpeg exited with code ${status.code}`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs encode jobs one file at a time and acts on how each job ended.
 */
export class JobOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly config: BatchConfig;
  private readonly abort = new AbortController();
  private activeHandle: ProcessHandle | null = null;
  private resume: Checkpoint | null = null;
  private shutDown = false;
  private summary: BatchSummary = { completed: [], failed: [], skipped: [], eligible: [] };

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.config = options.config;
  }

  /**
   * Aborted once a quit was requested from outside a job (signals)
   */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  /**
   * Signal-handler entry point: flag the quit and stop the running child.
   * Everything else happens on the orchestrator's own path.
   */
  requestQuit(): void {
    this.abort.abort();
    this.activeHandle?.terminate();
  }

  /**
   * Release run-wide resources. Safe to call more than once.
   */
  shutdown(): void {
    if (this.shutDown) return;
    this.shutDown = true;
    this.options.keepAwake?.stop();
  }

  /**
   * Process the initial listing, then any files arriving from `incoming`,
   * until the list runs out or a pause/quit halts the run.
   */
  async run(files: readonly string[], incoming?: AsyncIterable<string>): Promise<BatchSummary> {
    this.summary = { completed: [], failed: [], skipped: [], eligible: [] };
    this.options.keepAwake?.start();

    try {
      this.resume = await this.resolveResume(files);

      for (const file of files) {
        if (!(await this.step(file))) return this.summary;
      }

      if (incoming) {
        for await (const file of incoming) {
          if (!(await this.step(file))) break;
        }
      }

      return this.summary;
    } finally {
      this.shutdown();
    }
  }

  private identify(file: string): string {
    return path.relative(this.config.workingDirectory, path.resolve(this.config.workingDirectory, file));
  }

  private async resolveResume(files: readonly string[]): Promise<Checkpoint | null> {
    const checkpoint = this.options.checkpoints.load();
    if (!checkpoint) return null;

    const names = new Set(files.map((file) => this.identify(file)));
    if (!names.has(checkpoint.file)) {
      sessionLogger.debug('RESUME', `Checkpoint for ${checkpoint.file} does not match any input, ignoring`);
      return null;
    }

    sessionLogger.log(`\nFound partial work for: ${checkpoint.file}`);
    const decision = this.options.confirmResume
      ? await this.options.confirmResume(checkpoint)
      : 'ignore';

    if (decision === 'decline') {
      this.options.checkpoints.clear();
      const inputPath = path.resolve(this.config.workingDirectory, checkpoint.file);
      removeSegments(outputPathFor(inputPath, this.config.outputSuffix));
      sessionLogger.log(`[Resume] Discarded partial work for ${checkpoint.file}`);
      return null;
    }

    return decision === 'resume' ? checkpoint : null;
  }

  /**
   * Process one file; false halts the run
   */
  private async step(file: string): Promise<boolean> {
    if (this.abort.signal.aborted) {
      this.summary.halted ??= 'quit';
      return false;
    }
    await this.processFile(file);
    return this.summary.halted === undefined;
  }

  private skip(name: string, reason: string): void {
    sessionLogger.log(`[Skip] ${name}: ${reason}`);
    this.summary.skipped.push(name);
    this.options.onFileSkipped?.(name, reason);
  }

  private async hasFinishedOutput(outputPath: string): Promise<boolean> {
    if (!fs.existsSync(outputPath)) return false;
    try {
      const output = await this.options.probe(outputPath);
      return output.codec === this.config.targetCodec;
    } catch (error) {
      sessionLogger.debug('PROBE', `Could not probe existing output ${outputPath}: ${error}`);
      return false;
    }
  }

  private async processFile(file: string): Promise<void> {
    const name = this.identify(file);
    const inputPath = path.resolve(this.config.workingDirectory, name);
    const outputPath = outputPathFor(inputPath, this.config.outputSuffix);

    let metadata: VideoMetadata;
    try {
      metadata = await this.options.probe(inputPath);
    } catch (error) {
      this.skip(name, `error getting info: ${toError(error).message}`);
      return;
    }
    sessionLogger.log(`File: ${name} | Codec: ${metadata.codec || 'none'} | Duration: ${metadata.duration}s`);

    let checkpoint = this.resume !== null && this.resume.file === name ? this.resume : null;

    // A resumed segment can only be joined onto a run that started at frame 0
    if (checkpoint && checkpoint.frame > 0 && listSegments(outputPath)[0]?.startFrame !== 0) {
      sessionLogger.warn(`[Resume] No output from frame 0 for ${name}, starting over`);
      this.options.checkpoints.clear();
      this.resume = null;
      checkpoint = null;
    }

    if (!checkpoint) {
      if (metadata.codec === this.config.targetCodec) {
        this.skip(name, `already ${this.config.targetCodec.toUpperCase()}`);
        return;
      }
      if (await this.hasFinishedOutput(outputPath)) {
        this.skip(name, `output ${path.basename(outputPath)} already exists and is ${this.config.targetCodec.toUpperCase()}`);
        return;
      }
    }

    this.summary.eligible.push(inputPath);
    if (this.config.listFile) return;

    const startFrame = checkpoint ? checkpoint.frame : 0;
    const job: Job = { inputPath, outputPath: segmentPath(outputPath, startFrame), metadata };

    if (this.config.dryRun) {
      sessionLogger.log(`[DRY RUN] Would execute: ${this.options.driver.describe(job, startFrame).join(' ')}`);
      return;
    }

    if (startFrame === 0) {
      removeSegments(outputPath);
      sessionLogger.log(`\nProcessing: ${name}`);
    } else {
      sessionLogger.log(`\nResuming: ${name} at frame ${startFrame}`);
    }

    const result = await this.runJob(job, name, startFrame);
    await this.settle(job, name, outputPath, checkpoint !== null, result);
  }

  private persistCheckpoint(name: string, frame: number): void {
    try {
      this.options.checkpoints.save(name, frame);
    } catch (error) {
      sessionLogger.error(`Failed to save checkpoint for ${name}: ${toError(error).message}`);
    }
  }

  private async runJob(job: Job, name: string, startFrame: number): Promise<JobResult> {
    const runState: RunState = {
      startFrame,
      lastFrameSeen: startFrame,
      quitRequested: false,
      pauseRequested: false,
    };

    const handle = this.options.driver.start(job, startFrame);
    this.activeHandle = handle;

    const machine = new ControlStateMachine(runState, {
      persistCheckpoint: (frame) => this.persistCheckpoint(name, frame),
      terminateChild: () => handle.terminate(),
    });

    this.options.onFileStart?.(job, startFrame);

    try {
      const outcome = await runJobLoop({
        handle,
        machine,
        runState,
        keys: this.options.keys,
        cancellation: this.abort.signal,
        pollIntervalMs: this.config.pollIntervalMs,
        onProgress: (event) =>
          this.options.onProgress?.({
            file: name,
            frame: event.absoluteFrame,
            totalFrames: job.metadata.totalFrames,
            resuming: startFrame > 0,
          }),
      });
      const status = await handle.wait();
      return { outcome, status, runState };
    } catch (error) {
      handle.terminate();
      throw error;
    } finally {
      this.activeHandle = null;
    }
  }

  private async commit(inputPath: string, outputPath: string, fps: number): Promise<void> {
    const segments = listSegments(outputPath);
    if (segments.length === 0 || segments[0].startFrame !== 0) {
      throw new SegmentChainError(`No output starting at frame 0 for ${path.basename(inputPath)}`);
    }

    let finished = segments[0].path;
    if (segments.length > 1) {
      const ext = path.extname(outputPath);
      finished = `${outputPath.slice(0, outputPath.length - ext.length)}.joined${ext}`;
      await this.options.joinSegments(segments, fps, finished);
      removeSegments(outputPath);
    }

    // rename(2) replaces the original in one step
    fs.renameSync(finished, inputPath);
  }

  private async settle(
    job: Job,
    name: string,
    outputPath: string,
    resumed: boolean,
    result: JobResult
  ): Promise<void> {
    const { outcome, status, runState } = result;
    this.options.onFileSettled?.(job, outcome);

    switch (outcome) {
      case 'exited-ok':
        try {
          await this.commit(job.inputPath, outputPath, job.metadata.fps);
        } catch (error) {
          const err = toError(error);
          sessionLogger.error(`✗ Failed to replace ${name}: ${err.message}`);
          this.summary.failed.push(name);
          this.options.onFileFailed?.(name, err);
          return;
        }
        this.options.checkpoints.clear();
        this.resume = null;
        sessionLogger.log('✓ Success');
        this.summary.completed.push(name);
        this.options.onFileComplete?.(name);
        return;

      case 'quit-requested':
        sessionLogger.log('\n[QUIT] Cleaning up and exiting...');
        this.options.checkpoints.clear();
        removeSegments(outputPath);
        this.summary.halted = 'quit';
        return;

      case 'pause-requested':
        sessionLogger.log(`\n[PAUSED] Progress saved for ${name} at frame ${runState.lastFrameSeen}. Exiting.`);
        this.summary.halted = 'paused';
        return;

      case 'exited-fail': {
        const reason = describeExit(status);
        if (resumed) {
          sessionLogger.log(`✗ Failed: ${name} (${reason}); checkpoint kept for a later resume`);
        } else {
          sessionLogger.log(`✗ Failed: ${name} (${reason})`);
          try {
            fs.rmSync(job.outputPath, { force: true });
          } catch (error) {
            sessionLogger.debug('CLEANUP', `Failed to remove ${job.outputPath}: ${error}`);
          }
        }
        this.summary.failed.push(name);
        this.options.onFileFailed?.(name, new Error(reason));
        return;
      }
    }
  }
}
