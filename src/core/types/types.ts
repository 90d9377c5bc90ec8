export type EncoderType = 'x265' | 'nvenc' | 'qsv' | 'videotoolbox';

export interface VideoMetadata {
  codec: string; // Video stream codec name, '' when the file has no video stream
  fps: number;
  totalFrames: number;
  duration: number; // Seconds
}

export interface Job {
  inputPath: string;
  outputPath: string; // Segment written by this run, never the input
  metadata: Readonly<VideoMetadata>;
}

export interface Checkpoint {
  file: string; // File name relative to the working directory
  frame: number; // Absolute frame to resume from
  timestamp: string; // ISO-8601 time the checkpoint was written
}

export interface RunState {
  startFrame: number;
  lastFrameSeen: number;
  quitRequested: boolean;
  pauseRequested: boolean;
}

export interface ProgressEvent {
  absoluteFrame: number;
}

export type ControlState =
  | 'running'
  | 'pause-requested'
  | 'quit-requested'
  | 'exited-ok'
  | 'exited-fail';

export type TerminalState = Exclude<ControlState, 'running'>;

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error; // Set when the process could not be spawned
}

export interface BatchConfig {
  workingDirectory: string;
  outputSuffix: string; // Appended to the input stem, e.g. movie_h265_mp3.mp4
  targetCodec: string; // Codec name as reported by ffprobe
  encoder: EncoderType;
  quality?: number; // Encoder-specific quality value (crf, cq, global_quality, q:v)
  speedPreset?: string;
  dryRun: boolean;
  listFile?: string; // List mode when set
  watchMode: boolean;
  checkpointFile: string;
  logDirectory: string;
  debug: boolean;
  keepAwake: boolean;
  pollIntervalMs: number;
}

export interface JobProgress {
  file: string;
  frame: number;
  totalFrames: number;
  resuming: boolean;
}

export interface ProgressCallback {
  (progress: JobProgress): void;
}

export type HaltReason = 'paused' | 'quit';

export interface BatchSummary {
  completed: string[];
  failed: string[];
  skipped: string[];
  eligible: string[]; // Absolute paths, written out in list mode
  halted?: HaltReason;
}
