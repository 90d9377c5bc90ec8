import { EncoderType, Job } from "../types/types";

export interface EncoderSettings {
  encoder: EncoderType;
  quality?: number;
  speedPreset?: string;
}

/**
 * Video encoder arguments per encoder.
 * Quality maps onto each encoder's own constant-quality knob:
 * - x265: CRF (0-51, lower = better)
 * - NVENC: CQ (0-51, lower = better)
 * - QSV: global_quality (1-51, lower = better)
 * - VideoToolbox: q:v (1-100, higher = better)
 */
export function buildVideoEncoderArgs(settings: EncoderSettings): string[] {
  const { encoder, quality, speedPreset } = settings;

  switch (encoder) {
    case "nvenc":
      return [
        "-c:v", "hevc_nvenc",
        ...(speedPreset ? ["-preset", speedPreset] : []),
        ...(quality !== undefined ? ["-cq", String(quality)] : []),
      ];
    case "qsv":
      return [
        "-c:v", "hevc_qsv",
        ...(speedPreset ? ["-preset", speedPreset] : []),
        ...(quality !== undefined ? ["-global_quality", String(quality)] : []),
      ];
    case "videotoolbox":
      return [
        "-c:v", "hevc_videotoolbox",
        ...(quality !== undefined ? ["-q:v", String(quality)] : []),
      ];
    default:
      return [
        "-c:v", "libx265",
        "-x265-params", "ctu=32:max-tu-size=16:pools=16",
        ...(speedPreset ? ["-preset", speedPreset] : []),
        ...(quality !== undefined ? ["-crf", String(quality)] : []),
      ];
  }
}

/**
 * Seek offset in seconds for a resume frame, undefined for a fresh start
 */
export function seekSecondsFor(resumeFrame: number, fps: number): number | undefined {
  return resumeFrame > 0 ? resumeFrame / fps : undefined;
}

/**
 * Full ffmpeg argument list for one job run
 */
export function buildTranscodeArgs(
  job: Job,
  resumeFrame: number,
  settings: EncoderSettings
): string[] {
  const args = ["-nostdin"];

  const seekSeconds = seekSecondsFor(resumeFrame, job.metadata.fps);
  if (seekSeconds !== undefined) {
    args.push("-ss", String(seekSeconds));
  }

  args.push(
    "-i", job.inputPath,
    ...buildVideoEncoderArgs(settings),
    "-c:a", "libmp3lame", "-q:a", "4",
    "-y", job.outputPath
  );

  return args;
}
