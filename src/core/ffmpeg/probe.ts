import { VideoMetadata } from "../types/types";
import { RuntimeContext, getChildEnvWithContext, getFfmpegPathsWithContext } from "../utils/ffmpeg-path";
import { runCommand } from "../utils/exec";
import { sessionLogger } from "../utils/session-logger";

export const DEFAULT_FPS = 25;

export class ProbeError extends Error {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbeError";
  }
}

interface FfprobePayload {
  streams?: Array<{
    codec_type?: string;
    codec_name?: string;
    r_frame_rate?: string;
  }>;
  format?: {
    duration?: string;
  };
}

/**
 * Parse an ffprobe rational frame rate ("30000/1001").
 * Anything unusable falls back to 25 fps.
 */
export function parseFrameRate(raw: string | undefined): number {
  if (!raw) return DEFAULT_FPS;

  const [num, den] = raw.split("/", 2).map((part) => Number(part));
  if (!Number.isInteger(num) || !Number.isInteger(den) || den === 0) {
    return DEFAULT_FPS;
  }

  const fps = num / den;
  return fps > 0 ? fps : DEFAULT_FPS;
}

export function parseProbeOutput(filePath: string, json: string): VideoMetadata {
  let payload: FfprobePayload;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    throw new ProbeError(filePath, `ffprobe returned invalid JSON for ${filePath}`, { cause: error });
  }

  const videoStream = payload.streams?.find((stream) => stream.codec_type === "video");
  const parsedDuration = Number(payload.format?.duration ?? 0);
  const duration = Number.isFinite(parsedDuration) && parsedDuration > 0 ? parsedDuration : 0;
  const fps = parseFrameRate(videoStream?.r_frame_rate);

  return {
    codec: videoStream?.codec_name ?? "",
    fps,
    totalFrames: Math.max(1, Math.floor(duration * fps)),
    duration,
  };
}

/**
 * Read codec, frame rate and duration of a file with ffprobe
 */
export async function probeVideoWithContext(
  filePath: string,
  context: RuntimeContext
): Promise<VideoMetadata> {
  const { ffprobe } = getFfmpegPathsWithContext(context);
  const args = [
    "-v", "error",
    "-show_entries", "stream=codec_name,codec_type,r_frame_rate:format=duration",
    "-of", "json",
    filePath,
  ];

  let stdout: Buffer;
  try {
    ({ stdout } = await runCommand(ffprobe, args, {
      cwd: context.workingDirectory,
      env: getChildEnvWithContext(context),
      timeoutMs: 60000,
    }));
  } catch (error) {
    throw new ProbeError(filePath, `ffprobe failed for ${filePath}: ${error instanceof Error ? error.message : error}`, {
      cause: error,
    });
  }

  const metadata = parseProbeOutput(filePath, stdout.toString("utf8"));
  sessionLogger.debug("PROBE", `Metadata for ${filePath}`, metadata);
  return metadata;
}
