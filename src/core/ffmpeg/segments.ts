import * as fs from "fs";
import * as path from "path";
import { RuntimeContext, getChildEnvWithContext, getFfmpegPathsWithContext } from "../utils/ffmpeg-path";
import { runCommand } from "../utils/exec";
import { sessionLogger } from "../utils/session-logger";

/**
 * Output written by one job run. A run that starts at frame 0 writes the
 * final output name; a resumed run writes `<stem>.from<N><ext>`.
 */
export interface Segment {
  startFrame: number;
  path: string;
}

export type SegmentJoiner = (segments: Segment[], fps: number, destination: string) => Promise<void>;

export class SegmentChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SegmentChainError";
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function segmentPath(outputPath: string, startFrame: number): string {
  if (startFrame === 0) return outputPath;
  const ext = path.extname(outputPath);
  return `${outputPath.slice(0, outputPath.length - ext.length)}.from${startFrame}${ext}`;
}

/**
 * Segments of an output that exist on disk, ordered by start frame
 */
export function listSegments(outputPath: string): Segment[] {
  const dir = path.dirname(outputPath);
  const ext = path.extname(outputPath);
  const stem = path.basename(outputPath, ext);
  const pattern = new RegExp(`^${escapeRegExp(stem)}\\.from(\\d+)${escapeRegExp(ext)}$`);

  const segments: Segment[] = [];
  if (fs.existsSync(outputPath)) {
    segments.push({ startFrame: 0, path: outputPath });
  }

  let entries: string[] = [];
  try {
    entries = fs.readdirSync(dir);
  } catch (error) {
    sessionLogger.debug("SEGMENTS", `Could not list ${dir}: ${error}`);
  }

  for (const name of entries) {
    const match = pattern.exec(name);
    if (match) {
      const startFrame = Number(match[1]);
      if (startFrame > 0) {
        segments.push({ startFrame, path: path.join(dir, name) });
      }
    }
  }

  return segments.sort((a, b) => a.startFrame - b.startFrame);
}

/**
 * Best-effort removal of every segment of an output
 */
export function removeSegments(outputPath: string): void {
  for (const segment of listSegments(outputPath)) {
    try {
      fs.rmSync(segment.path, { force: true });
    } catch (error) {
      sessionLogger.debug("SEGMENTS", `Failed to remove ${segment.path}: ${error}`);
    }
  }
}

function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/**
 * ffmpeg concat demuxer script. Every segment but the last is cut where
 * the next one starts, so frames encoded after a pause point are dropped.
 */
export function buildConcatList(segments: Segment[], fps: number): string {
  if (segments.length === 0 || segments[0].startFrame !== 0) {
    throw new SegmentChainError("Segment chain must start at frame 0");
  }

  const lines: string[] = [];
  segments.forEach((segment, index) => {
    lines.push(`file ${quoteConcatPath(segment.path)}`);
    const next = segments[index + 1];
    if (next) {
      lines.push(`outpoint ${(next.startFrame - segment.startFrame) / fps}`);
    }
  });
  return `${lines.join("\n")}\n`;
}

/**
 * Join segments into destination with the ffmpeg concat demuxer (stream copy)
 */
export function createFfmpegSegmentJoiner(context: RuntimeContext): SegmentJoiner {
  return async (segments, fps, destination) => {
    const listPath = `${destination}.concat.txt`;
    fs.writeFileSync(listPath, buildConcatList(segments, fps), "utf8");

    const { ffmpeg } = getFfmpegPathsWithContext(context);
    const args = [
      "-nostdin", "-v", "error",
      "-f", "concat", "-safe", "0",
      "-i", listPath,
      "-c", "copy",
      "-y", destination,
    ];
    sessionLogger.logCommand([ffmpeg, ...args]);

    try {
      await runCommand(ffmpeg, args, {
        cwd: context.workingDirectory,
        env: getChildEnvWithContext(context),
      });
    } finally {
      fs.rmSync(listPath, { force: true });
    }
  };
}
