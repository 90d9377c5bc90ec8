import * as path from "path";
import * as fs from "fs";
import { sessionLogger } from "./session-logger";

/**
 * Runtime context for ffmpeg/ffprobe resolution
 */
export interface RuntimeContext {
  workingDirectory: string;
  toolsDirectory?: string; // Directory holding ffmpeg and ffprobe, PATH lookup when unset
}

export interface FfmpegPaths {
  ffmpeg: string;
  ffprobe: string;
  binPath: string; // "" when the tools come from PATH
  env: NodeJS.ProcessEnv;
}

function executableName(tool: "ffmpeg" | "ffprobe", platform: NodeJS.Platform): string {
  return platform === "win32" ? `${tool}.exe` : tool;
}

/**
 * Resolves the ffmpeg and ffprobe executables for a context.
 * A configured tools directory wins when both binaries exist there;
 * otherwise the bare names resolve through PATH.
 */
export function getFfmpegPathsWithContext(
  context: RuntimeContext,
  platform: NodeJS.Platform = process.platform
): FfmpegPaths {
  const ffmpegName = executableName("ffmpeg", platform);
  const ffprobeName = executableName("ffprobe", platform);

  if (context.toolsDirectory) {
    const binPath = path.resolve(context.toolsDirectory);
    const ffmpeg = path.join(binPath, ffmpegName);
    const ffprobe = path.join(binPath, ffprobeName);

    if (fs.existsSync(ffmpeg) && fs.existsSync(ffprobe)) {
      return {
        ffmpeg,
        ffprobe,
        binPath,
        env: {
          PATH: `${binPath}${path.delimiter}${process.env.PATH ?? ""}`,
        },
      };
    }

    sessionLogger.warn(
      `ffmpeg/ffprobe not found in ${binPath}, falling back to the system PATH`
    );
  }

  return {
    ffmpeg: ffmpegName,
    ffprobe: ffprobeName,
    binPath: "",
    env: {},
  };
}

/**
 * Environment for child processes: the current environment plus tool overrides
 */
export function getChildEnvWithContext(context: RuntimeContext): NodeJS.ProcessEnv {
  return { ...process.env, ...getFfmpegPathsWithContext(context).env };
}

/**
 * Create a CLI runtime context
 * @param workingDirectory Directory whose videos are transcoded
 * @param toolsDirectory Optional directory containing ffmpeg and ffprobe
 */
export function createCliContext(workingDirectory: string, toolsDirectory?: string): RuntimeContext {
  return {
    workingDirectory: path.resolve(workingDirectory),
    toolsDirectory: toolsDirectory ? path.resolve(toolsDirectory) : undefined,
  };
}
