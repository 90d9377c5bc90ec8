import { EncoderType } from "../types/types";
import { RuntimeContext, getChildEnvWithContext, getFfmpegPathsWithContext } from "./ffmpeg-path";
import { runCommand } from "./exec";
import { sessionLogger } from "./session-logger";

/**
 * Information about an HEVC encoder ffmpeg may provide
 */
export interface EncoderInfo {
  id: EncoderType;
  name: string;
  description: string;
  ffmpegEncoder: string;
  available: boolean;
  recommended: boolean;
  priority: number; // Higher = better (used for recommendation)
  platform: "all" | "windows" | "macos" | "linux";
}

export interface EncoderDetectionResult {
  encoders: EncoderInfo[];
  recommended: EncoderType;
  hasHardwareEncoder: boolean;
}

const ALL_ENCODERS: Omit<EncoderInfo, "available" | "recommended">[] = [
  {
    id: "nvenc",
    name: "NVIDIA NVENC",
    description: "NVIDIA GPU hardware encoding (fastest)",
    ffmpegEncoder: "hevc_nvenc",
    priority: 100,
    platform: "all",
  },
  {
    id: "videotoolbox",
    name: "Apple VideoToolbox",
    description: "Apple Silicon/Intel Mac hardware encoding",
    ffmpegEncoder: "hevc_videotoolbox",
    priority: 95,
    platform: "macos",
  },
  {
    id: "qsv",
    name: "Intel Quick Sync",
    description: "Intel GPU hardware encoding",
    ffmpegEncoder: "hevc_qsv",
    priority: 90,
    platform: "all",
  },
  {
    id: "x265",
    name: "Software (x265)",
    description: "CPU-based encoding (slower, always available)",
    ffmpegEncoder: "libx265",
    priority: 10,
    platform: "all",
  },
];

function platformMatches(
  target: EncoderInfo["platform"],
  platform: NodeJS.Platform
): boolean {
  switch (target) {
    case "macos":
      return platform === "darwin";
    case "windows":
      return platform === "win32";
    case "linux":
      return platform === "linux";
    default:
      return true;
  }
}

/**
 * Extract encoder names from `ffmpeg -encoders` output.
 * Only video encoders (capability flags starting with V) are kept.
 */
export function parseEncoderList(output: string): Set<string> {
  const names = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/^\s*V[A-Z.]{5}\s+(\S+)/);
    if (match && match[1] !== "=") {
      names.add(match[1]);
    }
  }
  return names;
}

/**
 * Rank the known encoders against the set compiled into ffmpeg
 */
export function rankEncoders(
  compiled: ReadonlySet<string>,
  platform: NodeJS.Platform = process.platform
): EncoderDetectionResult {
  const results: EncoderInfo[] = ALL_ENCODERS
    .filter((encoder) => platformMatches(encoder.platform, platform))
    .map((encoder) => ({
      ...encoder,
      available: compiled.has(encoder.ffmpegEncoder),
      recommended: false,
    }));

  const availableEncoders = results
    .filter((e) => e.available)
    .sort((a, b) => b.priority - a.priority);

  let recommendedId: EncoderType = "x265"; // Default fallback
  if (availableEncoders.length > 0) {
    recommendedId = availableEncoders[0].id;
  }

  const recommendedEncoder = results.find((e) => e.id === recommendedId);
  if (recommendedEncoder) {
    recommendedEncoder.recommended = true;
  }

  return {
    encoders: results,
    recommended: recommendedId,
    hasHardwareEncoder: availableEncoders.some((e) => e.id !== "x265"),
  };
}

/**
 * Detect which HEVC encoders the local ffmpeg build provides.
 * This reports what is compiled in, not whether matching hardware is present.
 */
export async function detectAvailableEncoders(
  context: RuntimeContext
): Promise<EncoderDetectionResult> {
  const { ffmpeg } = getFfmpegPathsWithContext(context);
  let compiled = new Set<string>();

  try {
    const { stdout } = await runCommand(ffmpeg, ["-hide_banner", "-encoders"], {
      env: getChildEnvWithContext(context),
      timeoutMs: 10000,
    });
    compiled = parseEncoderList(stdout.toString("utf8"));
  } catch (error) {
    sessionLogger.warn(`[Encoder Detection] Could not list ffmpeg encoders: ${error}`);
  }

  const result = rankEncoders(compiled);
  for (const encoder of result.encoders) {
    sessionLogger.debug(
      "ENCODERS",
      `${encoder.name} (${encoder.ffmpegEncoder}): ${encoder.available ? "available" : "not available"}`
    );
  }
  sessionLogger.debug(
    "ENCODERS",
    `Recommended encoder: ${result.recommended}${result.hasHardwareEncoder ? " (hardware)" : " (software only)"}`
  );

  return result;
}
