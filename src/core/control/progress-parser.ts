import { ProgressEvent, RunState } from "../types/types";

const CR = 0x0d;
const LF = 0x0a;
const MAX_LINE_BYTES = 64 * 1024;
const FRAME_PATTERN = /frame=\s*(\d+)/;

/**
 * Incremental scanner for ffmpeg progress lines.
 *
 * Bytes are accumulated until a carriage return or newline; each completed
 * line is matched against `frame=<digits>` and the relative frame number is
 * emitted. Chunk boundaries can fall anywhere, including inside the marker.
 */
export class FrameProgressParser {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  push(chunk: Uint8Array): number[] {
    const frames: number[] = [];
    let lineStart = 0;

    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i];
      if (byte !== CR && byte !== LF) continue;

      const frame = this.scanLine(chunk.subarray(lineStart, i));
      if (frame !== undefined) frames.push(frame);
      lineStart = i + 1;
    }

    if (lineStart < chunk.length) {
      this.buffer(chunk.subarray(lineStart));
    }

    return frames;
  }

  private buffer(bytes: Uint8Array): void {
    if (this.pendingBytes + bytes.length > MAX_LINE_BYTES) {
      this.reset();
      return;
    }
    this.pending.push(Buffer.from(bytes));
    this.pendingBytes += bytes.length;
  }

  private scanLine(tail: Uint8Array): number | undefined {
    const line = this.pending.length > 0
      ? Buffer.concat([...this.pending, tail]).toString("latin1")
      : Buffer.from(tail).toString("latin1");
    this.reset();

    const match = FRAME_PATTERN.exec(line);
    return match ? Number(match[1]) : undefined;
  }

  private reset(): void {
    this.pending = [];
    this.pendingBytes = 0;
  }
}

/**
 * Convert a relative frame into an absolute progress event.
 * lastFrameSeen never moves backwards.
 */
export function advanceFrame(runState: RunState, relativeFrame: number): ProgressEvent {
  const absoluteFrame = runState.startFrame + relativeFrame;
  if (absoluteFrame > runState.lastFrameSeen) {
    runState.lastFrameSeen = absoluteFrame;
  }
  return { absoluteFrame: runState.lastFrameSeen };
}
