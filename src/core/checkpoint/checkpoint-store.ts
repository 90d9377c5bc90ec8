import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { Checkpoint } from "../types/types";
import { sessionLogger } from "../utils/session-logger";

export const DEFAULT_CHECKPOINT_FILE = ".hevc-batch-resume.json";

export interface CheckpointStore {
  save(file: string, frame: number): void;
  load(): Checkpoint | null;
  clear(): void;
}

const checkpointSchema = z.object({
  file: z.string().min(1),
  frame: z.number().int().nonnegative(),
  timestamp: z.string(),
});

/**
 * Single-slot checkpoint persisted as a JSON file.
 * Saves go through a temp file and a rename, so a reader only ever sees
 * the previous record or the new one.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  save(file: string, frame: number): void {
    if (!Number.isInteger(frame) || frame < 0) {
      throw new RangeError(`Checkpoint frame must be a non-negative integer, got ${frame}`);
    }

    const checkpoint: Checkpoint = { file, frame, timestamp: this.now().toISOString() };
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`
    );

    try {
      const fd = fs.openSync(tempPath, "w");
      try {
        fs.writeSync(fd, JSON.stringify(checkpoint));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    sessionLogger.debug("CHECKPOINT", `Saved ${file} at frame ${frame}`);
  }

  load(): Checkpoint | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }

    const result = checkpointSchema.safeParse(parsed);
    if (result.success) return result.data;

    sessionLogger.debug("CHECKPOINT", `Ignoring unreadable checkpoint at ${this.filePath}`);
    return null;
  }

  clear(): void {
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (error) {
      sessionLogger.debug("CHECKPOINT", `Failed to remove ${this.filePath}: ${error}`);
    }
  }
}
