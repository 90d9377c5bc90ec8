import * as chokidar from 'chokidar';
import * as fs from 'fs';
import * as path from 'path';
import { Inbox } from '../core/control/inbox';
import { sessionLogger } from '../core/utils/session-logger';

// Supported video file extensions
export const VIDEO_EXTENSIONS = new Set([
  '.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm',
]);

const WATCH_POLL_MS = 500;

export function isCandidateFile(name: string, outputSuffix: string): boolean {
  if (name.startsWith('.')) return false;
  if (name.includes(outputSuffix)) return false;
  return VIDEO_EXTENSIONS.has(path.extname(name).toLowerCase());
}

/**
 * Candidate file names directly inside dir, in lexicographic order.
 * A directory that cannot be read is fatal and throws.
 */
export function listCandidateFiles(dir: string, outputSuffix: string): string[] {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isCandidateFile(entry.name, outputSuffix))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Write absolute paths, one per line
 */
export function writeFileList(listFile: string, paths: readonly string[]): void {
  fs.writeFileSync(listFile, paths.map((p) => `${p}\n`).join(''), 'utf8');
}

/**
 * New candidate files appearing in a directory.
 * Events are buffered from construction, so files added while the initial
 * listing is processed are not missed. Iteration ends on close() or abort.
 */
export class CandidateWatcher implements AsyncIterable<string> {
  private readonly watcher: chokidar.FSWatcher;
  private readonly inbox = new Inbox<string>();
  private closed = false;

  constructor(
    private readonly dir: string,
    private readonly outputSuffix: string,
    private readonly signal?: AbortSignal
  ) {
    this.watcher = chokidar.watch(dir, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: 2000, // Wait 2 seconds after last change
        pollInterval: 100,
      },
    });

    this.watcher
      .on('add', (filePath: string) => {
        const name = path.basename(filePath);
        if (path.dirname(path.resolve(filePath)) === path.resolve(this.dir) && isCandidateFile(name, this.outputSuffix)) {
          sessionLogger.log(`\n[Watch] New file detected: ${name}`);
          this.inbox.push(name);
        }
      })
      .on('error', (error: unknown) => {
        sessionLogger.error(`[Watch] Error: ${error}`);
      });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    while (!this.closed && !this.signal?.aborted) {
      const batch = await this.inbox.take(WATCH_POLL_MS);
      for (const name of batch) {
        yield name;
      }
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.watcher.close();
  }
}
