import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FfmpegJobDriver } from '../src/core/ffmpeg/job-driver';
import type { Job } from '../src/core/types/types';
import { createCliContext } from '../src/core/utils/ffmpeg-path';
import { makeTempDir } from './helpers/fakes';

/** Stand-in ffmpeg writing one line to each stream */
const FFMPEG_SCRIPT = '#!/bin/sh\necho out\necho "frame=  12" >&2\nexit 0\n';

describe.skipIf(process.platform === 'win32')('FfmpegJobDriver', () => {
  let dir: string;
  let toolsDir: string;
  let job: Job;

  const installTools = (mode: number) => {
    for (const tool of ['ffmpeg', 'ffprobe']) {
      const file = path.join(toolsDir, tool);
      fs.writeFileSync(file, FFMPEG_SCRIPT);
      fs.chmodSync(file, mode);
    }
  };

  const collect = async (output: AsyncIterable<Buffer | string>): Promise<string> => {
    let text = '';
    for await (const chunk of output) {
      text += chunk.toString();
    }
    return text;
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = makeTempDir();
    toolsDir = path.join(dir, 'bin');
    fs.mkdirSync(toolsDir);
    job = {
      inputPath: path.join(dir, 'a.mkv'),
      outputPath: path.join(dir, 'a_h265_mp3.mp4'),
      metadata: { codec: 'h264', fps: 25, totalFrames: 250, duration: 10 },
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('merges stdout and stderr into one stream', async () => {
    installTools(0o755);
    const handle = new FfmpegJobDriver(createCliContext(dir, toolsDir), { encoder: 'x265' }).start(job, 0);

    const text = await collect(handle.output);
    const status = await handle.exited;

    expect(text.split('\n').filter((line) => line !== '').sort()).toEqual(['frame=  12', 'out']);
    expect(status).toEqual({ code: 0, signal: null });
  });

  it('ignores terminate after the child has exited', async () => {
    installTools(0o755);
    const handle = new FfmpegJobDriver(createCliContext(dir, toolsDir), { encoder: 'x265' }).start(job, 0);
    handle.output.resume();
    await handle.wait();

    expect(() => handle.terminate()).not.toThrow();
    expect(() => handle.terminate()).not.toThrow();
    await expect(handle.wait()).resolves.toEqual({ code: 0, signal: null });
  });

  it('settles with the error when the child cannot start', async () => {
    installTools(0o644);
    const handle = new FfmpegJobDriver(createCliContext(dir, toolsDir), { encoder: 'x265' }).start(job, 0);

    const text = await collect(handle.output);
    const status = await handle.exited;

    expect(text).toBe('');
    expect(status.code).toBeNull();
    expect(status.error).toBeInstanceOf(Error);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
