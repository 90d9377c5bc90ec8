import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCliContext, getFfmpegPathsWithContext } from '../src/core/utils/ffmpeg-path';
import { makeTempDir } from './helpers/fakes';

describe('getFfmpegPathsWithContext', () => {
  let toolsDir: string;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    toolsDir = makeTempDir();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(toolsDir, { recursive: true, force: true });
  });

  it('uses the names on PATH without a tools directory', () => {
    expect(getFfmpegPathsWithContext({ workingDirectory: '/videos' }, 'linux')).toEqual({
      ffmpeg: 'ffmpeg',
      ffprobe: 'ffprobe',
      binPath: '',
      env: {},
    });
    expect(getFfmpegPathsWithContext({ workingDirectory: '/videos' }, 'win32').ffmpeg).toBe('ffmpeg.exe');
  });

  it('uses a tools directory holding both binaries', () => {
    fs.writeFileSync(path.join(toolsDir, 'ffmpeg'), '');
    fs.writeFileSync(path.join(toolsDir, 'ffprobe'), '');

    const paths = getFfmpegPathsWithContext({ workingDirectory: '/videos', toolsDirectory: toolsDir }, 'linux');

    expect(paths.ffmpeg).toBe(path.join(toolsDir, 'ffmpeg'));
    expect(paths.ffprobe).toBe(path.join(toolsDir, 'ffprobe'));
    expect(paths.env.PATH?.startsWith(`${toolsDir}${path.delimiter}`)).toBe(true);
  });

  it('falls back to PATH when the tools directory lacks a binary', () => {
    fs.writeFileSync(path.join(toolsDir, 'ffmpeg'), '');

    const paths = getFfmpegPathsWithContext({ workingDirectory: '/videos', toolsDirectory: toolsDir }, 'linux');

    expect(paths.ffprobe).toBe('ffprobe');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('createCliContext', () => {
  it('resolves both directories', () => {
    expect(createCliContext('/videos/../videos')).toEqual({ workingDirectory: '/videos', toolsDirectory: undefined });
    expect(createCliContext('/videos', '/opt/ffmpeg/bin/')).toEqual({
      workingDirectory: '/videos',
      toolsDirectory: '/opt/ffmpeg/bin',
    });
  });
});
