import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatLogStamp, sessionLogger } from '../src/core/utils/session-logger';
import { makeTempDir } from './helpers/fakes';

describe('formatLogStamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatLogStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102_030405');
    expect(formatLogStamp(new Date(2026, 11, 31, 23, 59, 58))).toBe('20261231_235958');
  });
});

describe('sessionLogger', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = makeTempDir();
    sessionLogger.setDebug(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates a timestamped log file with a header', () => {
    const logFile = sessionLogger.initialize(dir, new Date(2026, 0, 2, 3, 4, 5));

    expect(logFile).toBe(path.join(dir, 'hevc-batch_20260102_030405.log'));
    expect(fs.readFileSync(path.join(dir, 'hevc-batch_20260102_030405.log'), 'utf8')).toContain('hevc-batch - Started:');
  });

  it('writes messages to the console and the file on one line', () => {
    const logFile = path.join(dir, 'hevc-batch_20260102_030405.log');
    sessionLogger.initialize(dir, new Date(2026, 0, 2, 3, 4, 5));

    sessionLogger.log('first\nsecond');
    sessionLogger.warn('careful');
    sessionLogger.error('broken');

    const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n').slice(-3);
    expect(lines[0]).toMatch(/^\[[^\]]+\] first second$/);
    expect(lines[1]).toMatch(/^\[[^\]]+\] \[WARN\] careful$/);
    expect(lines[2]).toMatch(/^\[[^\]]+\] \[ERROR\] broken$/);
    expect(console.log).toHaveBeenCalledWith('first\nsecond');
  });

  it('writes debug messages only when enabled', () => {
    const logFile = path.join(dir, 'hevc-batch_20260102_030405.log');
    sessionLogger.initialize(dir, new Date(2026, 0, 2, 3, 4, 5));

    sessionLogger.debug('PROBE', 'hidden');
    expect(fs.readFileSync(logFile, 'utf8')).not.toContain('hidden');

    sessionLogger.setDebug(true);
    sessionLogger.logCommand(['ffmpeg', '-i', 'a.mkv']);
    const contents = fs.readFileSync(logFile, 'utf8');
    expect(contents).toContain('[COMMAND] ffmpeg -i a.mkv');
    expect(console.log).toHaveBeenCalledWith('[COMMAND] ffmpeg -i a.mkv');
  });
});
