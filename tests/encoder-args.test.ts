import { describe, expect, it } from 'vitest';
import { buildTranscodeArgs, buildVideoEncoderArgs, seekSecondsFor } from '../src/core/ffmpeg/encoder-args';
import type { Job } from '../src/core/types/types';

const job: Job = {
  inputPath: '/videos/a.mkv',
  outputPath: '/videos/a_h265_mp3.from120.mp4',
  metadata: { codec: 'h264', fps: 25, totalFrames: 250, duration: 10 },
};

describe('buildVideoEncoderArgs', () => {
  it('tunes libx265 and maps quality onto crf', () => {
    expect(buildVideoEncoderArgs({ encoder: 'x265', quality: 22, speedPreset: 'slow' })).toEqual([
      '-c:v', 'libx265',
      '-x265-params', 'ctu=32:max-tu-size=16:pools=16',
      '-preset', 'slow',
      '-crf', '22',
    ]);
  });

  it('maps quality onto cq for nvenc', () => {
    expect(buildVideoEncoderArgs({ encoder: 'nvenc', quality: 28, speedPreset: 'p5' })).toEqual([
      '-c:v', 'hevc_nvenc', '-preset', 'p5', '-cq', '28',
    ]);
  });

  it('maps quality onto global_quality for qsv', () => {
    expect(buildVideoEncoderArgs({ encoder: 'qsv', quality: 25 })).toEqual([
      '-c:v', 'hevc_qsv', '-global_quality', '25',
    ]);
  });

  it('ignores the speed preset for videotoolbox', () => {
    expect(buildVideoEncoderArgs({ encoder: 'videotoolbox', quality: 65, speedPreset: 'fast' })).toEqual([
      '-c:v', 'hevc_videotoolbox', '-q:v', '65',
    ]);
  });

  it('leaves quality to the encoder when unset', () => {
    expect(buildVideoEncoderArgs({ encoder: 'nvenc' })).toEqual(['-c:v', 'hevc_nvenc']);
  });
});

describe('seekSecondsFor', () => {
  it('is undefined for a fresh start', () => {
    expect(seekSecondsFor(0, 25)).toBeUndefined();
  });

  it('divides the frame by the frame rate', () => {
    expect(seekSecondsFor(120, 25)).toBe(4.8);
  });
});

describe('buildTranscodeArgs', () => {
  it('seeks the input before decoding when resuming', () => {
    expect(buildTranscodeArgs(job, 120, { encoder: 'x265' })).toEqual([
      '-nostdin',
      '-ss', '4.8',
      '-i', '/videos/a.mkv',
      '-c:v', 'libx265',
      '-x265-params', 'ctu=32:max-tu-size=16:pools=16',
      '-c:a', 'libmp3lame', '-q:a', '4',
      '-y', '/videos/a_h265_mp3.from120.mp4',
    ]);
  });

  it('has no seek for a fresh start', () => {
    const args = buildTranscodeArgs({ ...job, outputPath: '/videos/a_h265_mp3.mp4' }, 0, { encoder: 'qsv' });
    expect(args).toEqual([
      '-nostdin',
      '-i', '/videos/a.mkv',
      '-c:v', 'hevc_qsv',
      '-c:a', 'libmp3lame', '-q:a', '4',
      '-y', '/videos/a_h265_mp3.mp4',
    ]);
  });
});
