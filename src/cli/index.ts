#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'fs';
import { JobOrchestrator } from './orchestrator';
import { CliOptions, ConfigError, DEFAULT_LIST_FILE, FileConfig, loadConfigFile, resolveConfig } from './config';
import { CandidateWatcher, listCandidateFiles, writeFileList } from './file-source';
import { askResume } from './prompt';
import { formatProgressBar, formatTime } from './format';
import { BatchConfig, BatchSummary } from '../core/types/types';
import { FileCheckpointStore } from '../core/checkpoint/checkpoint-store';
import { createKeystrokeSource } from '../core/control/keystrokes';
import { FfmpegJobDriver } from '../core/ffmpeg/job-driver';
import { probeVideoWithContext } from '../core/ffmpeg/probe';
import { createFfmpegSegmentJoiner } from '../core/ffmpeg/segments';
import { detectAvailableEncoders } from '../core/utils/encoder-detection';
import { createCliContext, RuntimeContext } from '../core/utils/ffmpeg-path';
import { KeepAwake } from '../core/utils/keep-awake';
import { sessionLogger } from '../core/utils/session-logger';

const program = new Command();

program
  .name('hevc-batch')
  .description('Batch transcode a directory of videos to HEVC, with pause and resume')
  .version('1.0.0')
  .option('-d, --dir <dir>', 'Directory whose videos are transcoded (default: current directory)')
  .option('-c, --config <file>', 'Path to YAML config file')
  .option('--encoder <type>', 'Encoder: x265, nvenc, qsv, videotoolbox, auto (default: x265)')
  .option('--quality <value>', 'Constant quality value passed to the encoder')
  .option('--speed-preset <preset>', 'Encoder speed preset (e.g. medium, p5)')
  .option('--suffix <suffix>', 'Output name suffix (default: _h265_mp3)')
  .option('--dry-run', 'Print the ffmpeg commands without running them')
  .option('-l, --list [file]', `Write eligible files to a list instead of converting (default: ${DEFAULT_LIST_FILE})`)
  .option('-w, --watch', 'Keep running and convert new files as they appear')
  .option('--ffmpeg-path <dir>', 'Directory containing ffmpeg and ffprobe')
  .option('--no-keep-awake', 'Do not prevent idle sleep while converting (macOS)')
  .option('--poll-interval <ms>', 'Control loop poll interval in milliseconds (default: 100)')
  .option('--checkpoint-file <file>', 'Checkpoint file (default: .hevc-batch-resume.json in the directory)')
  .option('--log-dir <dir>', 'Directory for the session log (default: the directory)')
  .option('--debug', 'Verbose diagnostics, including ffmpeg output');

program.parse();

function printBanner(config: BatchConfig, logFile: string | null): void {
  console.log('');
  console.log('╔══════════════════════════════════════════════════════════════╗');
  console.log('║                   HEVC Batch Transcoder                      ║');
  console.log('╚══════════════════════════════════════════════════════════════╝');
  console.log('');
  console.log(`  Directory:   ${config.workingDirectory}`);
  console.log(`  Encoder:     ${config.encoder}`);
  console.log(`  Suffix:      ${config.outputSuffix}`);
  console.log(`  Mode:        ${config.listFile ? 'List' : config.dryRun ? 'Dry run' : 'Convert'}`);
  console.log(`  Watch Mode:  ${config.watchMode ? 'Enabled' : 'Disabled'}`);
  if (logFile) {
    console.log(`  Log:         ${logFile}`);
  }
  console.log('');
  if (!config.listFile && !config.dryRun) {
    console.log('  Keys: [p]/[space] pause and save progress, [q] quit and discard');
    console.log('');
  }
}

function printSummary(summary: BatchSummary, elapsedSeconds: number): void {
  sessionLogger.log('');
  sessionLogger.log(
    `  Stats: ${summary.completed.length} converted, ${summary.failed.length} failed, ${summary.skipped.length} skipped`
  );
  sessionLogger.log(`  Elapsed: ${formatTime(elapsedSeconds)}`);
  for (const file of summary.failed) {
    sessionLogger.log(`  Failed: ${file}`);
  }
}

async function resolveEncoder(config: BatchConfig, auto: boolean, context: RuntimeContext): Promise<BatchConfig> {
  if (!auto) return config;
  const detection = await detectAvailableEncoders(context);
  sessionLogger.log(
    `[Encoder Detection] Using ${detection.recommended}${detection.hasHardwareEncoder ? ' (hardware)' : ' (software)'}`
  );
  return { ...config, encoder: detection.recommended };
}

async function main(): Promise<number> {
  const opts = program.opts<CliOptions>();

  let fileConfig: FileConfig = {};
  if (opts.config) {
    fileConfig = loadConfigFile(opts.config);
    console.log(`[Config] Loaded configuration from ${opts.config}`);
  }

  const resolved = resolveConfig(opts, fileConfig);
  sessionLogger.setDebug(resolved.batch.debug);

  if (!fs.existsSync(resolved.batch.workingDirectory)) {
    throw new ConfigError(`Directory does not exist: ${resolved.batch.workingDirectory}`);
  }

  const logFile = sessionLogger.initialize(resolved.batch.logDirectory);
  const context = createCliContext(resolved.batch.workingDirectory, resolved.ffmpegPath);
  const config = await resolveEncoder(resolved.batch, resolved.encoderChoice === 'auto', context);

  printBanner(config, logFile);

  const orchestrator = new JobOrchestrator({
    config,
    driver: new FfmpegJobDriver(context, {
      encoder: config.encoder,
      quality: config.quality,
      speedPreset: config.speedPreset,
    }),
    checkpoints: new FileCheckpointStore(config.checkpointFile),
    probe: (filePath) => probeVideoWithContext(filePath, context),
    joinSegments: createFfmpegSegmentJoiner(context),
    keys: createKeystrokeSource(),
    keepAwake: config.keepAwake && !config.dryRun && !config.listFile ? new KeepAwake() : undefined,
    confirmResume: (checkpoint) => askResume(checkpoint),
    onProgress: (progress) => {
      process.stdout.write(`\r${formatProgressBar(progress.frame, progress.totalFrames, progress.resuming)}`);
    },
    onFileSettled: () => {
      process.stdout.write('\n');
    },
  });

  const onSignal = (signal: NodeJS.Signals) => {
    sessionLogger.log(`\n[Shutdown] Received ${signal}`);
    orchestrator.requestQuit();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const startTime = Date.now();
  const watcher = config.watchMode
    ? new CandidateWatcher(config.workingDirectory, config.outputSuffix, orchestrator.signal)
    : undefined;

  try {
    const files = listCandidateFiles(config.workingDirectory, config.outputSuffix);
    sessionLogger.log(`[Info] Found ${files.length} video file(s)`);
    if (watcher) {
      sessionLogger.log(`[Watch] Monitoring ${config.workingDirectory} for new video files...`);
    }

    const summary = await orchestrator.run(files, watcher);

    if (config.listFile) {
      writeFileList(config.listFile, summary.eligible);
      sessionLogger.log(`[List] Wrote ${summary.eligible.length} file(s) to ${config.listFile}`);
    } else if (!config.dryRun) {
      printSummary(summary, (Date.now() - startTime) / 1000);
    }

    return summary.failed.length > 0 ? 1 : 0;
  } finally {
    await watcher?.close();
    orchestrator.shutdown();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
    } else {
      sessionLogger.error(`Fatal error: ${error instanceof Error ? error.message : error}`, error instanceof Error ? { stack: error.stack } : undefined);
    }
    process.exit(1);
  });
