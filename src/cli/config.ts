import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { BatchConfig, EncoderType } from '../core/types/types';
import { DEFAULT_CHECKPOINT_FILE } from '../core/checkpoint/checkpoint-store';
import { DEFAULT_POLL_INTERVAL_MS } from '../core/control/multiplexer';

export const DEFAULT_OUTPUT_SUFFIX = '_h265_mp3';
export const DEFAULT_LIST_FILE = 'files_to_convert.txt';
export const TARGET_CODEC = 'hevc';

const ENCODERS: readonly EncoderType[] = ['x265', 'nvenc', 'qsv', 'videotoolbox'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Options as commander hands them over (all strings or flags)
 */
export interface CliOptions {
  dir?: string;
  config?: string;
  encoder?: string;
  quality?: string;
  speedPreset?: string;
  suffix?: string;
  dryRun?: boolean;
  list?: string | boolean;
  watch?: boolean;
  ffmpegPath?: string;
  keepAwake?: boolean;
  debug?: boolean;
  pollInterval?: string;
  checkpointFile?: string;
  logDir?: string;
}

export interface ResolvedConfig {
  batch: BatchConfig;
  encoderChoice: EncoderType | 'auto';
  ffmpegPath?: string;
}

// YAML leaves a key with no value as null; treat it as unset
function unset<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const text = (key: string) => unset(z.string({ invalid_type_error: `Config key "${key}" must be a string` }));

const count = (key: string) =>
  unset(
    z
      .number({ invalid_type_error: `Config key "${key}" must be a number` })
      .finite(`Config key "${key}" must be a number`)
  );

const flag = (key: string) => unset(z.boolean({ invalid_type_error: `Config key "${key}" must be true or false` }));

/**
 * Same keys as the command line, read from a YAML file
 */
const fileConfigSchema = z
  .object(
    {
      dir: text('dir'),
      encoder: text('encoder'),
      quality: count('quality'),
      speedPreset: text('speedPreset'),
      suffix: text('suffix'),
      dryRun: flag('dryRun'),
      list: unset(
        z.union([z.string(), z.boolean()], {
          errorMap: () => ({ message: 'Config key "list" must be a file name or true/false' }),
        })
      ),
      watch: flag('watch'),
      ffmpegPath: text('ffmpegPath'),
      keepAwake: flag('keepAwake'),
      debug: flag('debug'),
      pollInterval: count('pollInterval'),
      checkpointFile: text('checkpointFile'),
      logDir: text('logDir'),
    },
    { invalid_type_error: 'Config file must contain a mapping' }
  )
  .partial();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Parse the YAML config file contents
 */
export function parseConfigFile(contents: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(contents);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : error}`);
  }
  if (parsed === null || parsed === undefined) return {};

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(result.error.issues[0]?.message ?? 'Invalid config file');
  }
  return result.data;
}

export function loadConfigFile(filePath: string): FileConfig {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : error}`);
  }
  return parseConfigFile(contents);
}

function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseEncoder(raw: string): EncoderType | 'auto' {
  if (raw === 'auto') return 'auto';
  const match = ENCODERS.find((encoder) => encoder === raw);
  if (!match) {
    throw new ConfigError(`Unknown encoder "${raw}". Use one of: ${ENCODERS.join(', ')}, auto`);
  }
  return match;
}

function resolveListFile(list: string | boolean | undefined): string | undefined {
  if (list === undefined || list === false) return undefined;
  return list === true ? DEFAULT_LIST_FILE : list;
}

/**
 * Merge command line options over file config, then apply defaults
 */
export function resolveConfig(
  opts: CliOptions,
  fileConfig: FileConfig = {},
  cwd: string = process.cwd()
): ResolvedConfig {
  const workingDirectory = path.resolve(cwd, opts.dir ?? fileConfig.dir ?? '.');
  const encoderChoice = parseEncoder(opts.encoder ?? fileConfig.encoder ?? 'x265');
  const quality = parseNumberOption('quality', opts.quality) ?? fileConfig.quality;
  const pollIntervalMs =
    parseNumberOption('poll-interval', opts.pollInterval) ?? fileConfig.pollInterval ?? DEFAULT_POLL_INTERVAL_MS;

  if (pollIntervalMs <= 0) {
    throw new ConfigError('--poll-interval must be greater than 0');
  }

  const outputSuffix = opts.suffix ?? fileConfig.suffix ?? DEFAULT_OUTPUT_SUFFIX;
  if (!outputSuffix) {
    throw new ConfigError('--suffix must not be empty');
  }

  const listFile = resolveListFile(opts.list ?? fileConfig.list);
  const watchMode = opts.watch ?? fileConfig.watch ?? false;
  if (listFile && watchMode) {
    throw new ConfigError('--list cannot be combined with --watch');
  }

  const batch: BatchConfig = {
    workingDirectory,
    outputSuffix,
    targetCodec: TARGET_CODEC,
    encoder: encoderChoice === 'auto' ? 'x265' : encoderChoice,
    quality,
    speedPreset: opts.speedPreset ?? fileConfig.speedPreset,
    dryRun: opts.dryRun ?? fileConfig.dryRun ?? false,
    listFile: listFile ? path.resolve(workingDirectory, listFile) : undefined,
    watchMode,
    checkpointFile: path.resolve(workingDirectory, opts.checkpointFile ?? fileConfig.checkpointFile ?? DEFAULT_CHECKPOINT_FILE),
    logDirectory: path.resolve(workingDirectory, opts.logDir ?? fileConfig.logDir ?? '.'),
    debug: opts.debug ?? fileConfig.debug ?? false,
    // commander always sets keepAwake because of --no-keep-awake; only `false` is an explicit choice
    keepAwake: opts.keepAwake === false ? false : fileConfig.keepAwake ?? true,
    pollIntervalMs,
  };

  return {
    batch,
    encoderChoice,
    ffmpegPath: opts.ffmpegPath ?? fileConfig.ffmpegPath,
  };
}
