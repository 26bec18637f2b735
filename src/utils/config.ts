import os from 'os';
import path from 'path';
import { ConfigurationError, errorMessage } from './errors.js';
import { splitArgs } from './validator.js';
import type { DownloaderConfig, LogLevel } from '../types/index.js';

export const DEFAULT_GRACE_PERIOD_MS = 5000;

// Options as they come off the command line (commander hands over strings)
export interface CliConfigOptions {
  output?: string;
  ytDlp?: string;
  ffmpeg?: string;
  cookies?: string;
  limitRate?: string;
  throttledRate?: string;
  options?: string;
  concurrency?: string;
  grace?: string;
  verbose?: boolean;
}

function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/') || dir.startsWith('~\\')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

function nonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

function parsePositiveInt(raw: string | undefined, name: string, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be a whole number, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigurationError(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === 'silent' || raw === 'info' || raw === 'debug') return raw;
  return undefined;
}

/**
 * Merges CLI flags over TUBEQUEUE_* environment variables over defaults.
 */
export function resolveConfig(
  options: CliConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): DownloaderConfig {
  const outputDir = nonEmpty(options.output, env.TUBEQUEUE_OUTPUT_DIR) ?? '~/Downloads';

  let customOptions: string[];
  try {
    customOptions = splitArgs(nonEmpty(options.options, env.TUBEQUEUE_OPTIONS) ?? '');
  } catch (error) {
    throw new ConfigurationError(`Invalid custom options: ${errorMessage(error)}`);
  }

  const ffmpegPath = nonEmpty(options.ffmpeg, env.TUBEQUEUE_FFMPEG_PATH);
  const cookiesFile = nonEmpty(options.cookies, env.TUBEQUEUE_COOKIES);

  return {
    ytdlpPath: nonEmpty(options.ytDlp, env.TUBEQUEUE_YTDLP_PATH) ?? 'yt-dlp',
    ffmpegPath: ffmpegPath ? expandHome(ffmpegPath) : undefined,
    outputDir: path.resolve(expandHome(outputDir)),
    cookiesFile: cookiesFile ? expandHome(cookiesFile) : undefined,
    limitRate: nonEmpty(options.limitRate),
    throttledRate: nonEmpty(options.throttledRate),
    customOptions,
    concurrency: parsePositiveInt(
      nonEmpty(options.concurrency, env.TUBEQUEUE_CONCURRENCY),
      'Concurrency',
      1,
      1
    ),
    gracePeriodMs: parsePositiveInt(
      nonEmpty(options.grace, env.TUBEQUEUE_GRACE_MS),
      'Grace period',
      DEFAULT_GRACE_PERIOD_MS,
      0
    ),
    logLevel: options.verbose ? 'debug' : parseLogLevel(env.TUBEQUEUE_LOG_LEVEL) ?? 'info',
  };
}
