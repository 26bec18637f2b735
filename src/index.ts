#!/usr/bin/env node

import { Command, Option } from 'commander';
import ora from 'ora';
import type { Ora } from 'ora';
import { resolveConfig } from './utils/config.js';
import type { CliConfigOptions } from './utils/config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { parseIndexList, splitArgs } from './utils/validator.js';
import {
  VERSION_QUERY_TIMEOUT_MS,
  createToolQuery,
  estimateFormatSize,
  fetchFfmpegVersion,
  fetchMediaInfo,
  fetchMetadata,
  fetchYtDlpVersion,
  formatDuration,
  formatSize,
} from './services/probe/fetcher.js';
import { spawnTool } from './services/process/runner.js';
import { createJobSpec, createRawJobSpec, resolveFormat, resolveSubtitles } from './services/format/resolver.js';
import {
  QUALITY_PRESETS,
  expandPlaylist,
  isQualityPreset,
  loadPlaylistPlan,
  setAllSelected,
  setItemSelected,
} from './services/playlist/expander.js';
import { QueueScheduler } from './services/queue/scheduler.js';
import type { SchedulerEvent } from './services/queue/scheduler.js';
import type { DownloaderConfig, JobSnapshot, JobSpec, StreamChoice, SubtitleRequest } from './types/index.js';

interface DownloadCommandOptions extends CliConfigOptions {
  format?: string;
  video?: string;
  audio?: string;
  subs?: string;
  autoSubs?: string;
}

interface PlaylistCommandOptions extends CliConfigOptions {
  quality: string;
  exclude?: string;
  only?: string;
  subs?: string;
  autoSubs?: string;
}

const program = new Command();

program
  .name('tubequeue')
  .description('Queue and supervise yt-dlp downloads: formats, subtitles and playlists')
  .version('1.0.0');

function withSharedOptions(command: Command): Command {
  return command
    .option('-o, --output <dir>', 'Output directory (default: ~/Downloads)')
    .option('-c, --concurrency <number>', 'Number of downloads to run at once')
    .option('--yt-dlp <path>', 'Path to the yt-dlp executable')
    .option('--ffmpeg <path>', 'Path to ffmpeg, passed as --ffmpeg-location')
    .option('--cookies <file>', 'Path to cookies.txt file for private/age-restricted content')
    .option('--limit-rate <rate>', 'Maximum download rate, e.g. 2M')
    .option('--throttled-rate <rate>', 'Re-extract when the rate drops below this, e.g. 100K')
    .option('--options <string>', 'Extra yt-dlp options, quoted as on a shell')
    .option('--grace <ms>', 'Milliseconds to wait after SIGTERM before killing a cancelled download')
    .option('--verbose', 'Print every command and unparsed output line');
}

function parseStreamChoice(value: string | undefined): StreamChoice | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === 'best') return { kind: 'best' };
  if (trimmed === 'none') return { kind: 'none' };
  return { kind: 'format', formatId: trimmed };
}

function parseLanguages(value: string | undefined): string[] | 'all' | undefined {
  if (value === undefined) return undefined;
  if (value.trim() === 'all') return 'all';
  return value.split(',').map((l) => l.trim()).filter((l) => l.length > 0);
}

function subtitleRequest(options: { subs?: string; autoSubs?: string }): SubtitleRequest | undefined {
  const manual = parseLanguages(options.subs);
  const auto = parseLanguages(options.autoSubs);
  return manual || auto ? { manual, auto } : undefined;
}

function jobName(spec: JobSpec): string {
  const prefix = spec.playlistIndex !== undefined ? `#${spec.playlistIndex} ` : '';
  return `${prefix}${spec.title ?? spec.url}`;
}

function progressText(job: JobSnapshot, position: string): string {
  const parts = [`${position} ${jobName(job.spec)}`];
  const { percent, totalSize, rate, eta, stage } = job.progress;
  if (percent !== undefined) parts.push(`${percent.toFixed(1)}%`);
  if (totalSize) parts.push(`of ${totalSize}`);
  if (rate) parts.push(`at ${rate}`);
  if (eta) parts.push(`ETA ${eta}`);
  if (percent === undefined && stage) parts.push(stage);
  return parts.join(' ');
}

// Fails early with a readable message when yt-dlp cannot be started
async function ensureYtDlp(config: DownloaderConfig): Promise<string> {
  try {
    const version = await fetchYtDlpVersion(
      createToolQuery(config.ytdlpPath, spawnTool, VERSION_QUERY_TIMEOUT_MS)
    );
    logger.debug(`Using yt-dlp ${version} (${config.ytdlpPath})`);
    return version;
  } catch (error) {
    throw new Error(`yt-dlp not usable at "${config.ytdlpPath}": ${errorMessage(error)}`);
  }
}

/**
 * Runs the queue to completion, rendering progress on a spinner.
 * Resolves with the number of failed jobs.
 */
async function runQueue(specs: JobSpec[], config: DownloaderConfig): Promise<number> {
  await ensureYtDlp(config);
  const scheduler = new QueueScheduler({ config, concurrency: config.concurrency });
  const total = specs.length;
  const order = new Map<string, number>();
  let spinner: Ora | null = null;

  const onEvent = (event: SchedulerEvent) => {
    if (event.type === 'progress') {
      const job = scheduler.getJob(event.jobId);
      if (job && spinner) spinner.text = progressText(job, `[${order.get(job.id)}/${total}]`);
      if (event.event.kind === 'warning') logger.debug(`warning: ${event.event.text}`);
      return;
    }
    if (event.type !== 'status') return;

    const { job } = event;
    const position = `[${order.get(job.id) ?? '?'}/${total}]`;
    switch (job.status) {
      case 'running':
        spinner = ora(`${position} ${jobName(job.spec)}`).start();
        logger.setSpinner(spinner);
        break;
      case 'succeeded':
        spinner?.succeed(`${position} ${jobName(job.spec)}`);
        break;
      case 'failed':
        spinner?.fail(`${position} ${jobName(job.spec)} - ${job.error?.message ?? 'failed'}`);
        break;
      case 'cancelled':
        spinner?.warn(`${position} ${jobName(job.spec)} - cancelled`);
        break;
      default:
        return;
    }
    if (job.status !== 'running') logger.clearSpinner();
  };

  const unsubscribe = scheduler.subscribe(onEvent);

  const ids = scheduler.enqueueAll(specs);
  ids.forEach((id, i) => order.set(id, i + 1));

  const onInterrupt = () => {
    logger.warn('Interrupted, stopping downloads...');
    scheduler.stop();
  };
  process.once('SIGINT', onInterrupt);

  try {
    logger.info(`Downloading ${total} item(s) (concurrency: ${config.concurrency})`);
    scheduler.start();
    await scheduler.onIdle();
  } finally {
    process.off('SIGINT', onInterrupt);
    unsubscribe();
    logger.clearSpinner();
  }

  const counts = scheduler.counts();
  console.log('\n✨ Queue finished');
  console.log(`📁 Location: ${config.outputDir}`);
  console.log(`✅ Success: ${counts.succeeded}`);
  if (counts.failed > 0) console.log(`❌ Failed: ${counts.failed}`);
  if (counts.cancelled > 0) console.log(`⏹  Cancelled: ${counts.cancelled}`);
  if (counts.pending > 0) console.log(`⏸  Not started: ${counts.pending}`);

  if (counts.failed > 0 && logger.getLevel() === 'debug') {
    for (const job of scheduler.snapshot().filter((j) => j.status === 'failed')) {
      logger.debug(`--- log for ${jobName(job.spec)} ---`);
      for (const line of scheduler.getLog(job.id)) logger.debug(line);
    }
  }

  return counts.failed;
}

withSharedOptions(
  program
    .command('check')
    .description('Check that yt-dlp (required) and ffmpeg (optional) can be run')
).action(async (options: CliConfigOptions) => {
  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);

    const ytdlp = await ensureYtDlp(config);
    logger.success(`yt-dlp ${ytdlp} (${config.ytdlpPath})`);

    const ffmpegPath = config.ffmpegPath ?? 'ffmpeg';
    try {
      const ffmpeg = await fetchFfmpegVersion(createToolQuery(ffmpegPath, spawnTool, VERSION_QUERY_TIMEOUT_MS));
      logger.success(`ffmpeg ${ffmpeg} (${ffmpegPath})`);
    } catch (error) {
      logger.warn(`ffmpeg not found (optional, needed for merging and audio extraction): ${errorMessage(error)}`);
    }
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
});

withSharedOptions(
  program
    .command('info')
    .description('Print the full metadata yt-dlp reports for a URL, as JSON')
    .argument('<url>', 'Video URL')
).action(async (url: string, options: CliConfigOptions) => {
  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);
    const metadata = await fetchMetadata(url, createToolQuery(config.ytdlpPath));
    console.log(JSON.stringify(metadata, null, 2));
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
});

withSharedOptions(
  program
    .command('exec')
    .description('Run yt-dlp on a URL with raw arguments, supervised like any download')
    .argument('<url>', 'Video URL')
    .requiredOption('-a, --args <string>', 'yt-dlp arguments, quoted as on a shell')
).action(async (url: string, options: CliConfigOptions & { args: string }) => {
  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);
    const spec = createRawJobSpec(url, config.outputDir, splitArgs(options.args));

    const failed = await runQueue([spec], config);
    if (failed > 0) process.exitCode = 1;
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
});

withSharedOptions(
  program
    .command('formats')
    .description('List the video, audio and subtitle formats available for a URL')
    .argument('<url>', 'Video URL')
).action(async (url: string, options: CliConfigOptions) => {
  const spinner = ora('Fetching formats...').start();
  logger.setSpinner(spinner);

  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);
    const info = await fetchMediaInfo(url, createToolQuery(config.ytdlpPath));
    spinner.succeed(`${info.title} (${formatDuration(info.duration)}) by ${info.uploader ?? 'Unknown'}`);

    console.log('\nVideo formats (use with --video):');
    console.log('  best: Best video');
    for (const f of info.videoFormats) console.log(`  ${f.label}`);
    console.log('  none: No video (audio only)');

    console.log('\nAudio formats (use with --audio):');
    console.log('  best: Best audio');
    for (const f of info.audioFormats) console.log(`  ${f.label}`);
    console.log('  none: No audio (video only)');

    console.log('\nSubtitles (use with --subs):');
    console.log(`  ${info.subtitles.length ? info.subtitles.join(', ') : 'none'}`);
    console.log('Auto-generated captions (use with --auto-subs):');
    console.log(`  ${info.automaticCaptions.length ? info.automaticCaptions.join(', ') : 'none'}`);
  } catch (error) {
    spinner.fail('Failed to fetch formats');
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    logger.clearSpinner();
  }
});

withSharedOptions(
  program
    .command('download')
    .description('Download one or more URLs through the queue')
    .argument('<urls...>', 'Video URLs')
    .option('-f, --format <override>', 'Raw yt-dlp format string, takes precedence over --video/--audio')
    .option('--video <id>', 'Video format id, "best" or "none"')
    .option('--audio <id>', 'Audio format id, "best" or "none"')
    .option('--subs <langs>', 'Manual subtitle languages (comma separated) or "all"')
    .option('--auto-subs <langs>', 'Auto-generated caption languages (comma separated) or "all"')
).action(async (urls: string[], options: DownloadCommandOptions) => {
  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);

    const selection = {
      video: parseStreamChoice(options.video),
      audio: parseStreamChoice(options.audio),
      override: options.format,
    };
    const subtitleArgs = resolveSubtitles(subtitleRequest(options));

    const needsFormats = [selection.video, selection.audio].some((c) => c?.kind === 'format');
    const query = createToolQuery(config.ytdlpPath);

    const specs: JobSpec[] = [];
    for (const url of urls) {
      // Explicit format ids are checked against what the URL actually offers
      const available = needsFormats && !options.format?.trim()
        ? await fetchMediaInfo(url, query).then((info) => [...info.videoFormats, ...info.audioFormats])
        : [];
      const format = resolveFormat(available, selection);
      const size = estimateFormatSize(available, format.format);
      if (size) logger.info(`${url}: ${format.format} is about ${formatSize(size)}`);
      specs.push(
        createJobSpec({
          url,
          outputDir: config.outputDir,
          format,
          subtitleArgs,
        })
      );
    }

    const failed = await runQueue(specs, config);
    if (failed > 0) process.exitCode = 1;
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
});

withSharedOptions(
  program
    .command('playlist')
    .description('Download the items of a playlist with one quality preset')
    .argument('<url>', 'Playlist URL')
    .addOption(new Option('-q, --quality <preset>', 'Quality preset').choices([...QUALITY_PRESETS]).default('best'))
    .option('--exclude <indices>', 'Skip these items, e.g. "2,5-7"')
    .option('--only <indices>', 'Download only these items, e.g. "1-3"')
    .option('--subs <langs>', 'Manual subtitle languages (comma separated) or "all"')
    .option('--auto-subs <langs>', 'Auto-generated caption languages (comma separated) or "all"')
).action(async (url: string, options: PlaylistCommandOptions) => {
  const spinner = ora('Loading playlist...').start();
  logger.setSpinner(spinner);

  try {
    const config = resolveConfig(options);
    logger.setLevel(config.logLevel);
    if (!isQualityPreset(options.quality)) {
      throw new Error(`Unknown quality preset: ${options.quality}`);
    }

    let plan = await loadPlaylistPlan(url, createToolQuery(config.ytdlpPath));
    spinner.succeed(`Found playlist: "${plan.title ?? url}" with ${plan.items.length} videos`);
    logger.clearSpinner();

    if (options.only) {
      plan = setAllSelected(plan, false);
      for (const index of parseIndexList(options.only)) plan = setItemSelected(plan, index, true);
    }
    if (options.exclude) {
      for (const index of parseIndexList(options.exclude)) plan = setItemSelected(plan, index, false);
    }

    const specs = expandPlaylist(plan, options.quality, {
      outputDir: config.outputDir,
      subtitles: subtitleRequest(options),
    });
    logger.success(`Selected ${specs.length} of ${plan.items.length} items (${options.quality})`);

    const failed = await runQueue(specs, config);
    if (failed > 0) process.exitCode = 1;
  } catch (error) {
    if (spinner.isSpinning) spinner.fail('Playlist download failed');
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    logger.clearSpinner();
  }
});

program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
