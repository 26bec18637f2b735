import { ConfigurationError } from '../../utils/errors.js';
import { isValidUrl } from '../../utils/validator.js';
import type {
  FormatDescriptor,
  FormatSelection,
  JobSpec,
  ResolvedFormat,
  StreamChoice,
  SubtitleRequest,
} from '../../types/index.js';

const AUDIO_CONTAINERS = /\b(mp3|m4a|webm|opus|aac|ogg|flac|wav)\b/i;

const BEST: StreamChoice = { kind: 'best' };

function findDescriptor(
  available: readonly FormatDescriptor[],
  formatId: string,
  stream: 'video' | 'audio'
): FormatDescriptor | undefined {
  if (available.length === 0) return undefined;
  const descriptor = available.find((f) => f.id === formatId);
  if (!descriptor) {
    throw new ConfigurationError(`Unknown ${stream} format: ${formatId}`);
  }
  return descriptor;
}

function videoLabel(descriptor: FormatDescriptor | undefined): string {
  if (descriptor?.height) return `${descriptor.height}p`;
  const match = descriptor?.resolution?.match(/(\d+)x(\d+)/);
  return match?.[2] ? `${match[2]}p` : 'video';
}

function audioLabel(descriptor: FormatDescriptor | undefined): string {
  const match = descriptor?.ext.match(AUDIO_CONTAINERS) ?? descriptor?.label.match(AUDIO_CONTAINERS);
  return match?.[1] ? match[1].toLowerCase() : 'audio';
}

function withMergeFlags(format: string, args: string[]): string[] {
  return format.includes('+') ? [...args, '--merge-output-format', 'mp4'] : args;
}

/**
 * Turns a format selection into the `-f ...` argument fragment for one target.
 * A non-blank override always wins and is passed through as typed.
 */
export function resolveFormat(
  available: readonly FormatDescriptor[],
  selection: FormatSelection
): ResolvedFormat {
  const override = selection.override?.trim();
  if (override) {
    return {
      format: override,
      args: withMergeFlags(override, ['-f', override]),
      mode: 'custom',
      label: override,
    };
  }

  if (selection.override !== undefined && !selection.video && !selection.audio) {
    throw new ConfigurationError('Format override is empty and no video or audio stream was selected');
  }

  const video = selection.video ?? BEST;
  const audio = selection.audio ?? BEST;

  if (video.kind === 'none' && audio.kind === 'none') {
    throw new ConfigurationError('Cannot download with both video and audio set to none');
  }

  const videoDescriptor =
    video.kind === 'format' ? findDescriptor(available, video.formatId, 'video') : undefined;
  const audioDescriptor =
    audio.kind === 'format' ? findDescriptor(available, audio.formatId, 'audio') : undefined;

  const videoFormat = video.kind === 'format' ? video.formatId : 'bestvideo';
  const audioFormat = audio.kind === 'format' ? audio.formatId : 'bestaudio';

  if (video.kind === 'none') {
    return {
      format: audioFormat,
      args: withMergeFlags(audioFormat, ['-f', audioFormat, '-x', '--audio-format', 'mp3']),
      mode: 'audio-only',
      label: 'audio only',
    };
  }

  if (audio.kind === 'none') {
    return {
      format: videoFormat,
      args: withMergeFlags(videoFormat, ['-f', videoFormat]),
      mode: 'video-only',
      label: 'video only',
    };
  }

  const format = `${videoFormat}+${audioFormat}`;
  const label = [
    video.kind === 'best' ? 'best' : videoLabel(videoDescriptor),
    audio.kind === 'best' ? 'audio' : audioLabel(audioDescriptor),
  ].join('+');

  return {
    format,
    args: withMergeFlags(format, ['-f', format]),
    mode: 'video+audio',
    label,
  };
}

function normalizeLanguages(langs: string[] | 'all' | undefined): string[] | 'all' | undefined {
  if (langs === undefined) return undefined;
  if (langs === 'all') return 'all';
  const cleaned = [...new Set(langs.map((l) => l.trim()).filter((l) => l.length > 0))];
  return cleaned.length > 0 ? cleaned : undefined;
}

function sameLanguages(a: string[] | 'all', b: string[] | 'all'): boolean {
  if (a === 'all' || b === 'all') return a === b;
  return a.length === b.length && a.every((lang) => b.includes(lang));
}

/**
 * Manual subtitles and auto-generated captions are requested independently;
 * auto captions are only written when asked for explicitly.
 *
 * yt-dlp takes a single `--sub-langs` list for both kinds, so a request that
 * wants different languages from each cannot be expressed in one invocation.
 */
export function resolveSubtitles(request: SubtitleRequest | undefined): string[] {
  if (!request) return [];

  const manual = normalizeLanguages(request.manual);
  const auto = normalizeLanguages(request.auto);
  if (!manual && !auto) return [];

  if (manual && auto && !sameLanguages(manual, auto)) {
    throw new ConfigurationError(
      'Manual subtitles and auto-generated captions must use the same languages in one download'
    );
  }

  const args: string[] = [];
  if (manual) args.push('--write-subs');
  if (auto) args.push('--write-auto-subs');

  const langs = manual ?? auto ?? 'all';
  args.push('--sub-langs', langs === 'all' ? 'all' : langs.join(','), '--embed-subs');
  return args;
}

export interface JobSpecInput {
  url: string;
  outputDir: string;
  format: ResolvedFormat;
  subtitleArgs?: readonly string[];
  itemArgs?: readonly string[];
  title?: string;
  playlistIndex?: number;
}

export function createJobSpec(input: JobSpecInput): JobSpec {
  const url = input.url.trim();
  if (!isValidUrl(url)) {
    throw new ConfigurationError(`Invalid URL (must start with http:// or https://): ${input.url}`);
  }
  if (!input.outputDir.trim()) {
    throw new ConfigurationError('Output directory is required');
  }

  const spec: JobSpec = {
    url,
    formatArgs: Object.freeze([...input.format.args]),
    subtitleArgs: Object.freeze([...(input.subtitleArgs ?? [])]),
    itemArgs: Object.freeze([...(input.itemArgs ?? [])]),
    outputDir: input.outputDir,
    mode: input.format.mode,
    formatLabel: input.format.label,
    ...(input.title !== undefined ? { title: input.title } : {}),
    ...(input.playlistIndex !== undefined ? { playlistIndex: input.playlistIndex } : {}),
  };
  return Object.freeze(spec);
}

/**
 * A job whose yt-dlp arguments are taken verbatim from the user. No format
 * resolution happens; the arguments replace the format fragment.
 */
export function createRawJobSpec(url: string, outputDir: string, rawArgs: readonly string[]): JobSpec {
  if (rawArgs.length === 0) {
    throw new ConfigurationError('No custom arguments given');
  }
  return createJobSpec({
    url,
    outputDir,
    format: { format: '', args: [...rawArgs], mode: 'custom', label: '' },
  });
}
