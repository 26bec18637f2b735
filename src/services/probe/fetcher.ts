import { spawnTool } from '../process/runner.js';
import type { SpawnFn } from '../process/runner.js';
import { ToolQueryError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type {
  FormatDescriptor,
  MediaInfo,
  PlaylistEntry,
  PlaylistListing,
} from '../../types/index.js';

// Runs the tool in list/describe mode and resolves with its stdout
export type ToolQuery = (args: readonly string[]) => Promise<string>;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

// Listings of long playlists can take minutes
export const DEFAULT_QUERY_TIMEOUT_MS = 180000;

/**
 * Spawns `command` with the given query arguments, buffering stdout. The
 * process is stopped and the query rejected once `timeoutMs` has passed.
 */
export function createToolQuery(
  command: string,
  spawnFn: SpawnFn = spawnTool,
  timeoutMs: number = DEFAULT_QUERY_TIMEOUT_MS
): ToolQuery {
  return (args) =>
    new Promise<string>((resolve, reject) => {
      logger.debug(`Query: ${command} ${args.join(' ')}`);

      let stdout = '';
      let stderr = '';
      let done = false;

      const child = spawnFn(command, args, {
        env: { ...process.env, PYTHONIOENCODING: 'utf-8' },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timer = setTimeout(() => {
        if (done) return;
        done = true;
        child.kill('SIGTERM');
        reject(new ToolQueryError(`${command} did not answer within ${timeoutMs}ms`, null, stderr));
      }, timeoutMs);

      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => (stdout += chunk));
      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => (stderr += chunk));

      child.once('error', (error) => {
        clearTimeout(timer);
        if (done) return;
        done = true;
        reject(new ToolQueryError(`Failed to run ${command}: ${error.message}`, null, stderr));
      });

      child.once('close', (code) => {
        clearTimeout(timer);
        if (done) return;
        done = true;
        if (code === 0) {
          resolve(stdout);
          return;
        }
        const lastError = stderr
          .split(/\r?\n/)
          .filter((line) => line.startsWith('ERROR:'))
          .pop();
        reject(
          new ToolQueryError(
            lastError ? lastError.replace(/^ERROR:\s*/, '') : `${command} exited with code ${code}`,
            code,
            stderr
          )
        );
      });
    });
}

function parseJson(text: string, what: string): JsonRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new Error(`Could not parse ${what} output as JSON`);
  }
  if (!isRecord(data)) {
    throw new Error(`Unexpected ${what} output`);
  }
  return data;
}

export function formatSize(bytes: number | undefined): string {
  if (!bytes) return '';
  if (bytes > 1024 * 1024 * 1024) return `${(bytes / 1024 ** 3).toFixed(1)}GB`;
  if (bytes > 1024 * 1024) return `${(bytes / 1024 ** 2).toFixed(1)}MB`;
  return `${(bytes / 1024).toFixed(1)}KB`;
}

/**
 * Combined size of the streams named in a `a+b` format string, counting only
 * the ids found in `available`. Undefined when no size is known.
 */
export function estimateFormatSize(available: readonly FormatDescriptor[], format: string): number | undefined {
  let total = 0;
  for (const id of format.split('+')) {
    total += available.find((f) => f.id === id.trim())?.filesize ?? 0;
  }
  return total > 0 ? total : undefined;
}

export function formatDuration(seconds: number | undefined): string {
  if (!seconds) return 'Unknown';
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);
  const mm = String(minutes).padStart(2, '0');
  const ss = String(secs).padStart(2, '0');
  return hours > 0 ? `${hours}:${mm}:${ss}` : `${minutes}:${ss}`;
}

/**
 * Splits the raw `formats` array into video-only and audio-only descriptors,
 * best first. Muxed formats are left out; the resolver combines streams itself.
 */
export function classifyFormats(rawFormats: unknown): { video: FormatDescriptor[]; audio: FormatDescriptor[] } {
  const video: FormatDescriptor[] = [];
  const audio: FormatDescriptor[] = [];
  if (!Array.isArray(rawFormats)) return { video, audio };

  for (const raw of rawFormats) {
    if (!isRecord(raw)) continue;
    const id = str(raw.format_id);
    if (!id) continue;

    const ext = str(raw.ext) ?? '';
    const vcodec = str(raw.vcodec) ?? 'none';
    const acodec = str(raw.acodec) ?? 'none';
    const filesize = num(raw.filesize) ?? num(raw.filesize_approx);
    const sizePart = filesize ? ` (${formatSize(filesize)})` : '';

    if (vcodec !== 'none' && acodec === 'none') {
      const resolution = str(raw.resolution);
      const fps = num(raw.fps);
      const fpsPart = fps ? ` ${fps}fps` : '';
      video.push({
        id,
        ext,
        vcodec,
        acodec,
        resolution,
        height: num(raw.height),
        fps,
        filesize,
        label: `${id}: ${resolution ?? 'unknown'} ${ext}${fpsPart}${sizePart}`,
      });
    } else if (acodec !== 'none' && vcodec === 'none') {
      const abr = num(raw.abr);
      const abrPart = abr ? `${abr}kbps` : 'unknown bitrate';
      audio.push({
        id,
        ext,
        vcodec,
        acodec,
        abr,
        filesize,
        label: `${id}: ${ext} ${abrPart}${sizePart}`,
      });
    }
  }

  video.sort((a, b) => (b.height ?? 0) - (a.height ?? 0));
  audio.sort((a, b) => (b.abr ?? 0) - (a.abr ?? 0));

  return { video: video.slice(0, 20), audio: audio.slice(0, 15) };
}

function languageKeys(value: unknown): string[] {
  return isRecord(value) ? Object.keys(value).sort() : [];
}

/**
 * Full metadata dump for a single video, as the tool reports it.
 */
export async function fetchMetadata(url: string, query: ToolQuery): Promise<Record<string, unknown>> {
  return parseJson(await query(['-J', '--no-playlist', url]), 'format listing');
}

/**
 * Describes a single video: its formats and subtitle languages.
 */
export async function fetchMediaInfo(url: string, query: ToolQuery): Promise<MediaInfo> {
  const data = await fetchMetadata(url, query);
  const { video, audio } = classifyFormats(data.formats);

  const subtitles = languageKeys(data.subtitles);
  // Auto captions already offered as manual subtitles are not listed twice
  const automaticCaptions = languageKeys(data.automatic_captions).filter((lang) => !subtitles.includes(lang));

  return {
    title: str(data.title) ?? 'Unknown',
    uploader: str(data.uploader),
    duration: num(data.duration),
    videoFormats: video,
    audioFormats: audio,
    subtitles,
    automaticCaptions,
  };
}

/**
 * Lists playlist members without resolving each one.
 */
export async function fetchPlaylist(url: string, query: ToolQuery): Promise<PlaylistListing> {
  const data = parseJson(await query(['-J', '--flat-playlist', url]), 'playlist listing');
  const rawEntries = Array.isArray(data.entries) ? data.entries : [];

  const entries: PlaylistEntry[] = [];
  rawEntries.forEach((raw: unknown, i: number) => {
    if (!isRecord(raw)) return;
    entries.push({
      // Position in the listing, skipped entries included, as --playlist-items counts
      position: i + 1,
      id: str(raw.id) ?? '',
      title: str(raw.title) ?? 'Unknown',
      url: str(raw.webpage_url) ?? str(raw.url),
      duration: num(raw.duration),
      uploader: str(raw.uploader) ?? str(raw.channel),
    });
  });

  if (entries.length === 0) {
    throw new Error('No videos found in playlist. It may be private or empty.');
  }

  return {
    title: str(data.title) ?? str(data.playlist) ?? 'Unknown Playlist',
    uploader: str(data.uploader) ?? str(data.channel),
    entries,
  };
}

export const VERSION_QUERY_TIMEOUT_MS = 10000;

/**
 * `yt-dlp --version` prints the release tag alone.
 */
export async function fetchYtDlpVersion(query: ToolQuery): Promise<string> {
  const version = (await query(['--version'])).trim().split(/\r?\n/)[0]?.trim();
  if (!version) {
    throw new Error('yt-dlp printed no version');
  }
  return version;
}

/**
 * Reads the version token from the first line of `ffmpeg -version`, e.g.
 * "ffmpeg version 6.1.1-static ...". Returns "unknown" when the line has none.
 */
export async function fetchFfmpegVersion(query: ToolQuery): Promise<string> {
  const firstLine = (await query(['-version'])).split(/\r?\n/)[0] ?? '';
  const match = firstLine.match(/\bversion\s+(\S+)/);
  return match?.[1] ?? 'unknown';
}
