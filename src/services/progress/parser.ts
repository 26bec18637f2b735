import { LineBuffer } from './lineBuffer.js';
import { logger } from '../../utils/logger.js';
import type { ParsedLine, ProgressEvent } from '../../types/index.js';

const ANSI_ESCAPE = /\x1b\[[0-9;?]*[A-Za-z]/g;

const PERCENT = /^\[download\]\s+(\d+(?:\.\d+)?)%/;
const TOTAL_SIZE = /\bof\s+~?\s*(\d+(?:\.\d+)?\s*[A-Za-z]+)/;
const RATE = /\bat\s+(\d+(?:\.\d+)?\s*[A-Za-z]+\/s)/;
const ETA = /\bETA\s+(\d+(?::\d+)+)/;

const DESTINATION = /^\[download\]\s+Destination:\s*(.+)$/;
const ALREADY_DOWNLOADED = /^\[download\]\s+(.+?)\s+has already been downloaded/;
const MERGER = /^\[Merger\]\s*(?:Merging formats into\s+"?(.+?)"?\s*$)?/;
const EXTRACT_AUDIO = /^\[ExtractAudio\]\s*(?:Destination:\s*(.+))?/;
const EMBED_SUBTITLE = /^\[EmbedSubtitle\]/;
const POST_PROCESSOR = /^\[(?:FixupM3u8|FixupM4a|FixupStretched|VideoConvertor|VideoRemuxer|Metadata|ffmpeg)\]/;

const WARNING = /^WARNING:\s*(.*)$/;
const ERROR = /^ERROR:\s*(.*)$/;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

function parseDownloadProgress(line: string): ProgressEvent | undefined {
  const percentMatch = line.match(PERCENT);
  if (!percentMatch?.[1]) return undefined;

  const percent = Math.min(100, Math.max(0, parseFloat(percentMatch[1])));
  // Unknown fields stay undefined; a zero rate is a real value, "not yet known" is not
  const totalSize = line.match(TOTAL_SIZE)?.[1]?.replace(/\s+/g, '');
  const rate = line.match(RATE)?.[1]?.replace(/\s+/g, '');
  const eta = line.match(ETA)?.[1];

  return {
    kind: 'progress',
    percent,
    ...(rate ? { rate } : {}),
    ...(eta ? { eta } : {}),
    ...(totalSize ? { totalSize } : {}),
  };
}

/**
 * Classifies one complete output line. Lines the tool may print that carry no
 * state come back as `unrecognized`.
 */
export function parseLine(raw: string): ParsedLine {
  const line = stripAnsi(raw).trim();

  const warning = line.match(WARNING);
  if (warning) return { kind: 'warning', text: warning[1] ?? '' };

  const error = line.match(ERROR);
  if (error) return { kind: 'error', text: error[1] ?? '' };

  const progress = parseDownloadProgress(line);
  if (progress) return progress;

  const destination = line.match(DESTINATION);
  if (destination?.[1]) {
    const file = destination[1].trim();
    return { kind: 'stage', stage: 'destination', label: `Starting download: ${file}`, file };
  }

  if (ALREADY_DOWNLOADED.test(line)) {
    return { kind: 'progress', percent: 100 };
  }

  const merger = line.match(MERGER);
  if (merger) {
    return {
      kind: 'stage',
      stage: 'merging',
      label: 'Merging video and audio...',
      ...(merger[1] ? { file: merger[1] } : {}),
    };
  }

  const extract = line.match(EXTRACT_AUDIO);
  if (extract) {
    return {
      kind: 'stage',
      stage: 'extracting-audio',
      label: 'Extracting audio...',
      ...(extract[1] ? { file: extract[1].trim() } : {}),
    };
  }

  if (EMBED_SUBTITLE.test(line)) {
    return { kind: 'stage', stage: 'embedding-subtitles', label: 'Embedding subtitles...' };
  }

  if (POST_PROCESSOR.test(line)) {
    return { kind: 'stage', stage: 'post-processing', label: 'Post-processing...' };
  }

  return { kind: 'unrecognized', line };
}

/**
 * Stream-side wrapper: feed decoded chunks, get events for every line that
 * has been terminated so far.
 */
export class ProgressParser {
  private readonly buffer = new LineBuffer();
  private readonly onLine?: (line: string) => void;

  constructor(onLine?: (line: string) => void) {
    this.onLine = onLine;
  }

  push(chunk: string): ProgressEvent[] {
    return this.consume(this.buffer.push(chunk));
  }

  flush(): ProgressEvent[] {
    return this.consume(this.buffer.flush());
  }

  private consume(lines: string[]): ProgressEvent[] {
    const events: ProgressEvent[] = [];
    for (const line of lines) {
      this.onLine?.(line);
      const parsed = parseLine(line);
      if (parsed.kind === 'unrecognized') {
        logger.debug(`unparsed: ${parsed.line}`);
        continue;
      }
      events.push(parsed);
    }
    return events;
  }
}
