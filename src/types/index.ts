// Format descriptor as listed by the tool's query mode
export interface FormatDescriptor {
  id: string;
  ext: string;
  vcodec: string;
  acodec: string;
  resolution?: string;
  height?: number;
  fps?: number;
  abr?: number; // kbps
  filesize?: number; // bytes, exact or approximate
  label: string;
}

// What the user asked for on one stream
export type StreamChoice =
  | { kind: 'best' }
  | { kind: 'none' }
  | { kind: 'format'; formatId: string };

export interface FormatSelection {
  video?: StreamChoice;
  audio?: StreamChoice;
  override?: string;
}

export type StreamMode = 'video+audio' | 'audio-only' | 'video-only' | 'custom';

export interface ResolvedFormat {
  format: string;
  args: string[];
  mode: StreamMode;
  label: string;
}

export interface SubtitleRequest {
  manual?: string[] | 'all';
  auto?: string[] | 'all';
}

// Immutable description of one download
export interface JobSpec {
  readonly url: string;
  readonly formatArgs: readonly string[];
  readonly subtitleArgs: readonly string[];
  readonly itemArgs: readonly string[];
  readonly outputDir: string;
  readonly mode: StreamMode;
  readonly formatLabel: string;
  readonly title?: string;
  readonly playlistIndex?: number;
}

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface ProgressSnapshot {
  percent?: number; // 0-100
  stage?: string;
  rate?: string;
  eta?: string;
  totalSize?: string;
}

export interface JobError {
  kind: 'spawn' | 'runtime';
  message: string;
  exitCode?: number;
}

// Read-only copy handed to subscribers and callers
export interface JobSnapshot {
  readonly id: string;
  readonly spec: JobSpec;
  readonly status: JobStatus;
  readonly progress: Readonly<ProgressSnapshot>;
  readonly error?: Readonly<JobError>;
  readonly createdAt: number;
  readonly startedAt?: number;
  readonly finishedAt?: number;
}

export type StageKind =
  | 'destination'
  | 'merging'
  | 'extracting-audio'
  | 'embedding-subtitles'
  | 'post-processing';

export type ProgressEvent =
  | { kind: 'progress'; percent: number; rate?: string; eta?: string; totalSize?: string }
  | { kind: 'stage'; stage: StageKind; label: string; file?: string }
  | { kind: 'warning'; text: string }
  | { kind: 'error'; text: string }
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null };

export type ParsedLine = ProgressEvent | { kind: 'unrecognized'; line: string };

export type RunOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; error: JobError }
  | { status: 'cancelled' };

// Playlist structure
export interface PlaylistItem {
  readonly index: number; // 1-based position in the playlist
  readonly id: string;
  readonly title: string;
  readonly url?: string;
  readonly duration?: number;
  readonly uploader?: string;
  readonly selected: boolean;
}

export interface PlaylistPlan {
  readonly url: string;
  readonly title?: string;
  readonly items: readonly PlaylistItem[];
}

export type QualityPreset = 'best' | '1080' | '720' | '480' | '360' | 'audio';

export interface MediaInfo {
  title: string;
  uploader?: string;
  duration?: number;
  videoFormats: FormatDescriptor[];
  audioFormats: FormatDescriptor[];
  subtitles: string[];
  automaticCaptions: string[];
}

export interface PlaylistEntry {
  position: number; // 1-based, counted over the raw listing
  id: string;
  title: string;
  url?: string;
  duration?: number;
  uploader?: string;
}

export interface PlaylistListing {
  title: string;
  uploader?: string;
  entries: PlaylistEntry[];
}

export type LogLevel = 'silent' | 'info' | 'debug';

// Fully resolved settings handed to the core
export interface DownloaderConfig {
  ytdlpPath: string;
  ffmpegPath?: string;
  outputDir: string;
  cookiesFile?: string;
  limitRate?: string;
  throttledRate?: string;
  customOptions: string[];
  concurrency: number;
  gracePeriodMs: number;
  logLevel: LogLevel;
}
