import { fetchPlaylist } from '../probe/fetcher.js';
import type { ToolQuery } from '../probe/fetcher.js';
import { createJobSpec, resolveFormat, resolveSubtitles } from '../format/resolver.js';
import { ConfigurationError } from '../../utils/errors.js';
import { isValidUrl } from '../../utils/validator.js';
import type {
  FormatSelection,
  JobSpec,
  PlaylistItem,
  PlaylistPlan,
  QualityPreset,
  SubtitleRequest,
} from '../../types/index.js';

export const QUALITY_PRESETS: readonly QualityPreset[] = ['best', '1080', '720', '480', '360', 'audio'];

export function isQualityPreset(value: string): value is QualityPreset {
  return QUALITY_PRESETS.some((preset) => preset === value);
}

/**
 * Loads a playlist listing into a plan with every item selected.
 */
export async function loadPlaylistPlan(url: string, query: ToolQuery): Promise<PlaylistPlan> {
  const listing = await fetchPlaylist(url, query);
  return Object.freeze({
    url,
    title: listing.title,
    items: Object.freeze(
      listing.entries.map((entry) =>
        Object.freeze({
          index: entry.position,
          id: entry.id,
          title: entry.title,
          url: entry.url,
          duration: entry.duration,
          uploader: entry.uploader,
          selected: true,
        })
      )
    ),
  });
}

function withItems(plan: PlaylistPlan, update: (item: PlaylistItem) => PlaylistItem): PlaylistPlan {
  return Object.freeze({
    ...plan,
    items: Object.freeze(plan.items.map((item) => Object.freeze(update(item)))),
  });
}

export function setItemSelected(plan: PlaylistPlan, index: number, selected: boolean): PlaylistPlan {
  if (!plan.items.some((item) => item.index === index)) {
    throw new ConfigurationError(`Playlist has no item ${index}`);
  }
  return withItems(plan, (item) => (item.index === index ? { ...item, selected } : item));
}

export function toggleItem(plan: PlaylistPlan, index: number): PlaylistPlan {
  const item = plan.items.find((i) => i.index === index);
  if (!item) {
    throw new ConfigurationError(`Playlist has no item ${index}`);
  }
  return setItemSelected(plan, index, !item.selected);
}

export function setAllSelected(plan: PlaylistPlan, selected: boolean): PlaylistPlan {
  return withItems(plan, (item) => ({ ...item, selected }));
}

/**
 * One format rule for every item: height-capped, mp4 preferred, falling back
 * to whatever is available under the cap.
 */
export function presetSelection(preset: QualityPreset): FormatSelection {
  switch (preset) {
    case 'audio':
      return { video: { kind: 'none' }, audio: { kind: 'best' } };
    case 'best':
      return { override: 'bv*[ext=mp4]+ba[ext=m4a]/b[ext=mp4]/bv*+ba/b' };
    default:
      return {
        override:
          `bv*[height<=${preset}][ext=mp4]+ba[ext=m4a]/b[height<=${preset}][ext=mp4]` +
          `/bv*[height<=${preset}]+ba/b[height<=${preset}]`,
      };
  }
}

export interface ExpandOptions {
  outputDir: string;
  subtitles?: SubtitleRequest;
}

/**
 * Builds one JobSpec per selected item, in playlist order.
 */
export function expandPlaylist(plan: PlaylistPlan, preset: QualityPreset, options: ExpandOptions): JobSpec[] {
  const selected = plan.items.filter((item) => item.selected);
  if (selected.length === 0) {
    throw new ConfigurationError('No playlist items selected');
  }

  // Resolved once and shared by every item
  const format = resolveFormat([], presetSelection(preset));
  const subtitleArgs = resolveSubtitles(options.subtitles);
  const label = preset === 'audio' ? format.label : preset === 'best' ? 'best' : `${preset}p`;

  return selected.map((item) => {
    const ownUrl = item.url && isValidUrl(item.url) ? item.url : undefined;
    return createJobSpec({
      url: ownUrl ?? plan.url,
      outputDir: options.outputDir,
      format: { ...format, label },
      subtitleArgs,
      itemArgs: ownUrl ? ['--no-playlist'] : ['--playlist-items', String(item.index)],
      title: item.title,
      playlistIndex: item.index,
    });
  });
}
