import { describe, expect, it } from 'vitest';
import {
  expandPlaylist,
  isQualityPreset,
  loadPlaylistPlan,
  presetSelection,
  setAllSelected,
  setItemSelected,
  toggleItem,
} from './expander.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { ToolQuery } from '../probe/fetcher.js';

const PLAYLIST_URL = 'https://example.com/playlist?list=PL123';

const listing = JSON.stringify({
  title: 'Road Trip',
  uploader: 'Someone',
  entries: [
    { id: 'a1', title: 'A', url: 'https://example.com/watch?v=a1', duration: 61 },
    { id: 'b2', title: 'B', url: 'https://example.com/watch?v=b2' },
    { id: 'c3', title: 'C', url: 'c3' },
  ],
});

function queryReturning(output: string) {
  const seen: Array<readonly string[]> = [];
  const query: ToolQuery = async (args) => {
    seen.push(args);
    return output;
  };
  return { query, seen };
}

describe('loadPlaylistPlan', () => {
  it('selects every item in playlist order', async () => {
    const { query, seen } = queryReturning(listing);
    const plan = await loadPlaylistPlan(PLAYLIST_URL, query);

    expect(seen).toEqual([['-J', '--flat-playlist', PLAYLIST_URL]]);
    expect(plan.title).toBe('Road Trip');
    expect(plan.items.map((i) => [i.index, i.title, i.selected])).toEqual([
      [1, 'A', true],
      [2, 'B', true],
      [3, 'C', true],
    ]);
  });
});

describe('selection', () => {
  it('toggles one item without reordering and without touching the original plan', async () => {
    const plan = await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query);
    const toggled = toggleItem(plan, 2);

    expect(toggled.items.map((i) => [i.index, i.selected])).toEqual([
      [1, true],
      [2, false],
      [3, true],
    ]);
    expect(plan.items[1]?.selected).toBe(true);
    expect(toggleItem(toggled, 2).items[1]?.selected).toBe(true);
  });

  it('checks and unchecks everything', async () => {
    const plan = await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query);
    const none = setAllSelected(plan, false);
    expect(none.items.every((i) => !i.selected)).toBe(true);
    expect(setItemSelected(none, 3, true).items.map((i) => i.selected)).toEqual([false, false, true]);
  });

  it('rejects unknown indices', async () => {
    const plan = await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query);
    expect(() => toggleItem(plan, 9)).toThrow(ConfigurationError);
  });
});

describe('expandPlaylist', () => {
  it('produces [A, C] when B is deselected, all with the same preset', async () => {
    const plan = toggleItem(await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query), 2);
    const specs = expandPlaylist(plan, '720', { outputDir: '/music' });

    expect(specs.map((s) => s.title)).toEqual(['A', 'C']);
    expect(specs.map((s) => s.playlistIndex)).toEqual([1, 3]);

    const format =
      'bv*[height<=720][ext=mp4]+ba[ext=m4a]/b[height<=720][ext=mp4]/bv*[height<=720]+ba/b[height<=720]';
    for (const spec of specs) {
      expect(spec.formatArgs).toEqual(['-f', format, '--merge-output-format', 'mp4']);
      expect(spec.formatLabel).toBe('720p');
      expect(spec.outputDir).toBe('/music');
    }
  });

  it('uses the item URL when it has one and the playlist position otherwise', async () => {
    const plan = await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query);
    const [a, , c] = expandPlaylist(plan, 'audio', {
      outputDir: '/music',
      subtitles: { manual: ['en'] },
    });

    expect(a?.url).toBe('https://example.com/watch?v=a1');
    expect(a?.itemArgs).toEqual(['--no-playlist']);
    expect(c?.url).toBe(PLAYLIST_URL);
    expect(c?.itemArgs).toEqual(['--playlist-items', '3']);
    expect(a?.formatArgs).toEqual(['-f', 'bestaudio', '-x', '--audio-format', 'mp3']);
    expect(a?.mode).toBe('audio-only');
    expect(a?.subtitleArgs).toEqual(['--write-subs', '--sub-langs', 'en', '--embed-subs']);
  });

  it('counts positions over the raw listing when an entry is unavailable', async () => {
    const withGap = JSON.stringify({
      title: 'Gaps',
      entries: [{ id: 'a1', title: 'A', url: 'https://example.com/watch?v=a1' }, null, { id: 'c3', title: 'C', url: 'c3' }],
    });
    const plan = await loadPlaylistPlan(PLAYLIST_URL, queryReturning(withGap).query);

    expect(plan.items.map((i) => i.index)).toEqual([1, 3]);
    const [, c] = expandPlaylist(plan, 'best', { outputDir: '/music' });
    expect(c?.url).toBe(PLAYLIST_URL);
    expect(c?.itemArgs).toEqual(['--playlist-items', '3']);
  });

  it('refuses an empty selection', async () => {
    const plan = setAllSelected(await loadPlaylistPlan(PLAYLIST_URL, queryReturning(listing).query), false);
    expect(() => expandPlaylist(plan, 'best', { outputDir: '/music' })).toThrow('No playlist items selected');
  });
});

describe('presets', () => {
  it('maps audio to a no-video selection and heights to overrides', () => {
    expect(presetSelection('audio')).toEqual({ video: { kind: 'none' }, audio: { kind: 'best' } });
    expect(presetSelection('best')).toEqual({ override: 'bv*[ext=mp4]+ba[ext=m4a]/b[ext=mp4]/bv*+ba/b' });
    expect(isQualityPreset('1080')).toBe(true);
    expect(isQualityPreset('4k')).toBe(false);
  });
});
