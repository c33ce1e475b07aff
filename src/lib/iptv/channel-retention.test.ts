import { describe, it, expect } from 'vitest';
import { buildChannelRetention } from './channel-retention';
import { parseM3UPlaylist } from './m3u-parser';

describe('buildChannelRetention', () => {
  it('records identifiers and the first category per identifier', () => {
    const { entries } = parseM3UPlaylist(
      [
        '#EXTM3U',
        '#EXTINF:-1 tvg-id=" 101 " group-title="Кино",A',
        'http://x/a',
        '#EXTINF:-1 tvg-id="101" group-title="News",A2',
        'http://x/a2',
        '#EXTINF:-1 tvg-id="" group-title="News",B',
        'http://x/b',
        '#EXTINF:-1 TVG-ID="202",C',
        'http://x/c',
      ].join('\n')
    );

    const retention = buildChannelRetention(entries);

    expect([...retention.channelIds]).toEqual(['101', '202']);
    expect([...retention.channelCategories]).toEqual([['101', 'Кино']]);
  });
});
