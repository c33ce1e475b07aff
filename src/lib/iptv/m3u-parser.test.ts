/**
 * M3U Parser Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatEntry,
  getAttribute,
  MAX_LINE_LENGTH,
  parseAttributes,
  parseExtInf,
  parseM3UPlaylist,
  serializePlaylist,
  setEpgReference,
} from './m3u-parser';

describe('M3U Parser', () => {
  describe('parseAttributes', () => {
    it('parses key="value" pairs in order', () => {
      const attrs = parseAttributes('-1 tvg-id="101" tvg-rec="3" group-title="News"');

      expect(Object.keys(attrs)).toEqual(['tvg-id', 'tvg-rec', 'group-title']);
      expect(attrs['tvg-rec']).toBe('3');
    });

    it('keeps the first value of a repeated key', () => {
      expect(parseAttributes('a="1" a="2"')).toEqual({ a: '1' });
    });
  });

  describe('getAttribute', () => {
    it('looks up names case-insensitively', () => {
      expect(getAttribute({ 'Group-Title': 'Kids' }, 'group-title')).toBe('Kids');
      expect(getAttribute({ 'tvg-id': '1' }, 'group-title')).toBeUndefined();
    });
  });

  describe('parseExtInf', () => {
    it('splits on the final comma', () => {
      const parsed = parseExtInf('#EXTINF:-1 tvg-id="101" group-title="News, World",Channel One ');

      expect(parsed.duration).toBe(-1);
      expect(parsed.metadataPrefix).toBe('#EXTINF:-1 tvg-id="101" group-title="News, World"');
      expect(parsed.displayName).toBe('Channel One');
      expect(parsed.attributes).toEqual({ 'tvg-id': '101', 'group-title': 'News, World' });
    });

    it('handles a line without a comma', () => {
      const parsed = parseExtInf('#EXTINF:120');

      expect(parsed.duration).toBe(120);
      expect(parsed.displayName).toBe('');
      expect(parsed.metadataPrefix).toBe('#EXTINF:120');
    });
  });

  describe('parseM3UPlaylist', () => {
    it('parses entries with directives and CRLF line endings', () => {
      const content = [
        '#EXTM3U url-tvg="http://example.com/epg.xml"',
        '#EXTINF:-1 tvg-id="1",One',
        '#EXTVLCOPT:http-user-agent=Test',
        'http://example.com/1',
        '',
        '#EXTINF:-1 tvg-id="2",Two',
        'http://example.com/2',
      ].join('\r\n');

      const playlist = parseM3UPlaylist(content);

      expect(playlist.header).toBe('#EXTM3U url-tvg="http://example.com/epg.xml"');
      expect(playlist.hasMetadata).toBe(true);
      expect(playlist.entries).toHaveLength(2);
      expect(playlist.entries[0].directives).toEqual(['#EXTVLCOPT:http-user-agent=Test']);
      expect(playlist.entries[0].streamUrl).toBe('http://example.com/1');
      expect(playlist.entries[1].index).toBe(5);
      expect(playlist.warnings).toEqual([]);
    });

    it('synthesizes a header when missing', () => {
      const playlist = parseM3UPlaylist('#EXTINF:-1,One\nhttp://example.com/1');

      expect(playlist.header).toBe('#EXTM3U');
      expect(playlist.entries).toHaveLength(1);
    });

    it('ignores later header lines', () => {
      const playlist = parseM3UPlaylist('#EXTM3U a="1"\n#EXTM3U b="2"\n#EXTINF:-1,One\nhttp://x/1');

      expect(playlist.header).toBe('#EXTM3U a="1"');
    });

    it('drops metadata lines with no stream URL', () => {
      const playlist = parseM3UPlaylist('#EXTM3U\n#EXTINF:-1,A\n#EXTINF:-1,B\nhttp://x/b\n#EXTINF:-1,C');

      expect(playlist.entries.map((e) => e.displayName)).toEqual(['B']);
      expect(playlist.warnings).toEqual([
        'Dropped metadata line 2 with no stream URL',
        'Dropped metadata line 5 with no stream URL',
      ]);
    });

    it('skips overlong lines', () => {
      const long = `http://x/${'a'.repeat(MAX_LINE_LENGTH)}`;
      const playlist = parseM3UPlaylist(`#EXTM3U\n#EXTINF:-1,A\n${long}\nhttp://x/a`);

      expect(playlist.entries[0].streamUrl).toBe('http://x/a');
      expect(playlist.warnings).toEqual([`Skipped line 3: longer than ${MAX_LINE_LENGTH} characters`]);
    });

    it('treats a playlist without metadata as bare URLs', () => {
      const playlist = parseM3UPlaylist('#EXTM3U\nhttp://x/1\n# comment\nhttp://x/2\n');

      expect(playlist.hasMetadata).toBe(false);
      expect(playlist.entries).toEqual([]);
      expect(playlist.bareUrls).toEqual(['http://x/1', 'http://x/2']);
    });

    it('ignores stray URL lines in an extended playlist', () => {
      const playlist = parseM3UPlaylist('#EXTM3U\nhttp://x/stray\n#EXTINF:-1,A\nhttp://x/a');

      expect(playlist.bareUrls).toEqual([]);
      expect(playlist.entries).toHaveLength(1);
    });
  });

  describe('setEpgReference', () => {
    it('replaces an existing url-tvg', () => {
      expect(setEpgReference('#EXTM3U url-tvg="http://old/epg.xml"', 'https://new/epg.xml.gz')).toBe(
        '#EXTM3U url-tvg="https://new/epg.xml.gz"'
      );
    });

    it('replaces x-tvg-url case-insensitively', () => {
      expect(setEpgReference('#EXTM3U X-TVG-URL="a" tvg-shift="0"', 'b')).toBe(
        '#EXTM3U X-TVG-URL="b" tvg-shift="0"'
      );
    });

    it('appends when absent', () => {
      expect(setEpgReference('#EXTM3U', 'https://new/epg.xml.gz')).toBe(
        '#EXTM3U url-tvg="https://new/epg.xml.gz"'
      );
    });

    it('inserts before a trailing >', () => {
      expect(setEpgReference('#EXTM3U>', 'e')).toBe('#EXTM3U url-tvg="e">');
    });
  });

  describe('serializePlaylist', () => {
    it('writes header then entry lines', () => {
      const { header, entries } = parseM3UPlaylist(
        '#EXTM3U\n#EXTINF:-1 tvg-id="1",One\n#EXTGRP:News\nhttp://x/1'
      );

      expect(formatEntry(entries[0])).toEqual(['#EXTINF:-1 tvg-id="1",One', '#EXTGRP:News', 'http://x/1']);
      expect(serializePlaylist(header, entries)).toBe(
        '#EXTM3U\n#EXTINF:-1 tvg-id="1",One\n#EXTGRP:News\nhttp://x/1'
      );
    });
  });
});
