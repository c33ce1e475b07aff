/**
 * Source Fetcher Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { gzipSync } from 'zlib';
import { strToU8, zipSync } from 'fflate';

// Mock undici
const mockFetch = vi.fn();
vi.mock('undici', () => ({
  Agent: class MockAgent {},
  fetch: (...args: unknown[]) => mockFetch(...args),
}));

function okResponse(data: Uint8Array, headers: Record<string, string> = {}) {
  let sent = false;
  const reader = {
    read: vi.fn(async () => {
      if (sent) return { done: true, value: undefined };
      sent = true;
      return { done: false, value: data };
    }),
    cancel: vi.fn(async () => undefined),
    releaseLock: vi.fn(),
  };
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    body: { getReader: () => reader },
  };
}

describe('Fetcher', () => {
  let fetcher: typeof import('./fetcher');

  beforeEach(async () => {
    vi.clearAllMocks();
    fetcher = await import('./fetcher');
  });

  afterEach(() => {
    mockFetch.mockReset();
  });

  describe('downloadText', () => {
    it('returns plain text bodies', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(Buffer.from('#EXTM3U\n')));

      const result = await fetcher.downloadText(
        'https://example.com/playlist.m3u',
        { maxBytes: 1024, label: 'playlist' },
        0
      );

      expect(result).toEqual({ text: '#EXTM3U\n', raw: Buffer.from('#EXTM3U\n'), bytes: 8, compression: 'none' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0][0]).toBe('https://example.com/playlist.m3u');
    });

    it('gunzips by magic bytes', async () => {
      const packed = gzipSync(Buffer.from('<tv></tv>'));
      mockFetch.mockResolvedValueOnce(okResponse(packed));

      const result = await fetcher.downloadText('https://example.com/epg', { maxBytes: 1024, label: 'EPG' }, 0);

      expect(result.text).toBe('<tv></tv>');
      expect(result.compression).toBe('gzip');
      expect(result.bytes).toBe(packed.length);
      expect(Buffer.from(result.raw).equals(packed)).toBe(true);
    });

    it('extracts the first file of a zip archive', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(zipSync({ 'epg.xml': strToU8('<tv>зип</tv>') })));

      const result = await fetcher.downloadText('https://example.com/epg.zip', { maxBytes: 4096, label: 'EPG' }, 0);

      expect(result.text).toBe('<tv>зип</tv>');
      expect(result.compression).toBe('zip');
    });

    it('rejects an empty zip archive', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(zipSync({})));

      await expect(
        fetcher.downloadText('https://example.com/epg.zip', { maxBytes: 4096, label: 'EPG' }, 0)
      ).rejects.toThrow('EPG ZIP archive is empty');
    });

    it('stops reading past the byte ceiling', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(Buffer.from('0123456789A')));

      await expect(
        fetcher.downloadText('https://example.com/playlist.m3u', { maxBytes: 10, label: 'playlist' }, 0)
      ).rejects.toThrow(fetcher.SizeLimitExceededError);
    });

    it('rejects a declared length over the ceiling', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(Buffer.from('x'), { 'content-length': '2048' }));

      await expect(
        fetcher.downloadText('https://example.com/playlist.m3u', { maxBytes: 1024, label: 'playlist' }, 0)
      ).rejects.toThrow('playlist exceeds maximum allowed size of 1024 bytes');
    });

    it('retries HTTP failures and then gives up', async () => {
      mockFetch.mockResolvedValue({ ok: false, status: 404, statusText: 'Not Found' });

      await expect(
        fetcher.downloadText('https://example.com/missing.m3u', { maxBytes: 1024, label: 'playlist' }, 0)
      ).rejects.toThrow('HTTP 404: Not Found');
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('recovers after a transient failure', async () => {
      mockFetch
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce(okResponse(Buffer.from('#EXTM3U')));

      const result = await fetcher.downloadText(
        'https://example.com/playlist.m3u',
        { maxBytes: 1024, label: 'playlist' },
        0
      );

      expect(result.text).toBe('#EXTM3U');
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('rejects bodies that are not UTF-8', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(Buffer.from([0xff, 0xfe, 0xfd])));

      await expect(
        fetcher.downloadText('https://example.com/playlist.m3u', { maxBytes: 1024, label: 'playlist' }, 0)
      ).rejects.toThrow('playlist is not valid UTF-8');
    });
  });

  describe('decodePayload', () => {
    it('reads an uncompressed body as text whatever the URL says', async () => {
      mockFetch.mockResolvedValueOnce(okResponse(Buffer.from('<tv></tv>')));

      const result = await fetcher.downloadText('https://epg.example.com/epg.xml.gz', { maxBytes: 1024, label: 'EPG' }, 0);

      expect(result).toEqual({ text: '<tv></tv>', raw: Buffer.from('<tv></tv>'), bytes: 9, compression: 'none' });
    });

    it('leaves bodies without a compression signature untouched', async () => {
      await expect(fetcher.decodePayload(Buffer.from('#EXTM3U'), 'playlist')).resolves.toEqual({
        text: '#EXTM3U',
        compression: 'none',
      });
    });
  });

  describe('extractFirstZipEntry', () => {
    it('skips directory entries', () => {
      const archive = zipSync({ 'guide/': new Uint8Array(0), 'guide/epg.xml': strToU8('<tv />') });

      expect(Buffer.from(fetcher.extractFirstZipEntry(archive)).toString('utf-8')).toBe('<tv />');
    });
  });
});
