/**
 * M3U Parser
 *
 * Splits M3U/M3U8 playlist text into a header and entries, and writes
 * entries back out. Supports the extended format (#EXTINF metadata lines
 * with key="value" attributes) and bare URL lists.
 */

import type { Playlist, PlaylistEntry } from './types';

/**
 * Lines longer than this are skipped
 */
export const MAX_LINE_LENGTH = 10_000;

export const HEADER_DIRECTIVE = '#EXTM3U';
export const METADATA_DIRECTIVE = '#EXTINF:';

/** Attribute names carrying an EPG source reference on the header line */
const EPG_REF_ATTRIBUTES = ['url-tvg', 'x-tvg-url'];

/**
 * Parse key="value" attributes from a string, in source order
 */
export function parseAttributes(str: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  const regex = /([A-Za-z0-9_.:-]+)="([^"]*)"/g;
  let match;

  while ((match = regex.exec(str)) !== null) {
    if (!(match[1] in attrs)) {
      attrs[match[1]] = match[2];
    }
  }

  return attrs;
}

/**
 * Case-insensitive attribute lookup
 */
export function getAttribute(
  attributes: Record<string, string>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(attributes)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse an #EXTINF line.
 * The display name is everything after the last comma.
 */
export function parseExtInf(
  line: string
): Pick<PlaylistEntry, 'duration' | 'attributes' | 'metadataPrefix' | 'displayName'> {
  const trimmed = line.trim();
  const lastCommaIndex = trimmed.lastIndexOf(',');
  const metadataPrefix = lastCommaIndex >= 0 ? trimmed.substring(0, lastCommaIndex) : trimmed;
  const displayName = lastCommaIndex >= 0 ? trimmed.substring(lastCommaIndex + 1).trim() : '';

  const body = metadataPrefix.substring(METADATA_DIRECTIVE.length);
  const durationMatch = body.match(/^\s*(-?\d+(?:\.\d+)?)/);
  const duration = durationMatch ? parseFloat(durationMatch[1]) : -1;

  return {
    duration,
    attributes: parseAttributes(body),
    metadataPrefix,
    displayName,
  };
}

/**
 * Parse playlist text.
 *
 * A metadata line owns the directive lines that follow it and the first
 * non-directive line after it, which is its stream URL. Metadata lines that
 * never get a URL are dropped and reported in `warnings`.
 */
export function parseM3UPlaylist(content: string): Playlist {
  const lines = content.split(/\r?\n/);
  const hasMetadata = lines.some((line) => line.trim().startsWith(METADATA_DIRECTIVE));

  const entries: PlaylistEntry[] = [];
  const bareUrls: string[] = [];
  const warnings: string[] = [];
  let header: string | null = null;
  let pending: Omit<PlaylistEntry, 'streamUrl'> | null = null;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];

    if (raw.length > MAX_LINE_LENGTH) {
      warnings.push(`Skipped line ${i + 1}: longer than ${MAX_LINE_LENGTH} characters`);
      continue;
    }

    const line = raw.trim();
    if (!line) continue;

    if (line.startsWith(HEADER_DIRECTIVE)) {
      header ??= line;
      continue;
    }

    if (line.startsWith(METADATA_DIRECTIVE)) {
      if (pending) {
        warnings.push(`Dropped metadata line ${pending.index + 1} with no stream URL`);
      }
      pending = { ...parseExtInf(line), index: i, directives: [] };
      continue;
    }

    if (line.startsWith('#')) {
      pending?.directives.push(line);
      continue;
    }

    if (pending) {
      entries.push({ ...pending, streamUrl: line });
      pending = null;
    } else if (!hasMetadata) {
      bareUrls.push(line);
    }
  }

  if (pending) {
    warnings.push(`Dropped metadata line ${pending.index + 1} with no stream URL`);
  }

  return {
    header: header ?? HEADER_DIRECTIVE,
    entries,
    bareUrls,
    hasMetadata,
    warnings,
  };
}

/**
 * Replace the EPG reference on a header line, or append one
 */
export function setEpgReference(header: string, epgRef: string): string {
  const names = EPG_REF_ATTRIBUTES.join('|');
  const existing = new RegExp(`(^|\\s)(${names})="[^"]*"`, 'gi');

  if (new RegExp(`(^|\\s)(${names})="[^"]*"`, 'i').test(header)) {
    return header.replace(
      existing,
      (_match, lead: string, name: string) => `${lead}${name}="${epgRef}"`
    );
  }

  if (header.endsWith('>')) {
    return `${header.slice(0, -1)} url-tvg="${epgRef}">`;
  }
  return `${header} url-tvg="${epgRef}"`;
}

/**
 * Lines of one entry: metadata, directives, URL
 */
export function formatEntry(entry: PlaylistEntry): string[] {
  const metadata = entry.displayName
    ? `${entry.metadataPrefix},${entry.displayName}`
    : entry.metadataPrefix;
  return [metadata, ...entry.directives, entry.streamUrl];
}

/**
 * Serialize a playlist: header first, then entries or bare URLs
 */
export function serializePlaylist(
  header: string,
  entries: readonly PlaylistEntry[],
  bareUrls: readonly string[] = []
): string {
  return [header, ...entries.flatMap(formatEntry), ...bareUrls].join('\n');
}
