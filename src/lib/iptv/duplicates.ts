/**
 * Duplicate Resolution
 *
 * Groups playlist entries that advertise the same channel in different
 * qualities or versions and picks one representative per group.
 */

import { collapseWhitespace, escapeRegex } from '../utils';
import { getAttribute } from './m3u-parser';
import type { PlaylistEntry } from './types';

/**
 * Quality/version words removed when building the grouping key, in the
 * order they are applied. Multi-word tokens come before their one-word
 * prefixes.
 */
export const QUALITY_TOKENS = ['full hd', 'uhd tv', 'hd', 'orig', 'sd', '4k', 'uhd'] as const;

const QUALITY_PATTERNS = QUALITY_TOKENS.map(
  (token) =>
    new RegExp(`\\s*(?<![\\p{L}\\p{N}_])${escapeRegex(token)}(?![\\p{L}\\p{N}_])\\s*`, 'gu')
);

export const RECORDING_PRIORITY_ATTRIBUTE = 'tvg-rec';

/**
 * Grouping key: quality words removed as whole words, case-folded,
 * whitespace collapsed
 */
export function normalizeChannelKey(displayName: string): string {
  let normalized = displayName.toLowerCase();
  for (const pattern of QUALITY_PATTERNS) {
    normalized = normalized.replace(pattern, ' ');
  }
  return collapseWhitespace(normalized);
}

/**
 * An HD variant carries " hd" anywhere in its name
 */
export function isHdVariant(displayName: string): boolean {
  return displayName.toLowerCase().includes(' hd');
}

/**
 * Recording priority from tvg-rec; absent or non-numeric is 0
 */
export function getRecordingPriority(entry: PlaylistEntry): number {
  const raw = getAttribute(entry.attributes, RECORDING_PRIORITY_ATTRIBUTE);
  return raw !== undefined && /^\d+$/.test(raw) ? parseInt(raw, 10) : 0;
}

export interface RepresentativeRules<T> {
  keyOf: (item: T) => string;
  /** Preferred items win over the rest of their group when both kinds exist */
  isPreferred: (item: T) => boolean;
  rankOf: (item: T) => number;
}

export type RemovalReason = 'not-preferred' | 'lower-rank';

export interface RepresentativeSelection<T> {
  /** Survivors, in input order */
  kept: T[];
  removed: Array<{ item: T; key: string; reason: RemovalReason }>;
}

/**
 * Pick one representative per group.
 *
 * Within a group, preferred items are the only candidates when the group
 * mixes preferred and non-preferred items. Among candidates the highest
 * rank wins; ties keep the first encountered.
 */
export function selectRepresentatives<T>(
  items: readonly T[],
  rules: RepresentativeRules<T>
): RepresentativeSelection<T> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = rules.keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  const winners = new Set<T>();
  const removed: RepresentativeSelection<T>['removed'] = [];

  for (const [key, variants] of groups) {
    const preferred = variants.filter(rules.isPreferred);
    const mixed = preferred.length > 0 && preferred.length < variants.length;
    const candidates = mixed ? preferred : variants;

    if (mixed) {
      for (const item of variants) {
        if (!rules.isPreferred(item)) {
          removed.push({ item, key, reason: 'not-preferred' });
        }
      }
    }

    const best = candidates.reduce((current, candidate) =>
      rules.rankOf(candidate) > rules.rankOf(current) ? candidate : current
    );
    winners.add(best);

    for (const item of candidates) {
      if (item !== best) {
        removed.push({ item, key, reason: 'lower-rank' });
      }
    }
  }

  return {
    kept: items.filter((item) => winners.has(item)),
    removed,
  };
}

/**
 * Duplicate and HD-preference reduction over playlist entries
 */
export function resolveDuplicates(
  entries: readonly PlaylistEntry[]
): RepresentativeSelection<PlaylistEntry> {
  return selectRepresentatives(entries, {
    keyOf: (entry) => normalizeChannelKey(entry.displayName),
    isPreferred: (entry) => isHdVariant(entry.displayName),
    rankOf: getRecordingPriority,
  });
}
