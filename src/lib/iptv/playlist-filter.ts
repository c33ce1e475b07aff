/**
 * Playlist Filter
 *
 * Applies the inclusion and exclusion gates, suffix normalization and
 * duplicate resolution to an M3U playlist, and records which channel
 * identifiers survived.
 */

import { createLogger } from '../logger';
import { toLowerCaseSet } from '../utils';
import { buildChannelRetention, CATEGORY_ATTRIBUTE, EMPTY_RETENTION } from './channel-retention';
import { resolveDuplicates } from './duplicates';
import { getAttribute, parseM3UPlaylist, serializePlaylist, setEpgReference } from './m3u-parser';
import type {
  GateName,
  PlaylistEntry,
  PlaylistFilterConfig,
  PlaylistFilterResult,
  PlaylistFilterStats,
} from './types';

const log = createLogger('playlist-filter');

// ============================================================================
// Gates
// ============================================================================

/** Time-shifted regional copies: "Channel +2", "Channel +4 HD (Сибирь)" */
export const REGIONAL_VARIANT_PATTERN = /\s\+\d+(?:\s+HD)?(?:\s*\([^)]+\))?\s*$/i;

/** Numbered copies: "Channel 25" */
export const NUMERIC_SUFFIX_PATTERN = /\s\d{2,}$/;

const ORIG_SUFFIX_PATTERN = /\s+orig$/i;

interface CompiledRules {
  categories: Set<string>;
  namePatterns: string[];
}

function compileRules(config: PlaylistFilterConfig): CompiledRules {
  return {
    categories: toLowerCaseSet(config.categoriesToKeep),
    namePatterns: [...toLowerCaseSet(config.namePatternsToExclude)],
  };
}

/**
 * First gate that rejects the entry, or null when it passes all of them
 */
function rejectingGate(entry: PlaylistEntry, rules: CompiledRules): GateName | null {
  if (rules.categories.size > 0) {
    const category = getAttribute(entry.attributes, CATEGORY_ATTRIBUTE);
    if (category === undefined || !rules.categories.has(category.toLowerCase())) {
      return 'category';
    }
  }

  const name = entry.displayName.toLowerCase();
  if (rules.namePatterns.some((pattern) => name.includes(pattern))) {
    return 'name';
  }

  if (REGIONAL_VARIANT_PATTERN.test(entry.displayName)) {
    return 'regional';
  }

  if (NUMERIC_SUFFIX_PATTERN.test(entry.displayName)) {
    return 'numericSuffix';
  }

  return null;
}

/**
 * Strip a trailing " orig" marker from a display name
 */
export function stripOrigSuffix(displayName: string): string {
  return displayName.replace(ORIG_SUFFIX_PATTERN, '');
}

// ============================================================================
// Filter
// ============================================================================

/**
 * Filter playlist text.
 * Survivors keep their original relative order after the header.
 */
export function filterPlaylist(
  playlistText: string,
  config: PlaylistFilterConfig
): PlaylistFilterResult {
  const playlist = parseM3UPlaylist(playlistText);
  const rules = compileRules(config);

  for (const warning of playlist.warnings) {
    log.warn(warning);
  }

  const header = config.customEpgRef
    ? setEpgReference(playlist.header, config.customEpgRef)
    : playlist.header;

  const stats: PlaylistFilterStats = {
    inputEntries: playlist.entries.length,
    outputEntries: 0,
    droppedByGate: { category: 0, name: 0, regional: 0, numericSuffix: 0 },
    droppedAsDuplicate: 0,
    bareUrlsKept: 0,
    warnings: playlist.warnings.length,
  };

  if (!playlist.hasMetadata) {
    const bareUrls = rules.categories.size === 0 ? playlist.bareUrls : [];
    stats.bareUrlsKept = bareUrls.length;
    log.info('Filtered bare URL playlist', {
      inputUrls: playlist.bareUrls.length,
      keptUrls: bareUrls.length,
    });
    return {
      text: serializePlaylist(header, [], bareUrls),
      retention: EMPTY_RETENTION,
      stats,
    };
  }

  const gated: PlaylistEntry[] = [];
  for (const entry of playlist.entries) {
    const gate = rejectingGate(entry, rules);
    if (gate) {
      stats.droppedByGate[gate]++;
      log.debug(`Dropped "${entry.displayName}" at ${gate} gate`);
      continue;
    }

    const displayName = stripOrigSuffix(entry.displayName);
    gated.push(displayName === entry.displayName ? entry : { ...entry, displayName });
  }

  const { kept, removed } = resolveDuplicates(gated);
  for (const { item, key, reason } of removed) {
    log.debug(`Dropped duplicate "${item.displayName}" (group "${key}", ${reason})`);
  }

  stats.droppedAsDuplicate = removed.length;
  stats.outputEntries = kept.length;

  const retention = buildChannelRetention(kept);

  log.info('Filtered playlist', {
    inputEntries: stats.inputEntries,
    outputEntries: stats.outputEntries,
    droppedByGate: stats.droppedByGate,
    droppedAsDuplicate: stats.droppedAsDuplicate,
    retainedChannelIds: retention.channelIds.size,
  });

  return {
    text: serializePlaylist(header, kept),
    retention,
    stats,
  };
}
