/**
 * Channel Retention
 *
 * The set of channel identifiers (and their categories) that survived the
 * playlist filter. The EPG reducer is scoped to this set.
 */

import { getAttribute } from './m3u-parser';
import type { ChannelRetentionSet, PlaylistEntry } from './types';

export const CHANNEL_ID_ATTRIBUTE = 'tvg-id';
export const CATEGORY_ATTRIBUTE = 'group-title';

export const EMPTY_RETENTION: ChannelRetentionSet = {
  channelIds: new Set<string>(),
  channelCategories: new Map<string, string>(),
};

/**
 * Record identifiers and categories of surviving entries.
 * Empty identifiers are skipped; the first category seen for an id wins.
 */
export function buildChannelRetention(entries: readonly PlaylistEntry[]): ChannelRetentionSet {
  const channelIds = new Set<string>();
  const channelCategories = new Map<string, string>();

  for (const entry of entries) {
    const id = getAttribute(entry.attributes, CHANNEL_ID_ATTRIBUTE)?.trim();
    if (!id) continue;

    channelIds.add(id);

    const category = getAttribute(entry.attributes, CATEGORY_ATTRIBUTE)?.trim();
    if (category && !channelCategories.has(id)) {
      channelCategories.set(id, category);
    }
  }

  return { channelIds, channelCategories };
}

