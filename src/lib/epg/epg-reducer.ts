/**
 * EPG Reducer
 *
 * Scopes an XMLTV guide to the channels kept by the playlist filter and
 * trims programmes to a retention window around `now`.
 */

import { createLogger } from '../logger';
import { toEpochMs, toLowerCaseSet } from '../utils';
import type { ChannelRetentionSet } from '../iptv/types';
import { isInFallbackWindow, shouldRetainProgramme } from './retention';
import type { EpgReduceConfig, EpgReduceResult, EpgReduceStats, XmltvTimestamp } from './types';
import { parseXmltvTimestamp } from './xmltv-time';
import {
  childElements,
  createElement,
  parseXml,
  serializeXml,
  type XmlElement,
  type XmlNode,
} from './xml-tree';

const log = createLogger('epg-reducer');

/**
 * Document returned when no channel identifiers were retained
 */
export const EMPTY_EPG_DOCUMENT = '<?xml version="1.0" encoding="UTF-8"?><tv></tv>';

export const DEFAULT_DISPLAY_NAME_LANG = 'ru';

interface TimedProgramme {
  element: XmlElement;
  channelId: string;
  start: XmltvTimestamp;
  stop: XmltvTimestamp;
}

// ============================================================================
// Copying
// ============================================================================

function cloneNode(node: XmlNode): XmlNode {
  if (node.type === 'text') {
    return { type: 'text', value: node.value };
  }
  return createElement(node.name, { ...node.attributes }, node.children.map(cloneNode));
}

/**
 * Deep copy of a programme subtree; desc elements lose their direct text
 */
function copyProgrammeNode(node: XmlNode): XmlNode {
  if (node.type === 'text') {
    return { type: 'text', value: node.value };
  }

  const isDesc = node.name.toLowerCase() === 'desc';
  const children = node.children
    .filter((child) => !(isDesc && child.type === 'text'))
    .map(copyProgrammeNode);

  return createElement(node.name, { ...node.attributes }, children);
}

/**
 * Channel with its first display-name (lang defaulted) and every other child
 * except display-name and icon
 */
function copyChannel(channel: XmlElement, id: string, defaultLang: string): XmlElement {
  const children: XmlNode[] = [];

  const [displayName] = childElements(channel, 'display-name');
  if (displayName) {
    children.push(
      createElement(
        'display-name',
        { ...displayName.attributes, lang: displayName.attributes.lang ?? defaultLang },
        displayName.children.map(cloneNode)
      )
    );
  }

  for (const child of childElements(channel)) {
    if (child.name !== 'display-name' && child.name !== 'icon') {
      children.push(cloneNode(child));
    }
  }

  return createElement('channel', { id }, children);
}

// ============================================================================
// Reduction
// ============================================================================

function emptyStats(): EpgReduceStats {
  return {
    channelsIn: 0,
    programmesIn: 0,
    channelsOut: 0,
    programmesOut: 0,
    fallbackUsed: false,
    malformedTimestamps: 0,
  };
}

/**
 * Channels with a programme airing now or starting within the fallback window
 */
function selectFallbackChannels(
  programmes: readonly TimedProgramme[],
  config: EpgReduceConfig,
  nowMs: number
): Set<string> {
  const channels = new Set<string>();
  for (const { channelId, start, stop } of programmes) {
    if (!channelId || channels.has(channelId) || !start.ok || !stop.ok) continue;
    if (isInFallbackWindow({ startMs: start.epochMs, stopMs: stop.epochMs }, config.retention, nowMs)) {
      channels.add(channelId);
    }
  }
  return channels;
}

/**
 * Reduce an EPG document and report counts.
 *
 * @throws EpgParseError when the EPG text is not well-formed XML
 */
export function reduceEpgWithStats(
  epgText: string,
  retention: ChannelRetentionSet,
  config: EpgReduceConfig,
  now: Date | number
): EpgReduceResult {
  if (retention.channelIds.size === 0) {
    log.warn('No channel identifiers retained, returning empty EPG');
    return { text: EMPTY_EPG_DOCUMENT, stats: emptyStats() };
  }

  const nowMs = toEpochMs(now);
  const root = parseXml(epgText);
  const channels = childElements(root, 'channel');
  const programmes: TimedProgramme[] = childElements(root, 'programme').map((element) => ({
    element,
    channelId: element.attributes.channel ?? '',
    start: parseXmltvTimestamp(element.attributes.start),
    stop: parseXmltvTimestamp(element.attributes.stop),
  }));

  const stats = emptyStats();
  stats.channelsIn = channels.length;
  stats.programmesIn = programmes.length;

  // Channel-set intersection
  let retainedIds = new Set(
    programmes.map((p) => p.channelId).filter((id) => retention.channelIds.has(id))
  );

  if (retainedIds.size === 0) {
    retainedIds = selectFallbackChannels(programmes, config, nowMs);
    stats.fallbackUsed = true;
    log.warn('No programme references a retained channel id, using time-window fallback', {
      retainedIds: retention.channelIds.size,
      fallbackChannels: retainedIds.size,
      fallbackWindowDays: config.retention.fallbackWindowDays,
    });
  }

  // Programme time and exclusion filter
  const excludedCategories = toLowerCaseSet(config.excludedCategories);
  const excludedIds = new Set(config.excludedChannelIds.map((id) => id.trim()));
  const isExcludedChannel = (id: string): boolean => {
    const category = retention.channelCategories.get(id);
    return (
      (category !== undefined && excludedCategories.has(category.toLowerCase())) ||
      excludedIds.has(id)
    );
  };

  const keptProgrammes: TimedProgramme[] = [];
  const channelsWithProgrammes = new Set<string>();

  for (const programme of programmes) {
    const { channelId, start, stop } = programme;
    if (!retainedIds.has(channelId)) continue;

    if (!start.ok || !stop.ok) {
      stats.malformedTimestamps++;
      log.warn(`Could not parse programme times on channel ${channelId}, keeping it`, {
        start: programme.element.attributes.start,
        stop: programme.element.attributes.stop,
      });
    } else if (
      !shouldRetainProgramme(
        { startMs: start.epochMs, stopMs: stop.epochMs },
        isExcludedChannel(channelId),
        config.retention,
        nowMs
      )
    ) {
      continue;
    }

    keptProgrammes.push(programme);
    channelsWithProgrammes.add(channelId);
  }

  // Channel emission: first declaration per id, only channels with programmes
  const defaultLang = config.defaultDisplayNameLang ?? DEFAULT_DISPLAY_NAME_LANG;
  const output = createElement('tv');
  const emittedIds = new Set<string>();

  for (const channel of channels) {
    const id = channel.attributes.id ?? '';
    if (!channelsWithProgrammes.has(id) || emittedIds.has(id)) continue;
    emittedIds.add(id);
    output.children.push(copyChannel(channel, id, defaultLang));
  }

  // Programme emission
  for (const { element, channelId } of keptProgrammes) {
    if (!emittedIds.has(channelId)) continue;
    output.children.push(copyProgrammeNode(element));
    stats.programmesOut++;
  }

  stats.channelsOut = emittedIds.size;

  log.info('Reduced EPG', { ...stats });

  return { text: serializeXml(output), stats };
}

/**
 * Reduce an EPG document to the retained channels and retention window
 *
 * @throws EpgParseError when the EPG text is not well-formed XML
 */
export function reduceEpg(
  epgText: string,
  retention: ChannelRetentionSet,
  config: EpgReduceConfig,
  now: Date | number
): string {
  return reduceEpgWithStats(epgText, retention, config, now).text;
}
