/**
 * Playlist Filter Types
 */

/**
 * One advertised channel: an #EXTINF metadata line and its stream URL
 */
export interface PlaylistEntry {
  /** Position of the metadata line in the input, used for stable ordering */
  index: number;
  /** Duration token after #EXTINF: (-1 for live streams) */
  duration: number;
  /** Attributes in source order, e.g. tvg-id, group-title, tvg-rec */
  attributes: Record<string, string>;
  /** Text of the metadata line before the final comma */
  metadataPrefix: string;
  /** Display name after the final comma, trimmed */
  displayName: string;
  /** Directive lines between the metadata line and the URL (#EXTVLCOPT, #EXTGRP) */
  directives: string[];
  /** Stream URL line */
  streamUrl: string;
}

/**
 * Parsed playlist document
 */
export interface Playlist {
  /** The #EXTM3U directive line */
  header: string;
  entries: PlaylistEntry[];
  /** URL lines of a playlist that carries no metadata lines at all */
  bareUrls: string[];
  /** Whether any #EXTINF line was seen */
  hasMetadata: boolean;
  /** Non-fatal parse anomalies */
  warnings: string[];
}

/**
 * Immutable rule configuration for the playlist filter
 */
export interface PlaylistFilterConfig {
  /** Categories (group-title) to keep; empty keeps everything */
  readonly categoriesToKeep: readonly string[];
  /** Case-insensitive substrings that drop an entry by display name */
  readonly namePatternsToExclude: readonly string[];
  /** EPG reference written into the header as url-tvg */
  readonly customEpgRef?: string;
}

/**
 * Channel identifiers retained by the playlist filter, for EPG scoping
 */
export interface ChannelRetentionSet {
  readonly channelIds: ReadonlySet<string>;
  /** Identifier to category, only for identifiers that had a category */
  readonly channelCategories: ReadonlyMap<string, string>;
}

export type GateName = 'category' | 'name' | 'regional' | 'numericSuffix';

export interface PlaylistFilterStats {
  inputEntries: number;
  outputEntries: number;
  droppedByGate: Record<GateName, number>;
  droppedAsDuplicate: number;
  bareUrlsKept: number;
  warnings: number;
}

export interface PlaylistFilterResult {
  text: string;
  retention: ChannelRetentionSet;
  stats: PlaylistFilterStats;
}
