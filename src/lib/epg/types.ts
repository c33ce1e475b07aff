/**
 * EPG Reducer Types
 */

/**
 * Time retention rules, in days unless the name says otherwise
 */
export interface RetentionPolicy {
  readonly pastRetentionDays: number;
  readonly futureRetentionDays: number;
  readonly excludedChannelFutureLimitDays: number;
  readonly excludedChannelPastLimitHours: number;
  /** Window of the fallback tier used when no programme matches a retained id */
  readonly fallbackWindowDays: number;
}

export interface EpgReduceConfig {
  /** Categories whose channels use the short retention window (case-insensitive) */
  readonly excludedCategories: readonly string[];
  /** Channel ids that use the short retention window */
  readonly excludedChannelIds: readonly string[];
  readonly retention: RetentionPolicy;
  /** lang written on a channel's display-name when it has none */
  readonly defaultDisplayNameLang?: string;
}

export type XmltvTimestamp =
  | { ok: true; epochMs: number }
  | { ok: false; reason: 'format' | 'calendar' };

export interface ProgrammeWindow {
  startMs: number;
  stopMs: number;
}

export interface EpgReduceStats {
  channelsIn: number;
  programmesIn: number;
  channelsOut: number;
  programmesOut: number;
  /** Whether the time-heuristic fallback tier chose the channels */
  fallbackUsed: boolean;
  /** Programmes kept because their start or stop could not be parsed */
  malformedTimestamps: number;
}

export interface EpgReduceResult {
  text: string;
  stats: EpgReduceStats;
}
