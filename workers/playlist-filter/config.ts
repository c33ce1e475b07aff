/**
 * Playlist Filter Worker Configuration
 *
 * Constants and environment loading for the worker that filters the
 * playlist, reduces the EPG and publishes both to object storage.
 */

import defaults from './defaults.json';
import { DEFAULT_RETENTION_POLICY } from '../../src/lib/epg';
import type { WorkerConfig } from './types';

/**
 * Logger service name
 */
export const LOG_SERVICE = 'playlist-filter-worker';

/**
 * Environment defaults. The placeholders are never valid for a real upload.
 */
export const ENV_DEFAULTS = {
  M3U_SOURCE_URL: 'https://your-provider.com/playlist.m3u',
  EPG_SOURCE_URL: 'https://your-epg-provider.com/epg.xml.gz',
  S3_BUCKET_NAME: 'your-bucket-name',
  S3_OBJECT_KEY: 'playlist.m3u',
  S3_EPG_KEY: 'epg.xml.gz',
  S3_ENDPOINT_URL: 'https://s3.amazonaws.com',
  S3_REGION: 'us-east-1',
  OUTPUT_DIR: 'output',
} as const;

export const PLACEHOLDER_BUCKET = ENV_DEFAULTS.S3_BUCKET_NAME;

/** Remote key of the unfiltered playlist */
export const ALL_PLAYLIST_KEY = 'playlist-all.m3u';

/**
 * Size ceilings in bytes
 */
export const SIZE_LIMITS = {
  playlistBytes: 100 * 1024 * 1024,
  epgBytes: 500 * 1024 * 1024,
  uploadBytes: 1024 * 1024 * 1024,
} as const;

/**
 * HTTP fetch configuration
 */
export const FETCH_CONFIG = {
  /** User agent for M3U/EPG requests */
  userAgent: 'Mozilla/5.0 (compatible; m3u-epg-filter/1.0)',

  /** Request timeout in milliseconds */
  timeout: 60_000,

  /** Max retries for failed fetches */
  maxRetries: 3,

  /** Base delay for exponential backoff (ms) */
  retryBaseDelay: 1000,
} as const;

export const CONTENT_TYPES = {
  playlist: 'application/x-mpegurl',
  gzip: 'application/gzip',
  xml: 'application/xml',
} as const;

/**
 * Maximum time to wait for a running cycle on shutdown
 */
export const SHUTDOWN_TIMEOUT_MS = 30_000;

/**
 * Maximum time for one job run (30 minutes)
 */
export const JOB_TIMEOUT_MS = 30 * 60 * 1000;

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

/**
 * Raised when the environment does not describe a runnable job
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: keyof typeof ENV_DEFAULTS): string {
  const value = env[name];
  return value === undefined ? ENV_DEFAULTS[name] : value.trim();
}

function readInteger(env: Env, name: string, fallback: number, errors: string[]): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw)) {
    errors.push(`${name} must be a non-negative integer`);
    return fallback;
  }
  return parseInt(raw, 10);
}

/**
 * `;`-separated list; unset uses the default list, empty means an empty list
 */
function readList(env: Env, name: string, fallback: readonly string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return [...fallback];
  return raw
    .split(';')
    .map((item) => item.trim())
    .filter(Boolean);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function validateObjectKey(name: string, key: string, errors: string[]): void {
  if (!key || key.includes('..') || key.startsWith('/')) {
    errors.push(`${name} must not be empty, contain '..' or start with '/'`);
  }
}

/**
 * Validate a loaded configuration and return every problem found
 */
export function validateWorkerConfig(config: WorkerConfig): string[] {
  const errors: string[] = [];

  if (!isHttpUrl(config.m3uSourceUrl)) {
    errors.push('M3U_SOURCE_URL must be a valid HTTP/HTTPS URL');
  }

  if (config.epgSourceUrl && !isHttpUrl(config.epgSourceUrl)) {
    errors.push('EPG_SOURCE_URL must be a valid HTTP/HTTPS URL');
  }

  const { bucket, endpointUrl, region } = config.storage;
  if (bucket.length < 3 || bucket.length > 63) {
    errors.push('S3_BUCKET_NAME must be between 3 and 63 characters');
  }

  validateObjectKey('S3_OBJECT_KEY', config.playlistKey, errors);
  validateObjectKey('S3_EPG_KEY', config.epgKey, errors);

  if (!isHttpUrl(endpointUrl)) {
    errors.push('S3_ENDPOINT_URL must be a valid HTTP/HTTPS URL');
  } else {
    const url = new URL(endpointUrl);
    if (url.username || url.password) {
      errors.push('S3_ENDPOINT_URL must not contain credentials');
    }
  }

  if (!region) {
    errors.push('S3_REGION must be specified');
  }

  return errors;
}

/**
 * Load the worker configuration from environment variables
 *
 * @throws ConfigValidationError listing every invalid setting
 */
export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const errors: string[] = [];

  const refreshMinutes = readInteger(env, 'REFRESH_INTERVAL_MINUTES', 0, errors);

  const config: WorkerConfig = {
    m3uSourceUrl: readString(env, 'M3U_SOURCE_URL'),
    epgSourceUrl: readString(env, 'EPG_SOURCE_URL'),
    storage: {
      bucket: readString(env, 'S3_BUCKET_NAME'),
      endpointUrl: readString(env, 'S3_ENDPOINT_URL'),
      region: readString(env, 'S3_REGION'),
      accessKeyId: env.AWS_ACCESS_KEY_ID || undefined,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || undefined,
    },
    playlistKey: readString(env, 'S3_OBJECT_KEY'),
    allPlaylistKey: ALL_PLAYLIST_KEY,
    epgKey: readString(env, 'S3_EPG_KEY'),
    outputDir: readString(env, 'OUTPUT_DIR') || ENV_DEFAULTS.OUTPUT_DIR,
    dryRun: TRUTHY.has((env.DRY_RUN ?? '').trim().toLowerCase()),
    refreshIntervalMs: refreshMinutes > 0 ? refreshMinutes * 60 * 1000 : null,
    playlistFilter: {
      categoriesToKeep: readList(env, 'CATEGORIES_TO_KEEP', defaults.categoriesToKeep),
      namePatternsToExclude: readList(env, 'CHANNEL_NAMES_TO_EXCLUDE', defaults.channelNamesToExclude),
    },
    epgReduce: {
      excludedCategories: readList(env, 'EPG_EXCLUDED_CATEGORIES', defaults.epgExcludedCategories),
      excludedChannelIds: readList(env, 'EPG_EXCLUDED_CHANNEL_IDS', defaults.epgExcludedChannelIds),
      retention: {
        futureRetentionDays: readInteger(
          env,
          'EPG_RETENTION_DAYS',
          DEFAULT_RETENTION_POLICY.futureRetentionDays,
          errors
        ),
        pastRetentionDays: readInteger(
          env,
          'EPG_PAST_RETENTION_DAYS',
          DEFAULT_RETENTION_POLICY.pastRetentionDays,
          errors
        ),
        excludedChannelFutureLimitDays: readInteger(
          env,
          'EPG_EXCLUDED_FUTURE_LIMIT_DAYS',
          DEFAULT_RETENTION_POLICY.excludedChannelFutureLimitDays,
          errors
        ),
        excludedChannelPastLimitHours: readInteger(
          env,
          'EPG_EXCLUDED_PAST_LIMIT_HOURS',
          DEFAULT_RETENTION_POLICY.excludedChannelPastLimitHours,
          errors
        ),
        fallbackWindowDays: readInteger(
          env,
          'EPG_FALLBACK_WINDOW_DAYS',
          DEFAULT_RETENTION_POLICY.fallbackWindowDays,
          errors
        ),
      },
    },
  };

  errors.push(...validateWorkerConfig(config));
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }

  return config;
}

/**
 * Public URL of the reduced EPG, written into the filtered playlist header:
 * https://<bucket>.<endpoint host>/<epg key>
 */
export function buildCustomEpgRef(endpointUrl: string, bucket: string, epgKey: string): string {
  const separator = endpointUrl.indexOf('://');
  const host = (separator >= 0 ? endpointUrl.slice(separator + 3) : endpointUrl).replace(/\/+$/, '');
  return `https://${bucket}.${host}/${epgKey}`;
}

/**
 * Local file name derived from a key: "playlist.m3u" + "all" gives
 * "playlist-all.m3u"
 */
export function deriveFileName(key: string, suffix: string): string {
  const dot = key.lastIndexOf('.');
  if (dot <= 0) return `${key}-${suffix}`;
  return `${key.slice(0, dot)}-${suffix}${key.slice(dot)}`;
}

/** Local name of the raw EPG when its URL has no file name */
export const DEFAULT_EPG_FILE_NAME = 'downloaded_epg.xml';

/**
 * Local name of a source saved as received: "original_" + the URL's file name
 */
export function originalFileName(url: string): string {
  const segments = new URL(url).pathname.split('/');
  const name = decodeURIComponent(segments[segments.length - 1] ?? '');
  return `original_${name || DEFAULT_EPG_FILE_NAME}`;
}

/**
 * Human readable retention summary for startup logs
 */
export function describeRetention(config: WorkerConfig): string {
  const { retention } = config.epgReduce;
  return (
    `future ${retention.futureRetentionDays}d, past ${retention.pastRetentionDays}d, ` +
    `excluded channels -${retention.excludedChannelPastLimitHours}h/+${retention.excludedChannelFutureLimitDays}d, ` +
    `fallback ${retention.fallbackWindowDays}d`
  );
}
