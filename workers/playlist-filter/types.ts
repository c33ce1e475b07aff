/**
 * Playlist Filter Worker Types
 */

import type { EpgReduceConfig, EpgReduceStats } from '../../src/lib/epg';
import type { PlaylistFilterConfig, PlaylistFilterStats } from '../../src/lib/iptv';

/**
 * S3-compatible storage settings
 */
export interface StorageSettings {
  bucket: string;
  endpointUrl: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Validated worker configuration
 */
export interface WorkerConfig {
  m3uSourceUrl: string;
  /** Empty when EPG processing is disabled */
  epgSourceUrl: string;
  storage: StorageSettings;
  /** Object key of the filtered playlist, also its local file name */
  playlistKey: string;
  /** Object key of the unfiltered playlist */
  allPlaylistKey: string;
  /** Object key of the reduced EPG */
  epgKey: string;
  outputDir: string;
  dryRun: boolean;
  /** Null runs the job once */
  refreshIntervalMs: number | null;
  playlistFilter: Omit<PlaylistFilterConfig, 'customEpgRef'>;
  epgReduce: EpgReduceConfig;
}

export interface DownloadOptions {
  /** Byte ceiling of the response body before decompression */
  maxBytes: number;
  /** Name used in log lines and errors, e.g. "playlist" */
  label: string;
}

export interface DownloadResult {
  text: string;
  /** Body as received, before decompression */
  raw: Uint8Array;
  /** Bytes received over the wire */
  bytes: number;
  compression: 'none' | 'gzip' | 'zip';
}

/**
 * File written to the output directory
 */
export interface ArtifactInfo {
  path: string;
  bytes: number;
}

export interface UploadRequest {
  bucket: string;
  key: string;
  contentType: string;
  body: string | Uint8Array;
  /** Local file the body was read from, recorded in object metadata */
  sourceFile?: string;
}

export interface UploadResult {
  bucket: string;
  key: string;
  bytes: number;
  etag?: string;
}

/**
 * Outcome of one filter job run
 */
export interface JobResult {
  success: boolean;
  error?: string;
  durationMs: number;
  playlist?: PlaylistFilterStats;
  epg?: EpgReduceStats;
  artifacts: ArtifactInfo[];
  uploads: UploadResult[];
}
