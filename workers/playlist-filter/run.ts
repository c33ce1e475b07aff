/**
 * Filter Job
 *
 * One end-to-end run: download the playlist, filter it, reduce the EPG to
 * the surviving channels, save local artifacts and publish them.
 */

import { filterPlaylist } from '../../src/lib/iptv';
import { reduceEpgWithStats } from '../../src/lib/epg';
import { createLogger, generateRunId, type Logger } from '../../src/lib/logger';
import {
  buildCustomEpgRef,
  CONTENT_TYPES,
  deriveFileName,
  LOG_SERVICE,
  originalFileName,
  PLACEHOLDER_BUCKET,
  SIZE_LIMITS,
} from './config';
import { downloadText } from './fetcher';
import { writeArtifact, writeRawArtifact } from './output';
import { S3Storage } from './s3-storage';
import type {
  ArtifactInfo,
  DownloadOptions,
  DownloadResult,
  JobResult,
  StorageSettings,
  UploadRequest,
  UploadResult,
  WorkerConfig,
} from './types';

/**
 * Storage operations the job needs
 */
export interface JobStorage {
  upload(request: UploadRequest): Promise<UploadResult>;
  uploadFile(filePath: string, request: Omit<UploadRequest, 'body' | 'sourceFile'>): Promise<UploadResult>;
  close(): void;
}

/**
 * Collaborators of a job run, replaceable in tests
 */
export interface JobDependencies {
  download: (url: string, options: DownloadOptions) => Promise<DownloadResult>;
  writeArtifact: (dir: string, name: string, content: string) => Promise<ArtifactInfo>;
  writeRawArtifact: (dir: string, name: string, data: Uint8Array) => Promise<ArtifactInfo>;
  createStorage: (settings: StorageSettings) => JobStorage;
}

export const defaultDependencies: JobDependencies = {
  download: (url, options) => downloadText(url, options),
  writeArtifact,
  writeRawArtifact,
  createStorage: (settings) => new S3Storage(settings),
};

export interface RunOptions {
  /** Clock value for EPG retention; defaults to the current time */
  now?: Date | number;
  deps?: Partial<JobDependencies>;
  runId?: string;
}

/**
 * Run the filter job once. Never throws; failures are reported in the result.
 */
export async function runFilterJob(config: WorkerConfig, options: RunOptions = {}): Promise<JobResult> {
  const startTime = Date.now();
  const deps: JobDependencies = { ...defaultDependencies, ...options.deps };
  const log: Logger = createLogger(LOG_SERVICE).child({ runId: options.runId ?? generateRunId() });
  const now = options.now ?? new Date();

  const result: JobResult = {
    success: false,
    durationMs: 0,
    artifacts: [],
    uploads: [],
  };
  let storage: JobStorage | null = null;

  try {
    if (!config.dryRun && config.storage.bucket === PLACEHOLDER_BUCKET) {
      throw new Error('S3_BUCKET_NAME is not configured; set it or enable DRY_RUN');
    }

    log.info('Starting playlist filter job', { dryRun: config.dryRun });

    // Playlist
    const playlist = await log.withTiming('playlist download', () =>
      deps.download(config.m3uSourceUrl, {
        maxBytes: SIZE_LIMITS.playlistBytes,
        label: 'playlist',
      })
    );

    const customEpgRef = buildCustomEpgRef(config.storage.endpointUrl, config.storage.bucket, config.epgKey);
    const filtered = filterPlaylist(playlist.text, { ...config.playlistFilter, customEpgRef });
    result.playlist = filtered.stats;

    result.artifacts.push(
      await deps.writeArtifact(config.outputDir, config.playlistKey, filtered.text),
      await deps.writeArtifact(config.outputDir, deriveFileName(config.playlistKey, 'all'), playlist.text)
    );

    if (!config.dryRun) {
      storage = deps.createStorage(config.storage);
    }

    // EPG
    if (config.epgSourceUrl) {
      log.info('Starting EPG reduction');
      const epg = await log.withTiming('EPG download', () =>
        deps.download(config.epgSourceUrl, {
          maxBytes: SIZE_LIMITS.epgBytes,
          label: 'EPG',
        })
      );

      result.artifacts.push(
        await deps.writeRawArtifact(config.outputDir, originalFileName(config.epgSourceUrl), epg.raw)
      );

      const reduced = reduceEpgWithStats(epg.text, filtered.retention, config.epgReduce, now);
      result.epg = reduced.stats;

      const epgArtifact = await deps.writeArtifact(
        config.outputDir,
        deriveFileName(config.epgKey, 'filtered'),
        reduced.text
      );
      result.artifacts.push(epgArtifact);

      if (storage) {
        result.uploads.push(
          await storage.uploadFile(epgArtifact.path, {
            bucket: config.storage.bucket,
            key: config.epgKey,
            contentType: config.epgKey.endsWith('.gz') ? CONTENT_TYPES.gzip : CONTENT_TYPES.xml,
          })
        );
      }
    } else {
      log.info('EPG_SOURCE_URL is empty, skipping EPG');
    }

    if (!storage) {
      log.info('Dry-run mode: files saved locally, skipping upload');
    } else {
      result.uploads.push(
        await storage.upload({
          bucket: config.storage.bucket,
          key: config.playlistKey,
          contentType: CONTENT_TYPES.playlist,
          body: filtered.text,
        }),
        await storage.upload({
          bucket: config.storage.bucket,
          key: config.allPlaylistKey,
          contentType: CONTENT_TYPES.playlist,
          body: playlist.text,
        })
      );
    }

    result.success = true;
  } catch (error) {
    result.error = error instanceof Error ? error.message : String(error);
    log.error('Playlist filter job failed', error);
  } finally {
    storage?.close();
  }

  result.durationMs = Date.now() - startTime;

  if (result.success) {
    log.info(
      `Job complete: ${result.playlist?.outputEntries ?? 0}/${result.playlist?.inputEntries ?? 0} entries, ` +
        `${result.epg?.programmesOut ?? 0} EPG programmes, ${result.uploads.length} uploads ` +
        `(${Math.round(result.durationMs / 1000)}s)`
    );
  }

  return result;
}
