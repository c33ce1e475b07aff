/**
 * S3 Storage for the Playlist Filter Worker
 *
 * Uploads artifacts to S3-compatible object storage.
 */

import { readFile } from 'fs/promises';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { createLogger } from '../../src/lib/logger';
import { formatBytes } from '../../src/lib/utils';
import { LOG_SERVICE, SIZE_LIMITS } from './config';
import type { StorageSettings, UploadRequest, UploadResult } from './types';

const log = createLogger(LOG_SERVICE).child({ component: 's3-storage' });

export const UPLOADED_BY = 'm3u-epg-filter';

/**
 * Raised before any request is made when storage settings cannot work
 */
export class StorageConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageConfigError';
  }
}

/**
 * Object storage client for the worker
 */
export class S3Storage {
  private client: S3Client | null = null;

  constructor(private readonly settings: StorageSettings) {}

  /**
   * Check credentials and endpoint before the first upload
   */
  private verifySettings(): void {
    const { accessKeyId, secretAccessKey, endpointUrl } = this.settings;
    if (!accessKeyId || !secretAccessKey) {
      throw new StorageConfigError('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are required for uploads');
    }
    if (!endpointUrl.startsWith('https://')) {
      throw new StorageConfigError('S3_ENDPOINT_URL must use https for uploads');
    }
  }

  private getClient(): S3Client {
    if (!this.client) {
      this.verifySettings();
      this.client = new S3Client({
        endpoint: this.settings.endpointUrl,
        region: this.settings.region,
        credentials: {
          accessKeyId: this.settings.accessKeyId ?? '',
          secretAccessKey: this.settings.secretAccessKey ?? '',
        },
      });
    }
    return this.client;
  }

  /**
   * Upload a string or byte payload
   *
   * @throws StorageConfigError for missing credentials, a non-https endpoint
   *   or a payload over the upload ceiling
   */
  async upload(request: UploadRequest): Promise<UploadResult> {
    const body =
      typeof request.body === 'string' ? Buffer.from(request.body, 'utf-8') : request.body;

    if (body.byteLength > SIZE_LIMITS.uploadBytes) {
      throw new StorageConfigError(
        `Upload of ${request.key} is ${formatBytes(body.byteLength)}, over the ${formatBytes(SIZE_LIMITS.uploadBytes)} limit`
      );
    }

    const client = this.getClient();

    log.info(`Uploading s3://${request.bucket}/${request.key} (${formatBytes(body.byteLength)})`);

    const metadata: Record<string, string> = {
      'uploaded-by': UPLOADED_BY,
      'upload-timestamp': String(Math.floor(Date.now() / 1000)),
    };
    if (request.sourceFile) {
      metadata['source-file'] = request.sourceFile;
    }

    const output = await client.send(
      new PutObjectCommand({
        Bucket: request.bucket,
        Key: request.key,
        Body: body,
        ContentType: request.contentType,
        Metadata: metadata,
      })
    );

    log.info(`Uploaded s3://${request.bucket}/${request.key}`);

    return {
      bucket: request.bucket,
      key: request.key,
      bytes: body.byteLength,
      etag: output.ETag,
    };
  }

  /**
   * Upload a local file, recording its path in the object metadata
   */
  async uploadFile(
    filePath: string,
    request: Omit<UploadRequest, 'body' | 'sourceFile'>
  ): Promise<UploadResult> {
    const body = await readFile(filePath);
    return this.upload({ ...request, body, sourceFile: filePath });
  }

  /**
   * Release the underlying HTTP connections
   */
  close(): void {
    this.client?.destroy();
    this.client = null;
  }
}
