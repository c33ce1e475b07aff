/**
 * Source Fetcher for the Playlist Filter Worker
 *
 * Downloads the playlist and EPG with retries and a byte ceiling, and
 * transparently unpacks gzip and zip payloads.
 */

import { createGunzip } from 'zlib';
import { Readable } from 'stream';
import { Agent, fetch as undiciFetch, type Response as UndiciResponse } from 'undici';
import { unzipSync } from 'fflate';
import { createLogger } from '../../src/lib/logger';
import { formatBytes } from '../../src/lib/utils';
import { FETCH_CONFIG, LOG_SERVICE } from './config';
import type { DownloadOptions, DownloadResult } from './types';

const log = createLogger(LOG_SERVICE).child({ component: 'fetcher' });

/**
 * Raised when a body grows past its byte ceiling
 */
export class SizeLimitExceededError extends Error {
  constructor(
    public readonly label: string,
    public readonly limitBytes: number
  ) {
    super(`${label} exceeds maximum allowed size of ${limitBytes} bytes`);
    this.name = 'SizeLimitExceededError';
  }
}

/**
 * Raised for HTTP failures and unusable payloads
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * HTTP agent with connection timeouts
 */
const agent = new Agent({
  connect: { timeout: FETCH_CONFIG.timeout },
  headersTimeout: FETCH_CONFIG.timeout,
  bodyTimeout: FETCH_CONFIG.timeout,
});

const GZIP_MAGIC = [0x1f, 0x8b];
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];
/** End-of-central-directory record that opens an archive with no entries */
const EMPTY_ZIP_MAGIC = [0x50, 0x4b, 0x05, 0x06];

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function startsWith(data: Uint8Array, magic: number[]): boolean {
  return data.length >= magic.length && magic.every((byte, i) => data[i] === byte);
}

/**
 * Fetch with retry logic and exponential backoff
 */
async function fetchWithRetry(
  url: string,
  label: string,
  retryBaseDelay: number
): Promise<UndiciResponse> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < FETCH_CONFIG.maxRetries; attempt++) {
    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), FETCH_CONFIG.timeout);

      try {
        const response = await undiciFetch(url, {
          signal: controller.signal,
          headers: {
            'User-Agent': FETCH_CONFIG.userAgent,
            Accept: '*/*',
          },
          dispatcher: agent,
        });

        if (!response.ok) {
          throw new DownloadError(`HTTP ${response.status}: ${response.statusText}`, response.status);
        }

        return response;
      } finally {
        clearTimeout(timeoutId);
      }
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < FETCH_CONFIG.maxRetries - 1) {
        const delay = retryBaseDelay * Math.pow(2, attempt);
        log.warn(`${label} fetch attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new DownloadError(`${label} fetch failed after retries`);
}

/**
 * Read a response body, failing as soon as it passes `maxBytes`
 */
async function readBodyWithLimit(
  response: UndiciResponse,
  { maxBytes, label }: DownloadOptions
): Promise<Buffer> {
  if (!response.body) {
    throw new DownloadError(`${label} response has no body`);
  }

  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw new SizeLimitExceededError(label, maxBytes);
  }

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      const chunk = Buffer.from(value);
      total += chunk.length;
      if (total > maxBytes) {
        await reader.cancel();
        throw new SizeLimitExceededError(label, maxBytes);
      }
      chunks.push(chunk);
    }
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks, total);
}

/**
 * Gunzip a buffer through a zlib stream
 */
export async function gunzipBuffer(data: Buffer): Promise<Buffer> {
  const chunks: Buffer[] = [];
  const gunzip = Readable.from([data]).pipe(createGunzip());
  for await (const chunk of gunzip) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * First file of a zip archive
 */
export function extractFirstZipEntry(data: Uint8Array, label = 'archive'): Uint8Array {
  const files = unzipSync(data);
  const name = Object.keys(files).find((entry) => !entry.endsWith('/'));
  if (name === undefined) {
    throw new DownloadError(`${label} ZIP archive is empty`);
  }
  return files[name];
}

/**
 * Unpack by magic bytes. A ".gz" URL alone says nothing: undici has already
 * undone any Content-Encoding, so the body may be plain text.
 */
export async function decodePayload(
  data: Buffer,
  label: string
): Promise<Pick<DownloadResult, 'text' | 'compression'>> {
  let compression: DownloadResult['compression'] = 'none';
  let raw: Uint8Array = data;

  if (startsWith(data, GZIP_MAGIC)) {
    compression = 'gzip';
    raw = await gunzipBuffer(data);
  } else if (startsWith(data, ZIP_MAGIC) || startsWith(data, EMPTY_ZIP_MAGIC)) {
    compression = 'zip';
    raw = extractFirstZipEntry(data, label);
  }

  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(raw), compression };
  } catch {
    throw new DownloadError(`${label} is not valid UTF-8`);
  }
}

/**
 * Download a text resource with a byte ceiling and transparent decompression
 *
 * @throws SizeLimitExceededError when the body passes `maxBytes`
 * @throws DownloadError on HTTP failure or an unusable payload
 */
export async function downloadText(
  url: string,
  options: DownloadOptions,
  retryBaseDelay: number = FETCH_CONFIG.retryBaseDelay
): Promise<DownloadResult> {
  const startTime = Date.now();
  log.info(`Downloading ${options.label} from ${url}`);

  const response = await fetchWithRetry(url, options.label, retryBaseDelay);
  const data = await readBodyWithLimit(response, options);
  const { text, compression } = await decodePayload(data, options.label);

  log.info(
    `Downloaded ${options.label}: ${formatBytes(data.length)}` +
      (compression === 'none' ? '' : ` (${compression}, ${formatBytes(Buffer.byteLength(text))} unpacked)`),
    { durationMs: Date.now() - startTime }
  );

  return { text, raw: data, bytes: data.length, compression };
}
