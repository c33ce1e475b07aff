/**
 * Local artifact output
 */

import { mkdir, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { promisify } from 'util';
import { gzip } from 'zlib';
import { createLogger } from '../../src/lib/logger';
import { formatBytes } from '../../src/lib/utils';
import { LOG_SERVICE } from './config';
import type { ArtifactInfo } from './types';

const log = createLogger(LOG_SERVICE).child({ component: 'output' });

const gzipAsync = promisify(gzip);

async function saveFile(dir: string, name: string, data: string | Uint8Array): Promise<ArtifactInfo> {
  const path = join(dir, name);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data, typeof data === 'string' ? 'utf-8' : undefined);

  const { size } = await stat(path);
  log.info(`Saved ${path} (${formatBytes(size)})`);

  return { path, bytes: size };
}

/**
 * Write UTF-8 content under `dir`, gzip-compressed when the name ends in .gz
 */
export async function writeArtifact(dir: string, name: string, content: string): Promise<ArtifactInfo> {
  const data = name.endsWith('.gz') ? await gzipAsync(Buffer.from(content, 'utf-8')) : content;
  return saveFile(dir, name, data);
}

/**
 * Write bytes under `dir` exactly as given
 */
export async function writeRawArtifact(dir: string, name: string, data: Uint8Array): Promise<ArtifactInfo> {
  return saveFile(dir, name, data);
}
