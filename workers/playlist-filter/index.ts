#!/usr/bin/env node

/**
 * Playlist Filter Worker
 *
 * Filters the source playlist, reduces the EPG to the kept channels and
 * publishes both to object storage. Runs once, or on a fixed interval when
 * REFRESH_INTERVAL_MINUTES is set.
 *
 * Usage:
 *   npm start                 # one run with settings from .env
 *   DRY_RUN=true npm start    # write local artifacts only
 *
 * Environment variables: see .env.example
 */

import { config as loadEnv } from 'dotenv';

// Load environment variables
loadEnv();

import { createLogger } from '../../src/lib/logger';
import {
  ConfigValidationError,
  describeRetention,
  JOB_TIMEOUT_MS,
  loadWorkerConfig,
  LOG_SERVICE,
  SHUTDOWN_TIMEOUT_MS,
} from './config';
import { runFilterJob } from './run';
import type { JobResult, WorkerConfig } from './types';

const log = createLogger(LOG_SERVICE);

/**
 * Wrap a promise with a timeout
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, errorMessage: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new Error(errorMessage));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Worker state
 */
let isRunning = false;
let isShuttingDown = false;
let refreshTimer: NodeJS.Timeout | null = null;

/**
 * One refresh cycle; skipped while a previous one is still running
 */
async function runCycle(config: WorkerConfig): Promise<JobResult | null> {
  if (isShuttingDown) {
    log.info('Shutdown in progress, skipping run');
    return null;
  }

  if (isRunning) {
    log.warn('Previous run still in progress, skipping');
    return null;
  }

  isRunning = true;
  try {
    return await withTimeout(
      runFilterJob(config),
      JOB_TIMEOUT_MS,
      `Job timed out after ${JOB_TIMEOUT_MS / 1000 / 60} minutes`
    );
  } catch (error) {
    log.error('Run failed', error);
    return null;
  } finally {
    isRunning = false;
  }
}

/**
 * Schedule the next refresh
 */
function scheduleRefresh(config: WorkerConfig, intervalMs: number): void {
  if (refreshTimer) {
    clearTimeout(refreshTimer);
  }

  refreshTimer = setTimeout(() => {
    void runCycle(config).then(() => {
      if (!isShuttingDown) scheduleRefresh(config, intervalMs);
    });
  }, intervalMs);

  log.info(`Next run scheduled at: ${new Date(Date.now() + intervalMs).toISOString()}`);
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  log.info(`Received ${signal}, shutting down gracefully...`);
  isShuttingDown = true;

  // Clear scheduled refresh
  if (refreshTimer) {
    clearTimeout(refreshTimer);
    refreshTimer = null;
  }

  // Wait for current run to complete
  const startWait = Date.now();
  while (isRunning && Date.now() - startWait < SHUTDOWN_TIMEOUT_MS) {
    await new Promise((resolve) => setTimeout(resolve, 500));
  }

  log.info('Shutdown complete');
  process.exit(0);
}

/**
 * Main entry point. Resolves to the process exit code.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: WorkerConfig;
  try {
    config = loadWorkerConfig(env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      for (const message of error.errors) {
        log.error(`Configuration error: ${message}`);
      }
      return 1;
    }
    throw error;
  }

  log.info('Starting playlist filter worker', {
    dryRun: config.dryRun,
    epgEnabled: Boolean(config.epgSourceUrl),
    retention: describeRetention(config),
  });

  if (config.refreshIntervalMs === null) {
    const result = await runCycle(config);
    return result?.success ? 0 : 1;
  }

  const intervalMs = config.refreshIntervalMs;
  log.info(`Refresh interval: ${intervalMs / 1000 / 60} minutes`);

  // Register shutdown handlers
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  await runCycle(config);
  scheduleRefresh(config, intervalMs);

  log.info('Worker is running. Press Ctrl+C to stop.');
  return 0;
}

// Start the worker
if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error('Fatal error', error);
      process.exitCode = 1;
    });
}
