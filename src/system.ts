/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import EventEmitter from 'node:events';

import { ResultCache } from './cache/result-cache.js';
import { SourceCache } from './cache/source-cache.js';
import * as config from './config.js';
import { ArchiveFetcher } from './data/archive-fetcher.js';
import { HttpArchiveTransport } from './data/http-archive-transport.js';
import * as events from './events.js';
import { errorMessage } from './lib/error.js';
import log from './log.js';
import { IndexService } from './rulesets/index-service.js';
import { RulesetService } from './rulesets/ruleset-service.js';
import { ArchiveRefreshWorker } from './workers/archive-refresh-worker.js';
import { ResultCacheSweeper } from './workers/result-cache-sweeper.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
});

export const eventEmitter = new EventEmitter();

export const sourceCache = new SourceCache({
  log,
  ttlMs: config.ARCHIVE_TTL_SECONDS * 1000,
  dataPrefix: config.ARCHIVE_DATA_PREFIX,
  persistPath: config.ARCHIVE_CACHE_PATH,
});

export const archiveTransport = new HttpArchiveTransport({
  log,
  archiveUrl: config.ARCHIVE_URL,
  requestTimeoutMs: config.ARCHIVE_REQUEST_TIMEOUT_MS,
});

export const archiveFetcher = new ArchiveFetcher({
  log,
  sourceCache,
  transport: archiveTransport,
});

export const resultCache = new ResultCache({
  log,
  ttlMs: config.RESULT_CACHE_TTL_SECONDS * 1000,
  maxEntries: config.RESULT_CACHE_MAX_ENTRIES,
});

export const rulesetService = new RulesetService({
  log,
  archiveSource: archiveFetcher,
  resultCache,
});

export const indexService = new IndexService({
  log,
  archiveSource: archiveFetcher,
  baseUrl: config.BASE_URL,
  indexPath: config.INDEX_PATH,
});

export const archiveRefreshWorker = new ArchiveRefreshWorker({
  log,
  archiveSource: archiveFetcher,
  eventEmitter,
  intervalMs: config.ARCHIVE_REFRESH_INTERVAL_SECONDS * 1000,
});

export const resultCacheSweeper = new ResultCacheSweeper({
  log,
  resultCache,
  intervalMs: config.RESULT_CACHE_SWEEP_INTERVAL_SECONDS * 1000,
});

eventEmitter.on(events.ARCHIVE_UPDATED, () => {
  indexService.refresh().catch((error: unknown) => {
    log.error('Failed to refresh list index', {
      error: errorMessage(error),
    });
  });
});

/**
 * Loads the persisted archive snapshot, if any, and writes the initial index.
 * Failures are logged; the first request fetches from upstream instead.
 */
export async function init(): Promise<void> {
  if (config.ARCHIVE_CACHE_PATH !== undefined) {
    try {
      const loaded = await sourceCache.loadFromFile(config.ARCHIVE_CACHE_PATH);
      log.info('Archive snapshot load finished', {
        path: config.ARCHIVE_CACHE_PATH,
        loaded,
      });
    } catch (error) {
      log.warn('Failed to load archive snapshot', {
        path: config.ARCHIVE_CACHE_PATH,
        error: errorMessage(error),
      });
    }
  }

  try {
    await indexService.refresh();
  } catch (error) {
    log.error('Failed to build initial list index', {
      error: errorMessage(error),
    });
  }
}

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info('Shutting down...');
  eventEmitter.removeAllListeners();
  archiveRefreshWorker.stop();
  resultCacheSweeper.stop();
  process.exit(exitCode);
};

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});
