/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Upstream archive metrics
//

export const archiveProbesCounter = new promClient.Counter({
  name: 'archive_probes_total',
  help: 'Count of upstream archive freshness probes',
  labelNames: ['result'],
});

export const archiveDownloadsCounter = new promClient.Counter({
  name: 'archive_downloads_total',
  help: 'Count of full upstream archive downloads',
  labelNames: ['result'],
});

export const staleArchiveServedCounter = new promClient.Counter({
  name: 'archive_stale_served_total',
  help: 'Count of stale archives served because the freshness probe failed',
});

export const archivePersistErrorsCounter = new promClient.Counter({
  name: 'archive_persist_errors_total',
  help: 'Count of failed archive snapshot writes',
});

export const archiveSizeGauge = new promClient.Gauge({
  name: 'archive_size_bytes',
  help: 'Size of the cached upstream archive',
});

//
// Ruleset metrics
//

export const resultCacheHitsCounter = new promClient.Counter({
  name: 'result_cache_hits_total',
  help: 'Count of rendered rulesets served from cache',
  labelNames: ['dialect'],
});

export const resultCacheMissesCounter = new promClient.Counter({
  name: 'result_cache_misses_total',
  help: 'Count of rendered rulesets that had to be computed',
  labelNames: ['dialect'],
});

export const resultCacheSweptCounter = new promClient.Counter({
  name: 'result_cache_swept_total',
  help: 'Count of expired result cache entries removed by the sweeper',
});

export const rulesetRenderErrorsCounter = new promClient.Counter({
  name: 'ruleset_render_errors_total',
  help: 'Count of failed ruleset renders',
  labelNames: ['error'],
});

export const regexRefusalsCounter = new promClient.Counter({
  name: 'regex_refusals_total',
  help: 'Count of regex rules emitted commented out instead of translated',
  labelNames: ['reason'],
});
