/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.intOrDefault('PORT', 8080);

// Public base URL used when generating the list index (e.g.
// https://geosite.example.com). Startup index generation is skipped when unset.
export const BASE_URL = env
  .varOrUndefined('BASE_URL')
  ?.trim()
  .replace(/\/+$/, '');

// File the list index is written to and served from, when set
export const INDEX_PATH = env.varOrUndefined('INDEX_PATH')?.trim();

// Redirect target for GET /
export const REPO_URL = env.varOrDefault(
  'REPO_URL',
  'https://github.com/v2fly/domain-list-community',
);

// Base URL of hand-maintained `.list` files proxied under /misc (disabled
// when unset)
export const MISC_BASE_URL = env
  .varOrUndefined('MISC_BASE_URL')
  ?.replace(/\/+$/, '');

export const MISC_REQUEST_TIMEOUT_MS = env.intOrDefault(
  'MISC_REQUEST_TIMEOUT_MS',
  30 * 1000,
);

//
// Upstream archive
//

export const ARCHIVE_URL = env.varOrDefault(
  'ARCHIVE_URL',
  'https://github.com/v2fly/domain-list-community/archive/refs/heads/master.zip',
);

// Member files live under this directory inside the archive
export const ARCHIVE_DATA_PREFIX = env.varOrDefault(
  'ARCHIVE_DATA_PREFIX',
  'domain-list-community-master/data/',
);

export const ARCHIVE_TTL_SECONDS = env.intOrDefault(
  'ARCHIVE_TTL_SECONDS',
  60 * 30, // 30 minutes
);

// Archive snapshot persistence file (optional)
export const ARCHIVE_CACHE_PATH = env.varOrUndefined('ARCHIVE_CACHE_PATH');

// Background archive refresh, 0 disables
export const ARCHIVE_REFRESH_INTERVAL_SECONDS = env.intOrDefault(
  'ARCHIVE_REFRESH_INTERVAL_SECONDS',
  60 * 30,
);

export const ARCHIVE_REQUEST_TIMEOUT_MS = env.intOrDefault(
  'ARCHIVE_REQUEST_TIMEOUT_MS',
  60 * 1000,
);

//
// Result cache
//

export const RESULT_CACHE_TTL_SECONDS = env.intOrDefault(
  'RESULT_CACHE_TTL_SECONDS',
  60 * 60 * 24, // 24 hours
);

export const RESULT_CACHE_MAX_ENTRIES = env.intOrDefault(
  'RESULT_CACHE_MAX_ENTRIES',
  10000,
);

export const RESULT_CACHE_SWEEP_INTERVAL_SECONDS = env.intOrDefault(
  'RESULT_CACHE_SWEEP_INTERVAL_SECONDS',
  60 * 10,
);
