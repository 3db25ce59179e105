/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express from 'express';

import * as config from './config.js';
import log from './log.js';
import { createRequestLoggerMiddleware } from './middleware/request-logger.js';
import { createGeositeRouter } from './routes/geosite.js';
import { createMiscRouter } from './routes/misc.js';
import { createStatusRouter } from './routes/status.js';
import * as system from './system.js';

await system.init();

system.archiveRefreshWorker.start();
system.resultCacheSweeper.start();

// HTTP server
const app = express();

app.use(cors());
app.use(createRequestLoggerMiddleware({ log }));

app.use(createStatusRouter({ archiveSource: system.archiveFetcher }));
app.use(
  createGeositeRouter({
    log,
    rulesetService: system.rulesetService,
    indexService: system.indexService,
    repoUrl: config.REPO_URL,
  }),
);

if (config.MISC_BASE_URL !== undefined) {
  app.use(
    createMiscRouter({
      log,
      miscBaseUrl: config.MISC_BASE_URL,
      requestTimeoutMs: config.MISC_REQUEST_TIMEOUT_MS,
    }),
  );
} else {
  log.info('[app] misc list proxy disabled');
}

export const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});
