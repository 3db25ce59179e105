/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import * as promClient from 'prom-client';

import { ArchiveSource } from '../types.js';

export function createStatusRouter({
  archiveSource,
  metricsPath = '/metrics',
}: {
  archiveSource: ArchiveSource;
  metricsPath?: string;
}): Router {
  const statusRouter = Router();

  statusRouter.get('/healthcheck', (_req: Request, res: Response) => {
    const fingerprint = archiveSource.getFingerprint();
    res.status(200).json({
      status: 'ok',
      uptime: process.uptime(),
      date: new Date(),
      ...(fingerprint !== undefined && { archiveFingerprint: fingerprint }),
    });
  });

  statusRouter.get(
    metricsPath,
    asyncHandler(async (_req: Request, res: Response) => {
      res.header('Content-Type', promClient.register.contentType);
      res.send(await promClient.register.metrics());
    }),
  );

  return statusRouter;
}
