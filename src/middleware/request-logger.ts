/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { NextFunction, Request, Response } from 'express';
import { Logger } from 'winston';

export function createRequestLoggerMiddleware({ log }: { log: Logger }) {
  const requestLog = log.child({ middleware: 'request-logger' });
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      requestLog.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
    next();
  };
}
