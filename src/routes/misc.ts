/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { Logger } from 'winston';

import {
  contentTypes,
  RESPONSE_MAX_AGE_SECONDS,
  USER_AGENT,
} from '../constants.js';
import { errorMessage } from '../lib/error.js';

// path segments are passed upstream verbatim, so keep them to plain names
const SEGMENT_REGEX = /^[a-z0-9][a-z0-9._-]*$/i;

/**
 * Proxies hand-maintained lists stored beside the generated ones. A request
 * for /misc/:category/:name fetches `<miscBaseUrl>/<category>/<name>.list`.
 */
export function createMiscRouter({
  log,
  miscBaseUrl,
  requestTimeoutMs = 30000,
}: {
  log: Logger;
  miscBaseUrl: string;
  requestTimeoutMs?: number;
}): Router {
  const miscLog = log.child({ router: 'misc' });
  const base = miscBaseUrl.replace(/\/+$/, '');
  const http: AxiosInstance = axios.create({
    timeout: requestTimeoutMs,
    headers: { 'User-Agent': USER_AGENT },
  });
  const miscRouter = Router();

  miscRouter.get(
    '/misc/:category/:name',
    asyncHandler(async (req: Request, res: Response) => {
      const category = req.params.category.trim();
      const name = req.params.name.trim();
      if (!SEGMENT_REGEX.test(category) || !SEGMENT_REGEX.test(name)) {
        res.status(400).type('text').send('Invalid list path');
        return;
      }

      const url = `${base}/${category}/${name}.list`;
      let response: AxiosResponse<string>;
      try {
        response = await http.get<string>(url, {
          responseType: 'text',
          validateStatus: () => true,
        });
      } catch (error) {
        miscLog.warn('Failed to fetch misc list', {
          url,
          error: errorMessage(error),
        });
        res.status(502).type('text').send('Failed to fetch upstream list');
        return;
      }

      if (response.status === 404) {
        res
          .status(404)
          .type('text')
          .send(`List not found: ${category}/${name}`);
        return;
      }
      if (response.status !== 200) {
        miscLog.warn('Unexpected misc list status', {
          url,
          status: response.status,
        });
        res.status(502).type('text').send('Failed to fetch upstream list');
        return;
      }

      res.header('Content-Type', contentTypes.text);
      res.header(
        'Cache-Control',
        `public, max-age=${RESPONSE_MAX_AGE_SECONDS}`,
      );
      res.send(response.data);
    }),
  );

  return miscRouter;
}
