/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { Logger } from 'winston';

import { contentTypes, RESPONSE_MAX_AGE_SECONDS } from '../constants.js';
import {
  CyclicIncludeError,
  errorMessage,
  FormatError,
  NotFoundError,
  TransportError,
} from '../lib/error.js';
import { IndexService } from '../rulesets/index-service.js';
import { RulesetService } from '../rulesets/ruleset-service.js';
import { Dialect } from '../types.js';

const CACHE_CONTROL = `public, max-age=${RESPONSE_MAX_AGE_SECONDS}`;

export interface GeositeRouterConfig {
  log: Logger;
  rulesetService: RulesetService;
  indexService: IndexService;
  repoUrl: string;
}

/**
 * Splits a `name@filter` path segment. The segment is trimmed and
 * lower-cased; everything after the first `@` is the filter.
 */
export function parseNameWithFilter(segment: string): {
  name: string;
  filter: string;
} {
  const normalized = segment.trim().toLowerCase();
  const at = normalized.indexOf('@');
  return at === -1
    ? { name: normalized, filter: '' }
    : { name: normalized.slice(0, at), filter: normalized.slice(at + 1) };
}

/** Base URL of the geosite routes as seen by the client. */
export function requestBaseUrl(req: Request): string {
  const host = req.get('x-forwarded-host') ?? req.get('host') ?? 'localhost';
  const proto = req.get('x-forwarded-proto') ?? req.protocol;
  return `${proto}://${host}`;
}

function errorStatus(error: unknown): number {
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof TransportError) {
    return 502;
  }
  return 500;
}

export function createGeositeRouter({
  log,
  rulesetService,
  indexService,
  repoUrl,
}: GeositeRouterConfig): Router {
  const geositeRouter = Router();

  geositeRouter.get('/', (_req: Request, res: Response) => {
    res.redirect(302, repoUrl);
  });

  const indexHandler = asyncHandler(async (req: Request, res: Response) => {
    try {
      const body = await indexService.getIndex(requestBaseUrl(req));
      res.header('Content-Type', contentTypes.json);
      res.header('Cache-Control', CACHE_CONTROL);
      res.send(body);
    } catch (error) {
      log.error('Failed to generate index', { error: errorMessage(error) });
      res
        .status(errorStatus(error))
        .type('text')
        .send(`Failed to generate index: ${errorMessage(error)}`);
    }
  });

  const rulesetHandler = (dialect: Dialect) =>
    asyncHandler(async (req: Request, res: Response) => {
      const { name, filter } = parseNameWithFilter(req.params.name);
      if (name === '') {
        res.status(400).type('text').send('Invalid name parameter');
        return;
      }

      try {
        const body = await rulesetService.getRuleset({
          name,
          filter,
          dialect,
        });
        res.header(
          'Content-Type',
          dialect === 'egern' ? contentTypes.yaml : contentTypes.text,
        );
        res.header('Cache-Control', CACHE_CONTROL);
        res.send(body);
      } catch (error) {
        const status = errorStatus(error);
        const meta = { name, filter, dialect, error: errorMessage(error) };
        if (status === 404) {
          log.info('Ruleset not found', meta);
        } else if (
          error instanceof FormatError ||
          error instanceof CyclicIncludeError
        ) {
          log.error('Failed to convert ruleset', meta);
        } else {
          log.error('Failed to fetch upstream', meta);
        }
        res
          .status(status)
          .type('text')
          .send(`Failed to generate ruleset: ${errorMessage(error)}`);
      }
    });

  // index routes first so they are not taken for list names
  geositeRouter.get('/geosite', indexHandler);
  geositeRouter.get('/geosite/surge', indexHandler);
  geositeRouter.get('/geosite/mihomo', indexHandler);
  geositeRouter.get('/geosite/egern', indexHandler);

  geositeRouter.get('/geosite/surge/:name', rulesetHandler('surge'));
  geositeRouter.get('/geosite/mihomo/:name', rulesetHandler('mihomo'));
  geositeRouter.get('/geosite/egern/:name', rulesetHandler('egern'));
  geositeRouter.get('/geosite/:name', rulesetHandler('surge'));

  return geositeRouter;
}
