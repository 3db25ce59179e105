/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { ResultCache } from '../cache/result-cache.js';
import * as metrics from '../metrics.js';
import { RuleParser } from '../rules/parser.js';
import { render } from '../rules/render.js';
import { ArchiveSource, RulesetRequest } from '../types.js';

export function resultCacheKey({ name, filter, dialect }: RulesetRequest) {
  return filter === '' ? `${dialect}:${name}` : `${dialect}:${name}@${filter}`;
}

/**
 * Serves rendered rulesets for (name, filter, dialect). Results are cached
 * against the archive fingerprint they were computed from.
 */
export class RulesetService {
  private log: winston.Logger;
  private archiveSource: ArchiveSource;
  private resultCache: ResultCache;

  constructor({
    log,
    archiveSource,
    resultCache,
  }: {
    log: winston.Logger;
    archiveSource: ArchiveSource;
    resultCache: ResultCache;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.archiveSource = archiveSource;
    this.resultCache = resultCache;
  }

  async getRuleset(request: RulesetRequest): Promise<string> {
    const { archive, fingerprint } = await this.archiveSource.ensureFresh();
    const key = resultCacheKey(request);

    try {
      const { text, cached } = await this.resultCache.getOrCompute(
        key,
        fingerprint,
        async () => {
          const start = Date.now();
          const parser = new RuleParser({ content: archive });
          const items = await parser.parseMember(request.name, request.filter);
          const output = render(items, request.dialect);
          this.log.info('Generated ruleset', {
            key,
            fingerprint,
            items: items.length,
            durationMs: Date.now() - start,
          });
          return output;
        },
      );

      if (cached) {
        metrics.resultCacheHitsCounter.inc({ dialect: request.dialect });
        this.log.debug('Ruleset cache hit', { key, fingerprint });
      } else {
        metrics.resultCacheMissesCounter.inc({ dialect: request.dialect });
      }
      return text;
    } catch (error) {
      metrics.rulesetRenderErrorsCounter.inc({
        error: error instanceof Error ? error.name : 'Unknown',
      });
      throw error;
    }
  }
}
