/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export const USER_AGENT = 'geosite-ruleset-server/1.0';

// Cache-Control max-age for rulesets and the list index
export const RESPONSE_MAX_AGE_SECONDS = 1800;

export const contentTypes = {
  text: 'text/plain; charset=utf-8',
  yaml: 'text/yaml; charset=utf-8',
  json: 'application/json',
};
