/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import YAML from 'yaml';

import * as metrics from '../metrics.js';
import { Dialect } from '../types.js';
import { isDangerousRegex, regexToWildcard } from './wildcard.js';
import { Item, Rule, RuleKind } from './types.js';

const LINE_RULE_TYPES: Record<Exclude<RuleKind, 'domain-regex'>, string> = {
  'domain-suffix': 'DOMAIN-SUFFIX',
  domain: 'DOMAIN',
  'domain-keyword': 'DOMAIN-KEYWORD',
};

const EGERN_SETS: ReadonlyArray<readonly [RuleKind, string]> = [
  ['domain', 'domain_set'],
  ['domain-suffix', 'domain_suffix_set'],
  ['domain-keyword', 'domain_keyword_set'],
  ['domain-regex', 'domain_regex_set'],
];

// wildcards without any literal text
const WILDCARD_ONLY = /^[?*]*$/;

export function appendComment(line: string, comment: string): string {
  if (comment === '') {
    return line;
  }
  return comment.startsWith('#')
    ? `${line} ${comment}`
    : `${line} # ${comment}`;
}

function renderSurgeRule(rule: Rule): string {
  if (rule.kind !== 'domain-regex') {
    return appendComment(
      `${LINE_RULE_TYPES[rule.kind]},${rule.value}`,
      rule.comment,
    );
  }

  if (isDangerousRegex(rule.value)) {
    metrics.regexRefusalsCounter.inc({ reason: 'dangerous' });
    return appendComment(`# DANGEROUS-REGEX,${rule.value}`, rule.comment);
  }

  const wildcard = regexToWildcard(rule.value);
  if (WILDCARD_ONLY.test(wildcard)) {
    metrics.regexRefusalsCounter.inc({ reason: 'wildcard-only' });
    return appendComment(
      `# SKIPPED-DOMAIN-WILDCARD,${wildcard}`,
      rule.comment,
    );
  }
  return appendComment(`DOMAIN-WILDCARD,${wildcard}`, rule.comment);
}

function renderMihomoRule(rule: Rule): string {
  const type =
    rule.kind === 'domain-regex' ? 'DOMAIN-REGEX' : LINE_RULE_TYPES[rule.kind];
  return appendComment(`${type},${rule.value}`, rule.comment);
}

/**
 * Shared traversal of the line dialects. Comments are held back until the
 * next emitted rule: include echoes queue up, other comments keep only the
 * latest, and a rule rendered commented out takes the latter's place.
 */
function renderLines(
  items: Item[],
  renderRule: (rule: Rule) => string,
): string {
  const lines: string[] = [];
  const pendingIncludeComments: string[] = [];
  let pendingComment = '';

  for (const item of items) {
    if (item.kind === 'comment') {
      if (item.comment.trim().startsWith('# include:')) {
        pendingIncludeComments.push(item.comment);
      } else {
        pendingComment = item.comment;
      }
      continue;
    }

    const line = renderRule(item.rule);
    if (line.trim().startsWith('#')) {
      pendingComment = line;
      continue;
    }

    lines.push(...pendingIncludeComments);
    pendingIncludeComments.length = 0;
    if (pendingComment !== '') {
      lines.push(pendingComment);
      pendingComment = '';
    }
    lines.push(line);
  }

  return lines.join('\n');
}

export function renderSurge(items: Item[]): string {
  return renderLines(items, renderSurgeRule);
}

/** Mihomo matches DOMAIN-REGEX natively, so regexes pass through. */
export function renderMihomo(items: Item[]): string {
  return renderLines(items, renderMihomoRule);
}

export function renderEgern(items: Item[]): string {
  const sets = new Map<RuleKind, string[]>();
  for (const item of items) {
    if (item.kind !== 'rule') {
      continue;
    }
    const values = sets.get(item.rule.kind) ?? [];
    values.push(item.rule.value);
    sets.set(item.rule.kind, values);
  }

  const doc: Record<string, string[]> = {};
  for (const [kind, setName] of EGERN_SETS) {
    const values = sets.get(kind);
    if (values !== undefined && values.length > 0) {
      doc[setName] = values;
    }
  }
  if (Object.keys(doc).length === 0) {
    return '';
  }

  return YAML.stringify(doc, {
    defaultStringType: 'QUOTE_DOUBLE',
    defaultKeyType: 'PLAIN',
    lineWidth: 0,
  }).trimEnd();
}

export function render(items: Item[], dialect: Dialect): string {
  switch (dialect) {
    case 'surge':
      return renderSurge(items);
    case 'mihomo':
      return renderMihomo(items);
    case 'egern':
      return renderEgern(items);
  }
}
