/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { AST, RegExpParser } from '@eslint-community/regexpp';

// no Annex B: escapes like `\z` or `\pL` are errors instead of literals
const parser = new RegExpParser({ strict: true });

function stripSlashes(regex: string): string {
  let source = regex;
  if (source.startsWith('/')) {
    source = source.slice(1);
  }
  if (source.endsWith('/')) {
    source = source.slice(0, -1);
  }
  return source;
}

/** Parses a regex, optionally wrapped in slashes. Undefined when invalid. */
export function parseRegex(regex: string): AST.Pattern | undefined {
  try {
    return parser.parsePattern(stripSlashes(regex));
  } catch {
    return undefined;
  }
}

// `*`, `+` and `?` (lazy or not); every `{...}` form counts as bounded
function isUnboundedOrOptional(node: AST.Quantifier): boolean {
  const operator = node.raw.slice(node.element.raw.length);
  return /^[*+?]\??$/.test(operator);
}

/**
 * Rewrites a regex syntax tree into a wildcard: literals stay, single
 * character matchers become `?`, repetition and alternation become `*`,
 * anchors vanish. Node types without a rule become `?`.
 */
export function toWildcard(node: AST.Node): string {
  switch (node.type) {
    case 'Pattern':
    case 'Group':
    case 'CapturingGroup':
      return node.alternatives.length > 1
        ? '*'
        : node.alternatives.map(toWildcard).join('');
    case 'Alternative':
      return node.elements.map(toWildcard).join('');
    case 'Character':
      return String.fromCodePoint(node.value);
    case 'CharacterClass':
    case 'CharacterSet':
      return '?';
    case 'Quantifier':
      return '*';
    case 'Assertion':
      switch (node.kind) {
        case 'start':
        case 'end':
        case 'word':
          return '';
        default:
          return '?';
      }
    default:
      return '?';
  }
}

/**
 * Whether the tree holds a construct whose wildcard rewrite loses precision:
 * character classes, alternation, bounded repeats, lookarounds and
 * backreferences, at any depth.
 */
export function containsLossyNode(node: AST.Node): boolean {
  switch (node.type) {
    case 'Pattern':
    case 'Group':
    case 'CapturingGroup':
      return (
        node.alternatives.length > 1 ||
        node.alternatives.some(containsLossyNode)
      );
    case 'Alternative':
      return node.elements.some(containsLossyNode);
    case 'CharacterClass':
      return true;
    case 'CharacterSet':
      return node.kind !== 'any';
    case 'Quantifier':
      return !isUnboundedOrOptional(node) || containsLossyNode(node.element);
    case 'Assertion':
      return node.kind === 'lookahead' || node.kind === 'lookbehind';
    case 'Backreference':
      return true;
    default:
      return false;
  }
}

/**
 * Whether a translated wildcard matches too much: nothing but wildcards and
 * dots, or three or more single-character wildcards.
 */
export function isBroadPattern(pattern: string): boolean {
  if (pattern === '') {
    return false;
  }
  if (/^[*?.]+$/.test(pattern)) {
    return true;
  }
  return pattern.split('?').length - 1 >= 3;
}

export function regexToWildcard(regex: string): string {
  const pattern = parseRegex(regex);
  return pattern === undefined ? '' : toWildcard(pattern);
}

/**
 * Whether publishing the wildcard translation of `regex` would be unsafe.
 * The tree and the translated output are both checked; either failing makes
 * the regex dangerous.
 */
export function isDangerousRegex(regex: string): boolean {
  const pattern = parseRegex(regex);
  if (pattern === undefined) {
    return true;
  }
  if (containsLossyNode(pattern)) {
    return true;
  }
  return isBroadPattern(toWildcard(pattern));
}
