/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  CyclicIncludeError,
  FormatError,
  NotFoundError,
} from '../lib/error.js';
import { ContentAccessor } from '../types.js';
import { Item, Rule, RuleKind } from './types.js';

const INCLUDE_PREFIX = 'include:';

const RULE_PREFIXES: ReadonlyArray<readonly [string, RuleKind]> = [
  ['domain:', 'domain-suffix'],
  ['full:', 'domain'],
  ['keyword:', 'domain-keyword'],
  ['regexp:', 'domain-regex'],
];

// lines without a type prefix are bare domains
const BARE_DOMAIN: readonly [string, RuleKind] = ['', 'domain-suffix'];

/**
 * Whether the trailing text of a rule line selects it for `filter`. With a
 * filter the text must start with an attribute and carry `@filter` before any
 * `#` comment.
 */
export function matchesFilter(rest: string, filter: string): boolean {
  if (filter === '') {
    return true;
  }

  const trimmed = rest.trim();
  if (!trimmed.startsWith('@')) {
    return false;
  }

  const filterIndex = trimmed.indexOf(`@${filter}`);
  const commentIndex = trimmed.indexOf('#');
  return (
    filterIndex !== -1 && (commentIndex === -1 || filterIndex < commentIndex)
  );
}

function splitFirstToken(line: string): [string, string] {
  const space = line.indexOf(' ');
  return space === -1
    ? [line, '']
    : [line.slice(0, space), line.slice(space + 1)];
}

function parseRuleLine(
  line: string,
  prefix: string,
  kind: RuleKind,
  filter: string,
): Rule | undefined {
  const [token, rest] = splitFirstToken(line);
  const value = token.slice(prefix.length);
  if (value === '' || !matchesFilter(rest, filter)) {
    return undefined;
  }
  return { kind, value, comment: rest };
}

function hasRules(items: Item[]): boolean {
  return items.some((item) => item.kind === 'rule');
}

/**
 * Parses domain-list-community list files. `include:` lines are expanded in
 * place by reading the named member through the content accessor.
 */
export class RuleParser {
  private content: ContentAccessor;

  constructor({ content }: { content: ContentAccessor }) {
    this.content = content;
  }

  /** Reads and parses the named member. */
  async parseMember(name: string, filter = ''): Promise<Item[]> {
    const text = await this.content.readMember(name);
    return this.parseLines(text, filter, [name]);
  }

  async parse(text: string, filter = ''): Promise<Item[]> {
    return this.parseLines(text, filter, []);
  }

  private async parseLines(
    text: string,
    filter: string,
    chain: string[],
  ): Promise<Item[]> {
    const items: Item[] = [];

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      if (line === '') {
        continue;
      }

      if (line.startsWith('#')) {
        items.push({ kind: 'comment', comment: line });
        continue;
      }

      if (line.startsWith(INCLUDE_PREFIX)) {
        items.push(...(await this.parseInclude(line, filter, chain)));
        continue;
      }

      const [prefix, kind] =
        RULE_PREFIXES.find(([p]) => line.startsWith(p)) ?? BARE_DOMAIN;
      const rule = parseRuleLine(line, prefix, kind, filter);
      if (rule !== undefined) {
        items.push({ kind: 'rule', rule });
      }
    }

    return items;
  }

  private async parseInclude(
    line: string,
    filter: string,
    chain: string[],
  ): Promise<Item[]> {
    const [token] = splitFirstToken(line);
    const name = token.slice(INCLUDE_PREFIX.length);
    if (name === '') {
      return [];
    }
    if (chain.includes(name)) {
      throw new CyclicIncludeError([...chain, name]);
    }

    const text = await this.readIncluded(name, chain);
    const subItems = await this.parseLines(text, filter, [...chain, name]);
    if (!hasRules(subItems)) {
      return [];
    }

    return [{ kind: 'comment', comment: `# ${line}` }, ...subItems];
  }

  // a dangling include is a defect of the including list, not a missing list
  private async readIncluded(name: string, chain: string[]) {
    try {
      return await this.content.readMember(name);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new FormatError(`Included list not found: ${name}`, {
          cause: error,
          member: name,
          includedFrom: chain[chain.length - 1],
        });
      }
      throw error;
    }
  }
}
