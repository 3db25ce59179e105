/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type RuleKind =
  | 'domain-suffix'
  | 'domain'
  | 'domain-keyword'
  | 'domain-regex';

export interface Rule {
  kind: RuleKind;
  value: string;
  /** Text after the value on the source line: `@attr` tags and comments. */
  comment: string;
}

export type Item =
  | { kind: 'rule'; rule: Rule }
  | { kind: 'comment'; comment: string };
