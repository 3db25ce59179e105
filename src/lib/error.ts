/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * The upstream could not be reached or answered with an unexpected status.
 * Callers may fall back to a stale archive when one is cached.
 */
export class TransportError extends DetailedError {}

/** Archive bytes or member content that cannot be decoded. */
export class FormatError extends DetailedError {}

/** A list member that does not exist in the archive. */
export class NotFoundError extends DetailedError {
  readonly member: string;

  constructor(member: string, options?: DetailedErrorOptions) {
    super(`List not found: ${member}`, options);
    this.member = member;
  }
}

export class CyclicIncludeError extends DetailedError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super(`Cyclic include: ${chain.join(' -> ')}`);
    this.chain = chain;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
