/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function intOrDefault(
  envVarName: string,
  defaultValue: number,
): number {
  const value = +varOrDefault(envVarName, `${defaultValue}`);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `${envVarName} must be a non-negative integer, got: ${process.env[envVarName]}`,
    );
  }
  return value;
}
