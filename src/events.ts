/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/** The cached upstream archive was replaced by a different version */
export const ARCHIVE_UPDATED = 'archive-updated';
