// Changelog entity - the persisted collection of entries

import type { ChangelogEntry } from "./entry.ts";

export const CHANGELOG_VERSION = 1;

/**
 * Immutable changelog document as stored on disk.
 * Entries are kept in insertion order.
 */
export type Changelog = {
  readonly version: number;
  readonly entries: readonly ChangelogEntry[];
};

/**
 * Record shape written by the predecessor tool: a bare JSON array
 * keyed by timestamp, without ids.
 */
export type LegacyEntry = {
  readonly timestamp: string;
  readonly operation: string;
  readonly text: string;
};
