// Entry entity - a single changelog note

import type { ChangeType } from "./change-type.ts";

/**
 * Immutable changelog entry.
 * `timestamp` is the creation time, refreshed on every edit.
 * A `Deleted` change type only tags the entry; it stays stored.
 */
export type ChangelogEntry = {
  readonly id: string;
  readonly changeType: ChangeType;
  readonly description: string;
  readonly timestamp: string; // ISO 8601 with offset: "2025-01-15T10:00:00+01:00"
};

/** Fields an edit is allowed to change. */
export type EntryChanges = {
  readonly changeType?: ChangeType;
  readonly description?: string;
};
