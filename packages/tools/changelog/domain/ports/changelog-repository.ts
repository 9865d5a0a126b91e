// Changelog repository port - persistence interface for changelog entries

import type { ChangelogEntry } from "../entities/entry.ts";

/**
 * Repository owning the ordered collection of changelog entries.
 * Every mutation is written through immediately.
 */
export interface ChangelogRepository {
  /** Load all entries in insertion order. Empty when nothing is stored yet. */
  load(): Promise<readonly ChangelogEntry[]>;

  /** Replace the stored collection. */
  save(entries: readonly ChangelogEntry[]): Promise<void>;

  /** Check if the changelog file exists. */
  exists(): Promise<boolean>;

  /** Get the filesystem path of the changelog file. */
  getChangelogPath(): string;
}
