/**
 * Adapter: JsonChangelogRepository
 *
 * Implements the ChangelogRepository port using JSON file storage.
 * Reads/writes a single file holding `{ version, entries }`.
 *
 * Files written by the predecessor tool (a bare array of
 * `{ timestamp, operation, text }` records) are migrated on load:
 *   - "operation" becomes "changeType", "text" becomes "description"
 *   - every record gets a fresh id, file order is kept
 *   - timestamps without an offset get the local one
 *   - the migrated document is written back at the current version
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 */

import {
  CHANGELOG_VERSION,
  type Changelog,
  type LegacyEntry,
} from "../../domain/entities/changelog.ts";
import { parseChangeType } from "../../domain/entities/change-type.ts";
import type { ChangelogEntry } from "../../domain/entities/entry.ts";
import {
  generateEntryId,
  normalizeTimestamp,
} from "../../domain/entities/entry-helpers.ts";
import { StorageError } from "../../domain/entities/errors.ts";
import {
  ChangelogSchema,
  describeIssues,
  LegacyChangelogSchema,
} from "../../domain/entities/schemas.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { ChangelogRepository } from "../../domain/ports/changelog-repository.ts";

export interface JsonChangelogRepositoryOptions {
  readonly generateId?: () => string;
  readonly log?: (message: string) => void;
}

export class JsonChangelogRepository implements ChangelogRepository {
  private readonly generateId: () => string;
  private readonly log: (message: string) => void;

  constructor(
    private readonly fs: FileSystem,
    private readonly changelogPath: string,
    options: JsonChangelogRepositoryOptions = {},
  ) {
    this.generateId = options.generateId ?? (() => generateEntryId());
    this.log = options.log ?? ((message) => console.error(message));
  }

  async load(): Promise<readonly ChangelogEntry[]> {
    if (!(await this.fs.exists(this.changelogPath))) {
      return [];
    }

    const content = await this.fs.readFile(this.changelogPath);
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new StorageError(
        `Changelog file is not valid JSON: ${this.changelogPath}`,
      );
    }

    if (Array.isArray(raw)) {
      return await this.migrateLegacy(raw);
    }

    const result = ChangelogSchema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(
        `Invalid changelog file ${this.changelogPath}:\n${
          describeIssues(result.error.issues)
        }`,
      );
    }

    const changelog = result.data;
    if (changelog.version > CHANGELOG_VERSION) {
      throw new StorageError(
        `Unsupported changelog version ${changelog.version} in ${this.changelogPath}`,
      );
    }

    const seen = new Set<string>();
    for (const entry of changelog.entries) {
      if (seen.has(entry.id)) {
        throw new StorageError(
          `Duplicate entry id ${entry.id} in ${this.changelogPath}`,
        );
      }
      seen.add(entry.id);
    }

    return changelog.entries;
  }

  async save(entries: readonly ChangelogEntry[]): Promise<void> {
    const changelog: Changelog = { version: CHANGELOG_VERSION, entries };
    await this.fs.writeFile(
      this.changelogPath,
      JSON.stringify(changelog, null, 2),
    );
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.changelogPath);
  }

  getChangelogPath(): string {
    return this.changelogPath;
  }

  // =========================================================================
  // Migration: legacy bare array -> version 1
  // =========================================================================

  private async migrateLegacy(
    raw: readonly unknown[],
  ): Promise<readonly ChangelogEntry[]> {
    const result = LegacyChangelogSchema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(
        `Invalid changelog file ${this.changelogPath}:\n${
          describeIssues(result.error.issues)
        }`,
      );
    }

    this.log("Migrating changelog to the current format...");

    const entries = result.data.map((legacy, position) =>
      this.migrateEntry(legacy, position)
    );
    try {
      await this.save(entries);
    } catch (e) {
      // Reads still work on a read-only legacy file; the next save migrates it
      if (!(e instanceof StorageError)) {
        throw e;
      }
      this.log(`Could not write migrated changelog: ${e.message}`);
      return entries;
    }

    this.log(`Migration complete. ${entries.length} entries updated.`);
    return entries;
  }

  private migrateEntry(legacy: LegacyEntry, position: number): ChangelogEntry {
    const changeType = parseChangeType(legacy.operation);
    if (!changeType) {
      throw new StorageError(
        `Legacy entry ${position} has unknown operation '${legacy.operation}'`,
      );
    }
    const timestamp = normalizeTimestamp(legacy.timestamp);
    if (!timestamp) {
      throw new StorageError(
        `Legacy entry ${position} has invalid timestamp '${legacy.timestamp}'`,
      );
    }
    return {
      id: this.generateId(),
      changeType,
      description: legacy.text,
      timestamp,
    };
  }
}
