// ListEntriesUseCase - List entries in insertion order

import type { ChangeType } from "../entities/change-type.ts";
import type { ChangelogEntry } from "../entities/entry.ts";
import type { ListEntryItem, ListOutput } from "../entities/outputs.ts";
import { getShortId } from "../entities/entry-helpers.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";

export interface ListEntriesInput {
  readonly changeType?: ChangeType;
}

export function toListItem(
  entry: ChangelogEntry,
  allIds: readonly string[],
): ListEntryItem {
  return { ...entry, shortId: getShortId(entry.id, allIds) };
}

export class ListEntriesUseCase {
  constructor(private readonly changelogRepo: ChangelogRepository) {}

  async execute(input: ListEntriesInput = {}): Promise<ListOutput> {
    const entries = await this.changelogRepo.load();
    // Short ids stay unambiguous against the whole store, not just the filtered view
    const allIds = entries.map((entry) => entry.id);

    const filtered = input.changeType
      ? entries.filter((entry) => entry.changeType === input.changeType)
      : entries;

    return { entries: filtered.map((entry) => toListItem(entry, allIds)) };
  }
}
