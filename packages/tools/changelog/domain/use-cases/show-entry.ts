// ShowEntryUseCase - Look up a single entry by id or prefix

import type { ShowOutput } from "../entities/outputs.ts";
import { NotFoundError } from "../entities/errors.ts";
import { resolveEntryId } from "../entities/entry-helpers.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";
import { toListItem } from "./list-entries.ts";

export class ShowEntryUseCase {
  constructor(private readonly changelogRepo: ChangelogRepository) {}

  async execute(idOrPrefix: string): Promise<ShowOutput> {
    const entries = await this.changelogRepo.load();
    const allIds = entries.map((entry) => entry.id);
    const id = resolveEntryId(idOrPrefix, allIds);

    const entry = entries.find((candidate) => candidate.id === id);
    if (!entry) {
      throw new NotFoundError(`No entry found matching id: ${idOrPrefix}`);
    }

    return { entry: toListItem(entry, allIds) };
  }
}
