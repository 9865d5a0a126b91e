// RemoveEntryUseCase - Physically delete an entry from the changelog

import type { StatusOutput } from "../entities/outputs.ts";
import { resolveEntryId } from "../entities/entry-helpers.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";

export class RemoveEntryUseCase {
  constructor(private readonly changelogRepo: ChangelogRepository) {}

  async execute(idOrPrefix: string): Promise<StatusOutput> {
    const entries = await this.changelogRepo.load();
    const id = resolveEntryId(idOrPrefix, entries.map((entry) => entry.id));

    await this.changelogRepo.save(entries.filter((entry) => entry.id !== id));

    return { status: "entry_removed", id };
  }
}
