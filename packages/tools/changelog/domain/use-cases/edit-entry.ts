// EditEntryUseCase - Update the change type or description of an entry

import type { ChangelogEntry, EntryChanges } from "../entities/entry.ts";
import type { EditOutput } from "../entities/outputs.ts";
import { NotFoundError, ValidationError } from "../entities/errors.ts";
import {
  getLocalISOString,
  requireChangeType,
  requireDescription,
  resolveEntryId,
} from "../entities/entry-helpers.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";

export interface EditEntryInput {
  readonly id: string;
  readonly changeType?: string;
  readonly description?: string;
}

export class EditEntryUseCase {
  constructor(
    private readonly changelogRepo: ChangelogRepository,
    private readonly getTimestamp: () => string = () => getLocalISOString(),
  ) {}

  async execute(input: EditEntryInput): Promise<EditOutput> {
    if (input.changeType === undefined && input.description === undefined) {
      throw new ValidationError(
        "invalid_args",
        "Must provide at least one of --type or --desc",
      );
    }

    const changes: EntryChanges = {
      ...(input.changeType !== undefined &&
        { changeType: requireChangeType(input.changeType) }),
      ...(input.description !== undefined &&
        { description: requireDescription(input.description) }),
    };

    const entries = await this.changelogRepo.load();
    const id = resolveEntryId(input.id, entries.map((entry) => entry.id));

    const existing = entries.find((entry) => entry.id === id);
    if (!existing) {
      throw new NotFoundError(`No entry found matching id: ${input.id}`);
    }

    const entry: ChangelogEntry = {
      ...existing,
      ...changes,
      timestamp: this.getTimestamp(),
    };
    const next = entries.map((candidate) =>
      candidate.id === id ? entry : candidate
    );

    await this.changelogRepo.save(next);

    return { status: "entry_updated", entry };
  }
}
