// AddEntryUseCase - Record a new changelog entry

import type { ChangelogEntry } from "../entities/entry.ts";
import type { AddOutput } from "../entities/outputs.ts";
import { ValidationError } from "../entities/errors.ts";
import {
  generateEntryId,
  getLocalISOString,
  getShortId,
  isValidTimestamp,
  requireChangeType,
  requireDescription,
} from "../entities/entry-helpers.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";

export interface AddEntryInput {
  readonly changeType: string;
  readonly description: string;
  readonly id?: string;
  readonly timestamp?: string;
}

export interface AddEntryDeps {
  readonly changelogRepo: ChangelogRepository;
  readonly generateId?: () => string;
  readonly getTimestamp?: () => string;
}

export class AddEntryUseCase {
  constructor(private readonly deps: AddEntryDeps) {}

  async execute(input: AddEntryInput): Promise<AddOutput> {
    const changeType = requireChangeType(input.changeType);
    const description = requireDescription(input.description);

    if (input.timestamp !== undefined && !isValidTimestamp(input.timestamp)) {
      throw new ValidationError(
        "invalid_args",
        `Invalid timestamp: ${input.timestamp}`,
      );
    }

    const entries = await this.deps.changelogRepo.load();
    const allIds = entries.map((entry) => entry.id);

    if (input.id !== undefined) {
      if (input.id.trim().length === 0) {
        throw new ValidationError("invalid_args", "Entry id cannot be empty");
      }
      if (allIds.includes(input.id)) {
        throw new ValidationError(
          "duplicate_entry_id",
          `An entry with id ${input.id} already exists`,
        );
      }
    }

    const generateId = this.deps.generateId ?? (() => generateEntryId());
    const getTimestamp = this.deps.getTimestamp ?? (() => getLocalISOString());

    const entry: ChangelogEntry = {
      id: input.id ?? generateId(),
      changeType,
      description,
      timestamp: input.timestamp ?? getTimestamp(),
    };

    await this.deps.changelogRepo.save([...entries, entry]);

    return { id: getShortId(entry.id, [...allIds, entry.id]), entry };
  }
}
