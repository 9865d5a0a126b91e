// Command output types - immutable result types for all changelog commands

import type { ChangeType } from "./change-type.ts";
import type { ChangelogEntry } from "./entry.ts";

export type AddOutput = {
  readonly id: string; // short ID
  readonly entry: ChangelogEntry;
};

export type EditOutput = {
  readonly status: "entry_updated";
  readonly entry: ChangelogEntry;
};

export type StatusOutput = {
  readonly status: "entry_removed";
  readonly id: string;
};

export type ListEntryItem = ChangelogEntry & {
  readonly shortId: string;
};

export type ListOutput = {
  readonly entries: readonly ListEntryItem[];
};

export type ShowOutput = {
  readonly entry: ListEntryItem;
};

export type ReportOutput = {
  readonly path: string;
  readonly count: number;
  readonly counts: Readonly<Record<ChangeType, number>>;
};
