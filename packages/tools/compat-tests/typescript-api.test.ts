import { test } from "node:test";
import assert from "node:assert/strict";
import type {
  AddOutput,
  ChangelogEntry,
  ChangelogErrorCode,
  ChangelogRepository,
  ListOutput,
  ReportOutput,
} from "../changelog/mod.ts";
import {
  AddEntryUseCase,
  CHANGE_TYPES,
  ChangelogError,
  EditEntryUseCase,
  GenerateReportUseCase,
  InMemoryFileSystem,
  JsonChangelogRepository,
  ListEntriesUseCase,
  main,
  NotFoundError,
  RemoveEntryUseCase,
  renderReport,
  resolveConfig,
  ShowEntryUseCase,
} from "../changelog/mod.ts";

test("changelog: use cases are exported", () => {
  for (
    const useCase of [
      AddEntryUseCase,
      EditEntryUseCase,
      RemoveEntryUseCase,
      ListEntriesUseCase,
      ShowEntryUseCase,
      GenerateReportUseCase,
    ]
  ) {
    assert.equal(typeof useCase, "function");
  }
});

test("changelog: CLI and helpers are exported", () => {
  assert.equal(typeof main, "function");
  assert.equal(typeof renderReport, "function");
  assert.equal(typeof resolveConfig, "function");
  assert.deepEqual(CHANGE_TYPES, ["Created", "Edited", "Deleted"]);
});

test("changelog: error hierarchy", () => {
  const code: ChangelogErrorCode = "entry_not_found";
  const error = new NotFoundError("missing");
  assert.ok(error instanceof ChangelogError);
  assert.equal(error.code, code);
});

test("changelog: output type structure", () => {
  const entry: ChangelogEntry = {
    id: "a1b2c3d4",
    changeType: "Created",
    description: "add login form",
    timestamp: "2025-01-15T10:00:00+01:00",
  };
  const added: AddOutput = { id: "a1b2c3", entry };
  const listed: ListOutput = { entries: [{ ...entry, shortId: "a1b2c3" }] };
  const report: ReportOutput = {
    path: "changelog.html",
    count: 1,
    counts: { Created: 1, Edited: 0, Deleted: 0 },
  };
  assert.equal(added.entry.id, "a1b2c3d4");
  assert.equal(listed.entries[0].shortId, "a1b2c3");
  assert.equal(report.counts.Created, 1);
});

test("changelog: repository satisfies the port", async () => {
  const repo: ChangelogRepository = new JsonChangelogRepository(
    new InMemoryFileSystem(),
    "changelog.json",
  );
  assert.deepEqual(await repo.load(), []);
});
