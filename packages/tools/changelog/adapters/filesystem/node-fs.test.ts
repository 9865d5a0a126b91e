import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeFileSystem } from "./node-fs.ts";
import { StorageError } from "../../domain/entities/errors.ts";

let tempDir = "";

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "changelog-fs-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

test("NodeFileSystem - overwrite replaces content and leaves no temp file", async () => {
  const fs = new NodeFileSystem();
  const path = join(tempDir, "changelog.json");

  await fs.writeFile(path, "first");
  await fs.writeFile(path, "second");

  assert.equal(await readFile(path, "utf-8"), "second");
  assert.deepEqual(await readdir(tempDir), ["changelog.json"]);
});

test("NodeFileSystem - creates missing parent directories", async () => {
  const fs = new NodeFileSystem();
  const path = join(tempDir, "notes", "changelog.json");

  await fs.writeFile(path, "{}");

  assert.equal(await fs.readFile(path), "{}");
  assert.deepEqual(await readdir(join(tempDir, "notes")), ["changelog.json"]);
});

test("NodeFileSystem - failed write leaves no partial file", async () => {
  const fs = new NodeFileSystem();
  const path = join(tempDir, "changelog.json");
  await mkdir(path);

  await assert.rejects(
    () => fs.writeFile(path, "content"),
    (e: unknown) =>
      e instanceof StorageError &&
      e.message === `Failed to write file: ${path}`,
  );
  assert.deepEqual(await readdir(tempDir), ["changelog.json"]);
  assert.deepEqual(await readdir(path), []);
});

test("NodeFileSystem - missing file", async () => {
  const fs = new NodeFileSystem();
  const path = join(tempDir, "absent.json");

  assert.equal(await fs.exists(path), false);
  await assert.rejects(
    () => fs.readFile(path),
    (e: unknown) =>
      e instanceof StorageError && e.message === `File not found: ${path}`,
  );
});
