/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Failures surface as StorageError with the offending path. Writes go to
 * a sibling temporary file that is renamed over the target, so a failed
 * write never leaves a truncated file behind.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { StorageError } from "../../domain/entities/errors.ts";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new StorageError(`File not found: ${path}`);
      }
      throw new StorageError(`Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const tmpPath = `${path}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmpPath, content, "utf-8");
      await rename(tmpPath, path);
    } catch {
      await rm(tmpPath, { force: true, recursive: true });
      throw new StorageError(`Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw new StorageError(`Failed to access: ${path}`);
    }
  }
}
