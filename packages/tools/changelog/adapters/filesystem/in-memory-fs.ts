/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * Files live in a Map<string, string>; paths listed in `readOnly`
 * reject writes the way an unwritable medium would.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { StorageError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private readOnly = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(new StorageError(`File not found: ${path}`));
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    if (this.readOnly.has(path)) {
      return Promise.reject(
        new StorageError(`Failed to write file: ${path}`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path));
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Get a file's content, or undefined when absent. */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Make later writes to `path` fail. */
  lock(path: string): void {
    this.readOnly.add(path);
  }

  /** Get the number of stored files. */
  get size(): number {
    return this.files.size;
  }
}
