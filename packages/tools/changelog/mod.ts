// Main module exports for changelog

// ============================================================================
// Domain entities
// ============================================================================

export {
  CHANGE_TYPES,
  type ChangeType,
  isValidChangeType,
  parseChangeType,
} from "./domain/entities/change-type.ts";
export type { ChangelogEntry, EntryChanges } from "./domain/entities/entry.ts";
export {
  type Changelog,
  CHANGELOG_VERSION,
} from "./domain/entities/changelog.ts";
export type * from "./domain/entities/outputs.ts";
export {
  ChangelogError,
  type ChangelogErrorCode,
  NotFoundError,
  RenderError,
  StorageError,
  ValidationError,
} from "./domain/entities/errors.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { ChangelogRepository } from "./domain/ports/changelog-repository.ts";

// ============================================================================
// Use cases
// ============================================================================

export { AddEntryUseCase } from "./domain/use-cases/add-entry.ts";
export { EditEntryUseCase } from "./domain/use-cases/edit-entry.ts";
export { RemoveEntryUseCase } from "./domain/use-cases/remove-entry.ts";
export { ListEntriesUseCase } from "./domain/use-cases/list-entries.ts";
export { ShowEntryUseCase } from "./domain/use-cases/show-entry.ts";
export { GenerateReportUseCase } from "./domain/use-cases/generate-report.ts";
export {
  DEFAULT_REPORT_TITLE,
  renderReport,
} from "./domain/report/render-report.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { JsonChangelogRepository } from "./adapters/repositories/json-changelog-repo.ts";

// ============================================================================
// CLI
// ============================================================================

export { resolveConfig } from "./config.ts";
export { main } from "./cli.ts";
