// Error types for changelog domain

export type ChangelogErrorCode =
  | "storage_error"
  | "entry_not_found"
  | "ambiguous_entry_id"
  | "duplicate_entry_id"
  | "invalid_change_type"
  | "invalid_description"
  | "invalid_args"
  | "render_error";

export class ChangelogError extends Error {
  constructor(
    public readonly code: ChangelogErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ChangelogError";
  }

  toJSON(): { error: string; code: ChangelogErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}

/** The changelog file could not be read, parsed or written. */
export class StorageError extends ChangelogError {
  constructor(message: string) {
    super("storage_error", message);
    this.name = "StorageError";
  }
}

/** An edit or remove referenced an id that matches no entry. */
export class NotFoundError extends ChangelogError {
  constructor(message: string) {
    super("entry_not_found", message);
    this.name = "NotFoundError";
  }
}

export type ValidationErrorCode = Extract<
  ChangelogErrorCode,
  | "invalid_change_type"
  | "invalid_description"
  | "invalid_args"
  | "ambiguous_entry_id"
  | "duplicate_entry_id"
>;

export class ValidationError extends ChangelogError {
  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** An entry handed to the report renderer was malformed. */
export class RenderError extends ChangelogError {
  constructor(message: string) {
    super("render_error", message);
    this.name = "RenderError";
  }
}
