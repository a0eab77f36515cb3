/**
 * Error types reported to the user
 */

/** Wrong command or argument count; raised before storage is touched */
export class ArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentsError';
  }
}

export class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ApplicationError';
  }
}

export class DuplicateCodeError extends ApplicationError {
  readonly code: string;

  constructor(code: string, existing: string) {
    super(`There is a bookmark with that code:\n${existing}\n\nTo override it add option -f`);
    this.name = 'DuplicateCodeError';
    this.code = code;
  }
}

export class UnknownCodeError extends ApplicationError {
  readonly code: string;

  constructor(code: string) {
    super(`There is no bookmark with code ${code}`);
    this.name = 'UnknownCodeError';
    this.code = code;
  }
}

/**
 * A stored row that cannot be read back as a bookmark.
 * Not a user error: it surfaces as a fatal error.
 */
export class StorageFormatError extends Error {
  constructor(filename: string, record: number, fieldCount: number) {
    super(`Malformed bookmark in record ${record} of ${filename}: expected 3 fields, found ${fieldCount}`);
    this.name = 'StorageFormatError';
  }
}
