// errors.ts
// -----------------------------------------------------------------------------
// Error taxonomy of the bot.  Every class carries a stable `code` so that the
// conversation layer can branch on the kind of failure without string-matching
// messages (the way `Error('KIN_TOKEN_MISSING')` used to be detected).
// -----------------------------------------------------------------------------

export type FilmPickerErrorCode =
  | 'UNKNOWN_OPTION'
  | 'MODEL_ERROR'
  | 'STORAGE_ERROR'
  | 'INVALID_EVENT'
  | 'INVALID_INPUT'
  | 'CONFIG_MISSING';

export class FilmPickerError extends Error {
  constructor(
    public readonly code: FilmPickerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A label or choice token that does not resolve in the catalog. */
export class UnknownOptionError extends FilmPickerError {
  constructor(public readonly option: string) {
    super('UNKNOWN_OPTION', `Unknown catalog option: ${option}`);
  }
}

/** Generation backend failed or answered with nothing usable. */
export class ModelError extends FilmPickerError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_ERROR', message, { cause });
  }
}

export class StorageError extends FilmPickerError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
  }
}

/** An event that is not legal in the current dialogue state. */
export class InvalidEventError extends FilmPickerError {
  constructor(message: string) {
    super('INVALID_EVENT', message);
  }
}

export class InvalidInputError extends FilmPickerError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/** Missing or malformed startup configuration – fatal. */
export class ConfigError extends FilmPickerError {
  constructor(message: string) {
    super('CONFIG_MISSING', message);
  }
}
