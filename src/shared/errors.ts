export class ArchiveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ArchiveError';
  }
}

export class ConfigError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class ValidationError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export type EntityKind = 'article' | 'text' | 'podcast' | 'author';

/**
 * Raised when a create collides with an existing content-addressed id.
 * addAuthor reports a taken id or name in its result instead.
 */
export class DuplicateKeyError extends ArchiveError {
  constructor(
    public readonly entity: EntityKind,
    public readonly id: string,
  ) {
    super(`${entity} already exists: ${id}`, 'DUPLICATE_KEY', { entity, id });
    this.name = 'DuplicateKeyError';
  }
}
