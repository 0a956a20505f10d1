// Utilities: Custom error types

/**
 * Static content referenced something that does not exist.
 * Content is trusted, so this is a bug, never a gameplay message.
 */
export class ContentIntegrityError extends Error {
  statusCode = 500;
  code = 'CONTENT_INTEGRITY_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ContentIntegrityError';
    this.details = details;
  }
}

export class SaveLoadError extends Error {
  statusCode = 500;
  code = 'SAVE_LOAD_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SaveLoadError';
    this.details = details;
  }
}

export class NotFoundError extends Error {
  statusCode = 404;
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code = 'NOT_FOUND', details?: Record<string, unknown>) {
    super(message);
    this.name = 'NotFoundError';
    this.code = code;
    this.details = details;
  }
}
