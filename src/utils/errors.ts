export class RagError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'RagError';
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class StoreError extends RagError {
  constructor(message: string, public backend?: string) {
    super(message, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

export class ApiError extends RagError {
  constructor(message: string, public provider?: string) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends RagError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

/**
 * A collaborator answered with data of the wrong shape, or an index received
 * vectors of a different width. Never retried.
 */
export class SchemaMismatchError extends RagError {
  constructor(message: string) {
    super(message, 'SCHEMA_MISMATCH');
    this.name = 'SchemaMismatchError';
  }
}

export class PreconditionError extends RagError {
  constructor(message: string) {
    super(message, 'PRECONDITION_FAILED');
    this.name = 'PreconditionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
