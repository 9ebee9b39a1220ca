import { InvalidArgumentError } from 'commander';
import { ExecutionModeSchema, type ExecutionModeSetting } from '../../types/config.js';
import { PreconditionError, RagError, ValidationError } from '../../utils/errors.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseExecutionMode(value: string): ExecutionModeSetting {
  const result = ExecutionModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Must be one of: ${ExecutionModeSchema.options.join(', ')}.`);
  }
  return result.data;
}

/**
 * "md, .TXT,py" -> [".md", ".txt", ".py"]
 */
export function parseExtensions(value: string): string[] {
  const extensions = value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
  if (extensions.length === 0) {
    throw new InvalidArgumentError('At least one extension is required.');
  }
  return extensions;
}

export function validateQueryString(query: string): void {
  if (!query || query.trim().length === 0) {
    throw new ValidationError('Search query cannot be empty');
  }

  if (query.trim().length > 1000) {
    throw new ValidationError('Search query is too long (max: 1000 characters)');
  }
}

export function formatValidationError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }

  if (error instanceof PreconditionError) {
    return `⚠️  ${error.message}`;
  }

  if (error instanceof RagError) {
    return `❌ Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }

  return `❌ Unknown error: ${String(error)}`;
}
