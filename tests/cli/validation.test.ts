import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  formatValidationError,
  parseExecutionMode,
  parseExtensions,
  parsePositiveInt,
  validateQueryString,
} from '../../src/cli/utils/validation.js';
import { PreconditionError, StoreError, ValidationError } from '../../src/utils/errors.js';

describe('CLI validation', () => {
  it('should normalise extension lists', () => {
    expect(parseExtensions('md, .TXT,py,')).toEqual(['.md', '.txt', '.py']);
    expect(() => parseExtensions(' , ')).toThrow(InvalidArgumentError);
  });

  it('should parse positive integers only', () => {
    expect(parsePositiveInt('8')).toBe(8);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
  });

  it('should accept known execution modes', () => {
    expect(parseExecutionMode('async')).toBe('async');
    expect(() => parseExecutionMode('threads')).toThrow('Must be one of: auto, worker, async, sequential.');
  });

  it('should reject blank queries', () => {
    expect(() => validateQueryString('  ')).toThrow(ValidationError);
    expect(() => validateQueryString('what changed?')).not.toThrow();
  });

  it('should format errors by kind', () => {
    expect(formatValidationError(new ValidationError('bad input'))).toBe('❌ Validation Error: bad input');
    expect(formatValidationError(new PreconditionError('index is empty'))).toBe('⚠️  index is empty');
    expect(formatValidationError(new StoreError('disk full', 'sqlite'))).toBe('❌ Error [STORE_ERROR]: disk full');
    expect(formatValidationError(new Error('plain'))).toBe('❌ Error: plain');
    expect(formatValidationError('odd')).toBe('❌ Unknown error: odd');
  });
});
