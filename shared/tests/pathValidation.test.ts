/**
 * Tests for entry name validation and root containment.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as path from 'path';
import {
  validateEntryName,
  assertValidEntryName,
  isValidEntryName,
  isWithinRoot,
} from '../src/utils/validators/pathValidation.js';
import { InvalidNameError } from '../src/utils/errorTypes.js';

describe('validateEntryName', () => {
  it('should accept ordinary names', () => {
    assert.deepStrictEqual(validateEntryName('notes.txt'), { valid: true });
    assert.deepStrictEqual(validateEntryName('My Photos'), { valid: true });
    assert.deepStrictEqual(validateEntryName('..hidden'), { valid: true });
  });

  it('should reject empty and blank names', () => {
    assert.deepStrictEqual(validateEntryName(''), { valid: false, error: 'Name cannot be empty' });
    assert.deepStrictEqual(validateEntryName('   '), { valid: false, error: 'Name cannot be empty' });
  });

  it('should reject separators on every platform', () => {
    assert.strictEqual(validateEntryName('a/b').error, 'Name cannot contain path separators');
    assert.strictEqual(validateEntryName('a\\b').error, 'Name cannot contain path separators');
    assert.strictEqual(validateEntryName('../etc').error, 'Name cannot contain path separators');
  });

  it('should reject null bytes', () => {
    assert.strictEqual(validateEntryName('a\0b').error, 'Name contains null bytes');
  });

  it('should reject dot names', () => {
    assert.strictEqual(validateEntryName('.').error, "'.' is a reserved name");
    assert.strictEqual(validateEntryName('..').error, "'..' is a reserved name");
  });

  it('should reject names carrying the upload temp prefix', () => {
    assert.deepStrictEqual(validateEntryName('.minidrive-upload-notes'), {
      valid: false,
      error: "Names starting with '.minidrive-upload-' are reserved",
    });
    assert.strictEqual(validateEntryName('.minidrive-uploads').valid, true);
  });

  it('should reject names longer than 255 characters', () => {
    assert.strictEqual(validateEntryName('x'.repeat(255)).valid, true);
    assert.strictEqual(
      validateEntryName('x'.repeat(256)).error,
      'Name exceeds maximum length of 255 characters'
    );
  });
});

describe('assertValidEntryName', () => {
  it('should throw InvalidNameError carrying the name', () => {
    assert.throws(
      () => assertValidEntryName('a/b'),
      (error: unknown) => error instanceof InvalidNameError && error.entryName === 'a/b'
    );
  });

  it('should not throw for a valid name', () => {
    assert.doesNotThrow(() => assertValidEntryName('ok.txt'));
    assert.strictEqual(isValidEntryName('ok.txt'), true);
    assert.strictEqual(isValidEntryName(''), false);
  });
});

describe('isWithinRoot', () => {
  const root = path.resolve('/srv/alice');

  it('should accept the root and its descendants', () => {
    assert.strictEqual(isWithinRoot(root, root), true);
    assert.strictEqual(isWithinRoot(root, path.join(root, 'docs')), true);
    assert.strictEqual(isWithinRoot(root, path.join(root, '..data')), true);
  });

  it('should reject siblings and parents', () => {
    assert.strictEqual(isWithinRoot(root, path.resolve('/srv/alice2')), false);
    assert.strictEqual(isWithinRoot(root, path.resolve('/srv')), false);
    assert.strictEqual(isWithinRoot(root, path.resolve('/etc/passwd')), false);
  });
});
