/**
 * Tests for drive error classes.
 * Covers construction, static factory methods, type guards, and serialization.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  InvalidNameError,
  NotFoundError,
  QuotaExceededError,
  IoFailureError,
  PreviewUnavailableError,
  AuthenticationError,
  isInvalidNameError,
  isNotFoundError,
  isQuotaExceededError,
  isIoFailureError,
  isDriveError,
  getErrorCode,
  isNotFoundCode,
  isAbortError,
  toIoFailure,
  describeError,
  errorLabel,
} from '../src/utils/errorTypes.js';

import type { AnyDriveError } from '../src/utils/errorTypes.js';

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('InvalidNameError', () => {
  it('should carry the offending name in context', () => {
    const error = new InvalidNameError('Name cannot contain path separators', 'a/b');

    assert.strictEqual(error.type, 'INVALID_NAME');
    assert.strictEqual(error.name, 'InvalidNameError');
    assert.strictEqual(error.entryName, 'a/b');
    assert.deepStrictEqual(error.context, { name: 'a/b' });
  });

  it('should create blank-name error without a name', () => {
    const error = InvalidNameError.blank();

    assert.strictEqual(error.message, 'Name cannot be empty');
    assert.strictEqual(error.entryName, undefined);
    assert.deepStrictEqual(error.context, {});
  });

  it('should describe names escaping the folder', () => {
    assert.strictEqual(InvalidNameError.outsideFolder('link').message, "'link' resolves outside the current folder");
    assert.strictEqual(InvalidNameError.isFolder('Photos').message, "'Photos' is a folder");
  });
});

describe('NotFoundError', () => {
  it('should create entry and folder variants', () => {
    assert.strictEqual(NotFoundError.entry('a.txt').message, "'a.txt' does not exist");
    assert.strictEqual(NotFoundError.folder('Notes').message, "No folder named 'Notes'");
    assert.strictEqual(NotFoundError.folder('Notes').type, 'NOT_FOUND');
  });
});

describe('QuotaExceededError', () => {
  it('should expose the usage figures', () => {
    const error = new QuotaExceededError({ usedBytes: 6, requestedBytes: 5, maxBytes: 10 });

    assert.strictEqual(error.message, 'Storage limit reached: 6 + 5 bytes exceeds 10 bytes');
    assert.strictEqual(error.usedBytes, 6);
    assert.strictEqual(error.requestedBytes, 5);
    assert.strictEqual(error.maxBytes, 10);
    assert.deepStrictEqual(error.context, { usedBytes: 6, requestedBytes: 5, maxBytes: 10 });
  });
});

describe('IoFailureError', () => {
  it('should wrap an errno error keeping code and cause', () => {
    const cause = errnoError('EACCES', 'permission denied');
    const error = IoFailureError.from(cause, 'copy', 'notes.txt');

    assert.strictEqual(error.message, "Failed to copy 'notes.txt': permission denied");
    assert.strictEqual(error.code, 'EACCES');
    assert.strictEqual(error.cause, cause);
    assert.deepStrictEqual(error.context, { target: 'notes.txt', code: 'EACCES' });
  });

  it('should return an existing IoFailureError unchanged', () => {
    const original = IoFailureError.alreadyExists('Photos');
    assert.strictEqual(IoFailureError.from(original, 'create folder', 'Photos'), original);
  });

  it('should mark aborted operations', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    const error = IoFailureError.from(abort, 'upload', 'big.bin');
    assert.strictEqual(error.code, 'ABORTED');
  });

  it('should carry the report of a partial delete', () => {
    const report = { removed: ['Old/a.txt'], failed: [{ path: 'Old', reason: 'EBUSY: busy' }] };
    const error = IoFailureError.partialDelete('Old', report);

    assert.strictEqual(error.message, "Deleted 'Old' only partially: 1 removed, 1 not removed");
    assert.strictEqual(error.code, 'PARTIAL_DELETE');
    assert.deepStrictEqual(error.report, report);
  });
});

describe('PreviewUnavailableError', () => {
  it('should wrap the read failure', () => {
    const error = PreviewUnavailableError.from(new Error('bad header'), 'cat.png');

    assert.strictEqual(error.type, 'PREVIEW_UNAVAILABLE');
    assert.strictEqual(error.message, "Cannot open 'cat.png': bad header");
    assert.strictEqual(error.entryName, 'cat.png');
  });
});

describe('Serialization', () => {
  it('should serialize to type, message and context', () => {
    const error = NotFoundError.entry('a.txt');

    assert.deepStrictEqual(error.toJSON(), {
      type: 'NOT_FOUND',
      message: "'a.txt' does not exist",
      context: { name: 'a.txt' },
    });
  });

  it('should serialize through JSON.stringify', () => {
    const parsed: unknown = JSON.parse(JSON.stringify(AuthenticationError.invalidCredentials()));

    assert.deepStrictEqual(parsed, {
      type: 'AUTHENTICATION_ERROR',
      message: 'Invalid username or password',
      context: { reason: 'INVALID_CREDENTIALS' },
    });
  });
});

describe('Type Guards', () => {
  it('should narrow each kind', () => {
    assert.ok(isInvalidNameError(InvalidNameError.blank()));
    assert.ok(isNotFoundError(NotFoundError.entry('x')));
    assert.ok(isQuotaExceededError(new QuotaExceededError({ usedBytes: 1, requestedBytes: 1, maxBytes: 1 })));
    assert.ok(isIoFailureError(IoFailureError.alreadyExists('x')));
    assert.ok(!isNotFoundError(InvalidNameError.blank()));
  });

  it('should recognise any drive error', () => {
    assert.ok(isDriveError(new PreviewUnavailableError('nope')));
    assert.ok(!isDriveError(new Error('plain')));
    assert.ok(!isDriveError('string'));
  });

  it('should support exhaustive switches on type', () => {
    const classify = (error: AnyDriveError): string => {
      switch (error.type) {
        case 'INVALID_NAME':
        case 'NOT_FOUND':
          return 'input';
        case 'QUOTA_EXCEEDED':
          return 'quota';
        case 'IO_FAILURE':
        case 'PREVIEW_UNAVAILABLE':
          return 'io';
        case 'AUTHENTICATION_ERROR':
          return 'auth';
      }
    };

    assert.strictEqual(classify(NotFoundError.entry('x')), 'input');
    assert.strictEqual(classify(IoFailureError.alreadyExists('x')), 'io');
  });
});

describe('Errno helpers', () => {
  it('should read error codes', () => {
    assert.strictEqual(getErrorCode(errnoError('ENOENT', 'missing')), 'ENOENT');
    assert.strictEqual(getErrorCode(new Error('plain')), undefined);
    assert.strictEqual(getErrorCode('ENOENT'), undefined);
  });

  it('should treat ENOENT and ENOTDIR as not found', () => {
    assert.ok(isNotFoundCode(errnoError('ENOENT', 'missing')));
    assert.ok(isNotFoundCode(errnoError('ENOTDIR', 'not a dir')));
    assert.ok(!isNotFoundCode(errnoError('EACCES', 'denied')));
  });

  it('should recognise abort errors by name or code', () => {
    assert.ok(isAbortError(errnoError('ABORT_ERR', 'aborted')));
    assert.ok(!isAbortError(new Error('other')));
  });

  it('should convert unknown failures but keep drive errors', () => {
    const notFound = NotFoundError.entry('x');
    assert.strictEqual(toIoFailure(notFound, 'read', 'x'), notFound);

    const converted = toIoFailure(errnoError('EIO', 'disk error'), 'read', 'x');
    assert.strictEqual(converted.type, 'IO_FAILURE');
    assert.strictEqual(converted.message, "Failed to read 'x': disk error");
  });
});

describe('describeError', () => {
  it('should prefix drive errors with their short label', () => {
    assert.strictEqual(
      describeError(new QuotaExceededError({ usedBytes: 6, requestedBytes: 5, maxBytes: 10 })),
      'Quota exceeded: Storage limit reached: 6 + 5 bytes exceeds 10 bytes'
    );
    assert.strictEqual(describeError(InvalidNameError.blank()), 'Invalid name: Name cannot be empty');
  });

  it('should fall back to the plain message', () => {
    assert.strictEqual(describeError(new Error('boom')), 'boom');
    assert.strictEqual(describeError(42), '42');
  });

  it('should expose labels per kind', () => {
    assert.strictEqual(errorLabel('IO_FAILURE'), 'Operation failed');
    assert.strictEqual(errorLabel('PREVIEW_UNAVAILABLE'), 'Cannot open file');
  });
});
