/**
 * Tests for the Logger module.
 * Covers log formatting, context handling, thresholds and error output.
 */

import { describe, it, beforeEach, afterEach, mock, type Mock } from 'node:test';
import assert from 'node:assert';
import { Logger } from '../src/utils/logging/logger.js';
import { logCapture } from '../src/utils/logging/logCapture.js';

const ISO = '\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z';

describe('Logger Module', () => {
  let consoleLog: Mock<(...args: unknown[]) => void>;
  let consoleWarn: Mock<(...args: unknown[]) => void>;
  let consoleError: Mock<(...args: unknown[]) => void>;

  beforeEach(() => {
    consoleLog = mock.method(console, 'log', () => {});
    consoleWarn = mock.method(console, 'warn', () => {});
    consoleError = mock.method(console, 'error', () => {});
    logCapture.clear();
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('formatMessage', () => {
    it('should format a message without context', () => {
      const formatted = new Logger('debug').formatMessage('info', 'Hello');
      assert.match(formatted, new RegExp(`^${ISO} INFO  Hello$`));
    });

    it('should put standard fields first and skip undefined values', () => {
      const formatted = new Logger('debug').formatMessage('warn', 'Upload rejected', {
        name: 'a.txt',
        component: 'FileOps',
        root: '/srv/alice',
        skipped: undefined,
        durationMs: 12,
      });

      assert.match(
        formatted,
        new RegExp(`^${ISO} WARN  \\[component=FileOps, root=/srv/alice, duration=12ms, name=a\\.txt\\] Upload rejected$`)
      );
    });

    it('should omit the context block when every field is empty', () => {
      const formatted = new Logger('debug').formatMessage('error', 'Oops', { skipped: undefined });
      assert.match(formatted, new RegExp(`^${ISO} ERROR Oops$`));
    });
  });

  describe('thresholds', () => {
    it('should route levels to the matching console method', () => {
      const logger = new Logger('debug');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      assert.strictEqual(consoleLog.mock.callCount(), 2);
      assert.strictEqual(consoleWarn.mock.callCount(), 1);
      assert.strictEqual(consoleError.mock.callCount(), 1);
    });

    it('should drop messages below the threshold from the console', () => {
      const logger = new Logger('warn');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');

      assert.strictEqual(consoleLog.mock.callCount(), 0);
      assert.strictEqual(consoleWarn.mock.callCount(), 1);
      assert.strictEqual(logger.isEnabled('info'), false);
      assert.strictEqual(logger.isEnabled('error'), true);
    });

    it('should capture every message regardless of threshold', () => {
      const logger = new Logger('error');
      logger.debug('quiet', { component: 'LoggerTest' });

      const { logs } = logCapture.getLogs({ component: 'LoggerTest' });
      assert.strictEqual(logs.length, 1);
      assert.strictEqual(logs[0]?.message, 'quiet');
      assert.strictEqual(logs[0]?.level, 'debug');
    });
  });

  describe('error logging', () => {
    it('should print the error message after the log line', () => {
      new Logger('info').error('Copy failed', new Error('disk full'));

      assert.strictEqual(consoleError.mock.calls[1]?.arguments[0], '  Error: disk full');
    });

    it('should print non-Error details as JSON', () => {
      new Logger('info').error('Odd failure', { code: 7 });

      const details = consoleError.mock.calls[1]?.arguments[0];
      assert.strictEqual(details, '  Details: {\n  "code": 7\n}');
    });
  });

  describe('timed', () => {
    it('should log without a duration when no operation was started', () => {
      const logger = new Logger('debug');
      logger.timed('info', 'Done', 'never-started', { component: 'LoggerTest' });

      const { logs } = logCapture.getLogs({ component: 'LoggerTest' });
      assert.strictEqual(logs[0]?.message, 'Done');
      assert.strictEqual(logs[0]?.context?.durationMs, undefined);
    });

    it('should return undefined for an unknown operation', () => {
      assert.strictEqual(new Logger('debug').endOperation('missing'), undefined);
    });
  });
});
