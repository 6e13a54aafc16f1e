/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, LOG_LEVELS, parseLogLevel, shouldLog } from './helpers';

describe('formatLogMessage', () => {
  describe('level formatting', () => {
    test('should format DEBUG level with correct tag', () => {
      expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
    });

    test('should format INFO level with correct tag', () => {
      expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('[INFO]     test message');
    });

    test('should format WARNING level with correct tag', () => {
      expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('[WARNING]  test message');
    });

    test('should format CRITICAL level with correct tag', () => {
      expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('[CRITICAL] test message');
    });
  });

  describe('message content', () => {
    test('should handle empty message', () => {
      expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('[INFO]     ');
    });

    test('should preserve newlines', () => {
      expect(formatLogMessage(LOG_LEVELS.INFO, 'a\nb', LOG_LEVELS)).toBe('[INFO]     a\nb');
    });
  });
});

describe('shouldLog', () => {
  test('should pass messages at or above the threshold', () => {
    expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
    expect(shouldLog(LOG_LEVELS.CRITICAL, LOG_LEVELS.WARNING)).toBe(true);
  });

  test('should suppress messages below the threshold', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
  });
});

describe('parseLogLevel', () => {
  test('should map level names', () => {
    expect(parseLogLevel('debug')).toBe(0);
    expect(parseLogLevel('INFO')).toBe(1);
    expect(parseLogLevel(' warn ')).toBe(2);
    expect(parseLogLevel('warning')).toBe(2);
    expect(parseLogLevel('error')).toBe(3);
    expect(parseLogLevel('critical')).toBe(3);
  });

  test('should return null for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel('constructor')).toBeNull();
    expect(parseLogLevel('')).toBeNull();
  });
});
