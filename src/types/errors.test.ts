/**
 * Tests for error types
 */

import {
  MiniserverError,
  MalformedInventoryError,
  SelectionSyntaxError,
  TransientFetchError,
  AuthenticationError,
  RecordPersistError,
  ConfigValidationError
} from './errors';

describe('Error Types', () => {
  describe('MiniserverError', () => {
    it('should create error with correct message and name', () => {
      const error = new MiniserverError('Test error message');
      expect(error.message).toBe('Test error message');
      expect(error.name).toBe('MiniserverError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should keep the cause', () => {
      const cause = new Error('root');
      const error = new MiniserverError('wrapped', { cause });
      expect(error.cause).toBe(cause);
    });
  });

  describe('SelectionSyntaxError', () => {
    it('should carry the offending token and reason', () => {
      const error = new SelectionSyntaxError('5-2', 'range start is greater than range end');
      expect(error.token).toBe('5-2');
      expect(error.reason).toBe('range start is greater than range end');
      expect(error.message).toBe('Invalid selection "5-2": range start is greater than range end');
      expect(error.name).toBe('SelectionSyntaxError');
    });
  });

  describe('TransientFetchError', () => {
    it('should carry url and entity id', () => {
      const error = new TransientFetchError('Request timeout', 'http://10.0.0.2/jdev/sps/io/abc/state', {
        entityId: 'abc'
      });
      expect(error.url).toBe('http://10.0.0.2/jdev/sps/io/abc/state');
      expect(error.entityId).toBe('abc');
      expect(error.name).toBe('TransientFetchError');
    });

    it('should leave entity id undefined for structure requests', () => {
      const error = new TransientFetchError('HTTP 500', 'http://10.0.0.2/data/LoxAPP3.json');
      expect(error.entityId).toBeUndefined();
    });
  });

  describe('AuthenticationError', () => {
    it('should name the user and point at the credentials', () => {
      const error = new AuthenticationError('admin', 401);
      expect(error.user).toBe('admin');
      expect(error.message).toBe(
        'Controller rejected credentials for user "admin" (HTTP 401). Check LOXONE_USER and LOXONE_PASSWORD.'
      );
    });
  });

  describe('RecordPersistError', () => {
    it('should include the path and the cause message', () => {
      const error = new RecordPersistError('/tmp/out.csv', { cause: new Error('EACCES') });
      expect(error.path).toBe('/tmp/out.csv');
      expect(error.message).toBe('Failed to write record to /tmp/out.csv: EACCES');
    });
  });

  describe('Error inheritance chain', () => {
    it('all custom errors should extend MiniserverError', () => {
      const errors = [
        new MalformedInventoryError('Test'),
        new SelectionSyntaxError('x', 'Test'),
        new TransientFetchError('Test', 'http://host'),
        new AuthenticationError('user', 403),
        new RecordPersistError('file.csv'),
        new ConfigValidationError(['LOXONE_IP'], 'Test')
      ];

      errors.forEach(error => {
        expect(error).toBeInstanceOf(MiniserverError);
        expect(error).toBeInstanceOf(Error);
      });
    });

    it('errors can be caught as MiniserverError', () => {
      let caughtError: Error | null = null;

      try {
        throw new MalformedInventoryError('Missing controls');
      } catch (e) {
        if (e instanceof MiniserverError) {
          caughtError = e;
        }
      }

      expect(caughtError).not.toBeNull();
      expect(caughtError?.message).toBe('Missing controls');
    });
  });
});
