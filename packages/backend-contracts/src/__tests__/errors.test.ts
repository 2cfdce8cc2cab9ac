import { describe, it, expect } from 'vitest';
import {
  BackendError,
  ConfigError,
  ErrorCode,
  FilterInvalidError,
  MalformedResultError,
  RuntimeCallError,
  isKnownErrorCode,
  isErrorLike,
  isThenable,
  normalizeError,
} from '../errors.js';

describe('Errors', () => {
  describe('BackendError', () => {
    it('should default to internal-error', () => {
      const error = new BackendError('Boom');

      expect(error.code).toBe('internal-error');
      expect(error.name).toBe('BackendError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should serialize to JSON', () => {
      const error = new BackendError('Serialize', ErrorCode.REPO_NOT_FOUND, { repoId: 'main' });

      expect(error.toJSON()).toEqual({
        code: 'repo-not-found',
        message: 'Serialize',
        details: { repoId: 'main' },
      });
    });

    it('should keep the subclass prototype', () => {
      const error = new FilterInvalidError('bad filter');

      expect(error).toBeInstanceOf(FilterInvalidError);
      expect(error).toBeInstanceOf(BackendError);
      expect(error.code).toBe('filter-invalid');
      expect(error.name).toBe('FilterInvalidError');
    });
  });

  describe('subclasses', () => {
    it('should carry the function name on runtime call errors', () => {
      const error = new RuntimeCallError('getPackages', 'db locked', ErrorCode.CANNOT_GET_LOCK);

      expect(error.functionName).toBe('getPackages');
      expect(error.code).toBe('cannot-get-lock');
      expect(error.details).toEqual({ functionName: 'getPackages' });
    });

    it('should prefix malformed result messages', () => {
      const error = new MalformedResultError('getRepos', 'expected array');

      expect(error.message).toBe("Runtime function 'getRepos' returned malformed data: expected array");
    });

    it('should report config errors as failed-config-parsing', () => {
      expect(new ConfigError('missing').code).toBe('failed-config-parsing');
    });
  });

  describe('isKnownErrorCode', () => {
    it('should accept daemon codes only', () => {
      expect(isKnownErrorCode('package-not-found')).toBe(true);
      expect(isKnownErrorCode('PACKAGE_NOT_FOUND')).toBe(false);
      expect(isKnownErrorCode(42)).toBe(false);
    });
  });

  describe('normalizeError', () => {
    it('should use toJSON for backend errors', () => {
      expect(normalizeError(new BackendError('x', ErrorCode.NO_NETWORK))).toEqual({
        code: 'no-network',
        message: 'x',
      });
    });

    it('should keep a known code from plain errors', () => {
      const error = Object.assign(new Error('gone'), { code: 'package-not-found' });

      expect(normalizeError(error)).toEqual({ code: 'package-not-found', message: 'gone' });
    });

    it('should clamp unknown codes to internal-error', () => {
      const error = Object.assign(new Error('nope'), { code: 'ENOENT' });

      expect(normalizeError(error)).toEqual({ code: 'internal-error', message: 'nope' });
    });

    it('should accept error-like objects from other realms', () => {
      const foreign = { message: 'from script', code: 'repo-not-found' };

      expect(isErrorLike(foreign)).toBe(true);
      expect(normalizeError(foreign)).toEqual({ code: 'repo-not-found', message: 'from script' });
    });

    it('should stringify anything else', () => {
      expect(normalizeError('plain')).toEqual({ code: 'internal-error', message: 'plain' });
      expect(normalizeError(undefined)).toEqual({ code: 'internal-error', message: 'undefined' });
    });
  });

  describe('isThenable', () => {
    it('should accept promises and promise-like objects', () => {
      expect(isThenable(Promise.resolve(1))).toBe(true);
      expect(isThenable({ then: () => undefined })).toBe(true);
    });

    it('should reject other values', () => {
      expect(isThenable(undefined)).toBe(false);
      expect(isThenable(null)).toBe(false);
      expect(isThenable({ then: 'later' })).toBe(false);
      expect(isThenable(() => undefined)).toBe(false);
    });
  });
});
