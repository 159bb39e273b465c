import { describe, it, expect } from 'vitest';
import { HASH_CONCURRENCY, resolveConfig } from '../src/config';
import { DedupError, classifyError, toDedupError } from '../src/errors';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveConfig()).toEqual({
      categories: [],
      useDefaultExcludes: true,
      tieBreak: 'encounter',
      concurrency: HASH_CONCURRENCY,
      dryRun: false
    });
  });

  it('should keep explicit values', () => {
    const config = resolveConfig({
      categories: ['audio', 'video'],
      excludePatterns: ['cache'],
      tieBreak: 'path',
      concurrency: 3,
      dryRun: true
    });

    expect(config.categories).toEqual(['audio', 'video']);
    expect(config.excludePatterns).toEqual(['cache']);
    expect(config.tieBreak).toBe('path');
    expect(config.concurrency).toBe(3);
    expect(config.dryRun).toBe(true);
  });

  it('should reject an unknown category as InvalidArgument', () => {
    expect(() => resolveConfig({ categories: ['images'] })).toThrow(DedupError);
    try {
      resolveConfig({ categories: ['images'] });
    } catch (err) {
      expect(err).toBeInstanceOf(DedupError);
      expect(err).toMatchObject({ kind: 'InvalidArgument' });
      expect(err instanceof Error ? err.message : '').toMatch(/^Invalid configuration: categories\.0: /);
    }
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => resolveConfig({ concurrency: 0 })).toThrow(/^Invalid configuration: concurrency: /);
  });

  it('should reject an empty exclusion pattern', () => {
    expect(() => resolveConfig({ excludePatterns: [''] })).toThrow(/excludePatterns\.0/);
  });
});

describe('error classification', () => {
  function errno(code: string, message = code): NodeJS.ErrnoException {
    const err: NodeJS.ErrnoException = new Error(message);
    err.code = code;
    return err;
  }

  it('should map errno codes onto kinds', () => {
    expect(classifyError(errno('ENOENT'))).toBe('NotFound');
    expect(classifyError(errno('ENOTDIR'))).toBe('NotFound');
    expect(classifyError(errno('EACCES'))).toBe('PermissionDenied');
    expect(classifyError(errno('EPERM'))).toBe('PermissionDenied');
    expect(classifyError(errno('EISDIR'))).toBe('PathKindMismatch');
    expect(classifyError(errno('EIO'))).toBe('GenericIOFailure');
    expect(classifyError('boom')).toBe('GenericIOFailure');
  });

  it('should keep the kind of an existing DedupError', () => {
    expect(classifyError(new DedupError('bad', 'InvalidArgument'))).toBe('InvalidArgument');
  });

  it('should wrap errors with path, kind and cause', () => {
    const cause = errno('EACCES', 'open failed');
    const wrapped = toDedupError(cause, '/data/a.txt');

    expect(wrapped.message).toBe('Permission denied: /data/a.txt: open failed');
    expect(wrapped.kind).toBe('PermissionDenied');
    expect(wrapped.path).toBe('/data/a.txt');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.isPermissionDenied).toBe(true);
    expect(wrapped.isNotFound).toBe(false);
  });

  it('should return a DedupError unchanged', () => {
    const original = new DedupError('gone', 'NotFound', '/x');
    expect(toDedupError(original, '/y')).toBe(original);
  });
});
