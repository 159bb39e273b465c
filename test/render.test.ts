import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import chalk from 'chalk';
import { formatBytes, renderDeletion, renderPlan, renderStats } from '../src/render';
import { createProgressReporter, renderBar } from '../src/progress';
import { createLogger, isLogLevel } from '../src/logger';

const digest = '0123456789abcdef'.repeat(4);

describe('render', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('should format byte counts', () => {
    expect(formatBytes(0)).toBe('0.00 B');
    expect(formatBytes(1023)).toBe('1023.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB');
  });

  it('should say when there is nothing to do', () => {
    expect(renderPlan([])).toBe('No duplicates found.\n');
  });

  it('should list each group with its kept and deleted files', () => {
    const plan = renderPlan([{ digest, keep: '/keep.txt', delete: ['/d1.txt', '/d2.txt'] }]);

    expect(plan).toBe(
      '[1] 0123456789abcdef\n' +
      '    KEEP   /keep.txt\n' +
      '    DELETE /d1.txt\n' +
      '    DELETE /d2.txt\n' +
      '\n'
    );
  });

  it('should render statistics', () => {
    const text = renderStats(
      { filesScanned: 4, duplicateGroups: 1, duplicateFiles: 2, filesToDelete: 1, bytesToRecover: 2048 },
      { processedFiles: 4, skippedSymlinks: 1, errors: 0 },
      0
    );

    expect(text.split('\n')).toEqual([
      'Files scanned:     4',
      'Symlinks skipped:  1',
      'Scan errors:       0',
      'Hash errors:       0',
      'Duplicate groups:  1',
      'Duplicate files:   2',
      'Files to delete:   1',
      'Space to recover:  2.00 KB',
      ''
    ]);
  });

  it('should render failures and a deletion summary', () => {
    const text = renderDeletion({
      successCount: 1,
      failureCount: 1,
      results: [
        { path: '/ok.txt', success: true },
        { path: '/bad.txt', success: false, error: { kind: 'NotFound', message: 'File not found: /bad.txt: gone' } }
      ]
    }, false);

    expect(text).toBe('FAILED /bad.txt: File not found: /bad.txt: gone\nMoved 1 files to trash, 1 failed.\n');
  });

  it('should word a dry run differently', () => {
    expect(renderDeletion({ successCount: 2, failureCount: 0, results: [] }, true))
      .toBe('Would move 2 files to trash, 0 failed.\n');
  });
});

describe('progress', () => {
  it('should draw a ten-block bar', () => {
    expect(renderBar(0)).toBe('[░░░░░░░░░░] 0%');
    expect(renderBar(45)).toBe('[████░░░░░░] 45%');
    expect(renderBar(100)).toBe('[██████████] 100%');
    expect(renderBar(150)).toBe('[██████████] 100%');
  });

  it('should stay quiet when disabled', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      const reporter = createProgressReporter(false);
      reporter.startScanning(10);
      reporter.updateHashing(50);
      reporter.endHashing();

      expect(write).not.toHaveBeenCalled();
    } finally {
      write.mockRestore();
    }
  });
});

describe('logger', () => {
  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });

  it('should drop messages below its level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const logger = createLogger('warn');
      logger.info('hidden');
      logger.warn('shown', 42);

      expect(error).toHaveBeenCalledTimes(1);
      const [prefix, message, extra] = error.mock.calls[0];
      expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN:$/);
      expect(message).toBe('shown');
      expect(extra).toBe(42);
    } finally {
      error.mockRestore();
    }
  });
});
