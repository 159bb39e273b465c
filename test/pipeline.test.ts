import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { calculateStats, findDuplicateDecisions } from '../src/pipeline';
import { silentLogger } from '../src/logger';
import type { ProgressReporter } from '../src/progress';
import type { DuplicateGroup } from '../src/types';
import { createTempDir, cleanupTempDir, createTestFile, record } from './setup';

describe('calculateStats', () => {
  it('should return zeros when there are no decisions', () => {
    expect(calculateStats([], new Map(), 7)).toEqual({
      filesScanned: 7,
      duplicateGroups: 0,
      duplicateFiles: 0,
      filesToDelete: 0,
      bytesToRecover: 0
    });
  });

  it('should count files and recoverable bytes per group', () => {
    const groups = new Map<string, DuplicateGroup>([
      ['d1', { digest: 'd1', members: [record('/a', 1, 100), record('/b', 2, 100), record('/c', 3, 100)] }],
      ['d2', { digest: 'd2', members: [record('/x', 1, 5), record('/y', 2, 5)] }]
    ]);

    const stats = calculateStats(
      [
        { digest: 'd1', keep: '/c', delete: ['/b', '/a'] },
        { digest: 'd2', keep: '/y', delete: ['/x'] }
      ],
      groups,
      10
    );

    expect(stats).toEqual({
      filesScanned: 10,
      duplicateGroups: 2,
      duplicateFiles: 5,
      filesToDelete: 3,
      bytesToRecover: 205
    });
  });
});

describe('findDuplicateDecisions', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should return empty results for an empty directory', async () => {
    const result = await findDuplicateDecisions(tempDir, { logger: silentLogger });

    expect(result.decisions).toEqual([]);
    expect(result.groups.size).toBe(0);
    expect(result.hashErrors).toEqual([]);
    expect(result.scan).toEqual({ processedFiles: 0, skippedSymlinks: 0, errors: 0 });
  });

  it('should summarise the scan', async () => {
    await createTestFile(path.join(tempDir, 'a.txt'), 'Hello, World!');
    await createTestFile(path.join(tempDir, 'b.txt'), 'Hello, World!');
    await createTestFile(path.join(tempDir, 'c.txt'), 'unique');

    const result = await findDuplicateDecisions(tempDir, { logger: silentLogger });

    expect(result.stats).toEqual({
      filesScanned: 3,
      duplicateGroups: 1,
      duplicateFiles: 2,
      filesToDelete: 1,
      bytesToRecover: 13
    });
  });

  it('should reject invalid options before scanning', async () => {
    await expect(
      findDuplicateDecisions(tempDir, { concurrency: -1, logger: silentLogger })
    ).rejects.toMatchObject({ kind: 'InvalidArgument' });
  });

  it('should reject a missing root directory', async () => {
    await expect(
      findDuplicateDecisions(path.join(tempDir, 'missing'), { logger: silentLogger })
    ).rejects.toMatchObject({ kind: 'InvalidArgument' });
  });

  it('should drive a progress reporter through both phases', async () => {
    await createTestFile(path.join(tempDir, 'a.txt'), 'same');
    await createTestFile(path.join(tempDir, 'b.txt'), 'same');
    const events: string[] = [];
    const progress: ProgressReporter = {
      startScanning: (total) => events.push(`scan:start ${total}`),
      updateScanning: () => {},
      endScanning: (summary) => events.push(`scan:end ${summary.processedFiles}`),
      startHashing: (candidates) => events.push(`hash:start ${candidates}`),
      updateHashing: (percent) => events.push(`hash ${percent}`),
      endHashing: () => events.push('hash:end')
    };

    await findDuplicateDecisions(tempDir, { progress, concurrency: 1, logger: silentLogger });

    expect(events).toEqual([
      'scan:start 2',
      'scan:end 2',
      'hash:start 2',
      'hash 50',
      'hash 100',
      'hash:end'
    ]);
  });
});
