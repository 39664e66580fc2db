import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdir, mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DuplicateRules } from '@sortwell/core';
import { pathExists } from '@sortwell/utils';
import { FileTransferResolver } from '../transfer/index.js';
import {
  DuplicateDetectionStrategy,
  selectSurvivor,
  type FileRecord,
} from './duplicateDetectionStrategy.js';

const baseRules: DuplicateRules = {
  minFileSizeBytes: 0,
  maxFileSizeBytes: 0,
  autoRemove: false,
  duplicatesDestination: '',
  keepStrategy: 'NEWEST',
};

let root: string;
let watch: string;

function strategyWith(overrides: Partial<DuplicateRules> = {}): DuplicateDetectionStrategy {
  return new DuplicateDetectionStrategy({ ...baseRules, ...overrides }, new FileTransferResolver());
}

function record(path: string, lastModified: number): FileRecord {
  return { path, size: 1, lastModified, digest: 'd' };
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'sortwell-dupes-'));
  watch = join(root, 'watch');
  await mkdir(join(watch, 'nested'), { recursive: true });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('selectSurvivor', () => {
  const files = [record('a', 100), record('b', 300), record('c', 300), record('d', 50)];

  it('keeps the most recently modified file, first seen on ties', () => {
    expect(selectSurvivor(files, 'NEWEST').path).toBe('b');
  });

  it('keeps the least recently modified file', () => {
    expect(selectSurvivor(files, 'OLDEST').path).toBe('d');
  });

  it('keeps the first-seen file for MANUAL', () => {
    expect(selectSurvivor(files, 'MANUAL').path).toBe('a');
  });

  it('rejects an empty group', () => {
    expect(() => selectSurvivor([], 'NEWEST')).toThrow('empty group');
  });
});

describe('DuplicateDetectionStrategy.scan', () => {
  beforeEach(async () => {
    await writeFile(join(watch, 'one.txt'), 'hello world');
    await writeFile(join(watch, 'two.txt'), 'hello world');
    await writeFile(join(watch, 'nested', 'three.txt'), 'hello world');
    await writeFile(join(watch, 'unique.txt'), 'something else');
    await writeFile(join(watch, '.hidden'), 'hello world');
    await writeFile(join(watch, 'Thumbs.db'), 'hello world');
  });

  it('groups identical content in first-seen order', async () => {
    const result = await strategyWith().scan([watch]);

    expect(result.scannedFiles).toBe(4);
    expect(result.scannedBytes).toBe(11 * 3 + 14);
    expect(result.groups).toHaveLength(1);

    const [group] = result.groups;
    expect(group?.digest).toBe(createHash('sha256').update('hello world').digest('hex'));
    expect(group?.files.map((file) => file.path)).toEqual([
      join(watch, 'nested', 'three.txt'),
      join(watch, 'one.txt'),
      join(watch, 'two.txt'),
    ]);
    expect(group?.wastedBytes).toBe(22);
    expect(result.duplicateFiles).toBe(3);
    expect(result.wastedBytes).toBe(22);
  });

  it('returns the same groups on a repeated scan', async () => {
    const strategy = strategyWith();
    const summarize = async () =>
      (await strategy.scan([watch])).groups.map((group) => group.files.map((file) => file.path));

    const first = await summarize();
    expect(await summarize()).toEqual(first);
  });

  it('honours the size bounds', async () => {
    expect((await strategyWith({ minFileSizeBytes: 12 }).scan([watch])).groups).toEqual([]);
    expect((await strategyWith({ maxFileSizeBytes: 5 }).scan([watch])).scannedFiles).toBe(0);
  });

  it('hashes large files by streaming', async () => {
    const content = Buffer.alloc(20_000, 7);
    await writeFile(join(watch, 'big-a.bin'), content);
    await writeFile(join(watch, 'big-b.bin'), content);

    const result = await strategyWith({ minFileSizeBytes: 1000 }).scan([watch]);

    expect(result.groups).toHaveLength(1);
    expect(result.groups[0]?.digest).toBe(createHash('sha256').update(content).digest('hex'));
    expect(result.groups[0]?.wastedBytes).toBe(20_000);
  });

  it('does not scan the quarantine folder', async () => {
    const quarantine = join(watch, 'nested');

    const result = await strategyWith({ duplicatesDestination: quarantine }).scan([watch]);

    expect(result.groups[0]?.files.map((file) => file.path)).toEqual([
      join(watch, 'one.txt'),
      join(watch, 'two.txt'),
    ]);
  });
});

describe('DuplicateDetectionStrategy remediation', () => {
  const context = () => ({
    monitorFolders: [watch],
    startedAt: new Date(),
    signal: new AbortController().signal,
  });

  it('only reports when autoRemove is off', async () => {
    await writeFile(join(watch, 'a.txt'), 'same');
    await writeFile(join(watch, 'b.txt'), 'same');

    await strategyWith({ autoRemove: false }).execute(context());

    expect(await pathExists(join(watch, 'a.txt'))).toBe(true);
    expect(await pathExists(join(watch, 'b.txt'))).toBe(true);
  });

  it('deletes every member but the survivor', async () => {
    await writeFile(join(watch, 'a.txt'), 'same');
    await writeFile(join(watch, 'b.txt'), 'same');
    await writeFile(join(watch, 'nested', 'c.txt'), 'same');

    await strategyWith({ autoRemove: true, keepStrategy: 'MANUAL' }).execute(context());

    expect(await pathExists(join(watch, 'a.txt'))).toBe(true);
    expect(await pathExists(join(watch, 'b.txt'))).toBe(false);
    expect(await pathExists(join(watch, 'nested', 'c.txt'))).toBe(false);
  });

  it('keeps the oldest file when asked to', async () => {
    await writeFile(join(watch, 'a.txt'), 'same');
    await writeFile(join(watch, 'b.txt'), 'same');
    const older = new Date('2020-01-01T00:00:00.000Z');
    await utimes(join(watch, 'b.txt'), older, older);

    await strategyWith({ autoRemove: true, keepStrategy: 'OLDEST' }).execute(context());

    expect(await pathExists(join(watch, 'a.txt'))).toBe(false);
    expect(await pathExists(join(watch, 'b.txt'))).toBe(true);
  });

  it('moves extra copies to the quarantine folder with unique names', async () => {
    const quarantine = join(root, 'quarantine');
    await mkdir(join(watch, 'x'));
    await writeFile(join(watch, 'dup.txt'), 'same');
    await writeFile(join(watch, 'nested', 'dup.txt'), 'same');
    await writeFile(join(watch, 'x', 'dup.txt'), 'same');

    const strategy = strategyWith({
      autoRemove: true,
      keepStrategy: 'MANUAL',
      duplicatesDestination: quarantine,
    });
    const [group] = (await strategy.scan([watch])).groups;
    if (!group) {
      throw new Error('expected a duplicate group');
    }

    const result = await strategy.remediate(group);

    expect(result).toEqual({
      kept: join(watch, 'dup.txt'),
      quarantined: [join(quarantine, 'dup.txt'), join(quarantine, 'dup_1.txt')],
      deleted: [],
      failed: [],
    });
    expect(await pathExists(join(watch, 'dup.txt'))).toBe(true);
    expect(await pathExists(join(watch, 'x', 'dup.txt'))).toBe(false);
  });
});
