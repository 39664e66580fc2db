import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { loadConfiguration, parseConfiguration } from './loader.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('parseConfiguration', () => {
  it('applies defaults and normalizes rules', () => {
    const config = parseConfiguration(
      {
        monitorFolders: ['inbox', '/abs/downloads'],
        seitonRules: [
          { name: 'Docs', extensions: ['.PDF', 'pdf', 'Txt'], destination: 'docs' },
        ],
      },
      '/base'
    );

    expect(config.monitorFolders).toEqual(['/base/inbox', '/abs/downloads']);
    expect(config.seitonRules).toEqual([
      { name: 'Docs', extensions: ['pdf', 'txt'], destination: '/base/docs' },
    ]);
    expect(config.seiriConfig.enabled).toBe(false);
    expect(config.seisoConfig.timeUnit).toBe('MINUTES');
    expect(config.duplicateDetectionConfig.period).toBe(60);
    expect(config.duplicateDetectionConfig.rules).toEqual({
      minFileSizeBytes: 0,
      maxFileSizeBytes: 0,
      autoRemove: false,
      duplicatesDestination: '',
      keepStrategy: 'NEWEST',
    });
  });

  it('returns a deeply frozen value', () => {
    const config = parseConfiguration(
      { monitorFolders: ['inbox'], seitonRules: [{ name: 'a', extensions: ['jpg'], destination: 'img' }] },
      '/base'
    );

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.seitonRules[0])).toBe(true);
    expect(Object.isFrozen(config.duplicateDetectionConfig.rules)).toBe(true);
  });

  it('accepts keep strategies in any case', () => {
    const config = parseConfiguration(
      {
        monitorFolders: ['inbox'],
        duplicateDetectionConfig: { enabled: true, rules: { keepStrategy: 'oldest' } },
      },
      '/base'
    );

    expect(config.duplicateDetectionConfig.rules.keepStrategy).toBe('OLDEST');
  });

  it('resolves scheduled-task paths against the base directory', () => {
    const config = parseConfiguration(
      {
        monitorFolders: ['inbox'],
        seiriConfig: {
          enabled: true,
          rules: { moveFilesNotAccessedForDays: { days: 30, destination: 'archive' } },
        },
        seisoConfig: {
          enabled: true,
          rules: { cleanTemporaryFolders: { folders: ['tmp', '/var/scratch'] } },
        },
      },
      '/base'
    );

    expect(config.seiriConfig.rules.moveFilesNotAccessedForDays).toEqual({
      enabled: true,
      days: 30,
      destination: '/base/archive',
    });
    expect(config.seisoConfig.rules.cleanTemporaryFolders?.folders).toEqual([
      '/base/tmp',
      '/var/scratch',
    ]);
  });

  it('requires at least one monitored folder', () => {
    expect(issuesOf(() => parseConfiguration({ monitorFolders: [] }, '/base'))).toEqual([
      'monitorFolders: at least one folder must be monitored',
    ]);
  });

  it('rejects blank rule destinations', () => {
    const issues = issuesOf(() =>
      parseConfiguration(
        { monitorFolders: ['inbox'], seitonRules: [{ name: 'x', extensions: ['a'], destination: '  ' }] },
        '/base'
      )
    );

    expect(issues).toEqual(['seitonRules.0.destination: must not be blank']);
  });

  it('requires the rules of enabled scheduled tasks', () => {
    const issues = issuesOf(() =>
      parseConfiguration(
        {
          monitorFolders: ['inbox'],
          seiriConfig: { enabled: true },
          seisoConfig: { enabled: true },
        },
        '/base'
      )
    );

    expect(issues).toEqual([
      'seiriConfig.rules.moveFilesNotAccessedForDays: required when seiriConfig is enabled',
      'seisoConfig.rules.cleanTemporaryFolders: required when seisoConfig is enabled',
    ]);
  });

  it('rejects inverted size bounds', () => {
    const issues = issuesOf(() =>
      parseConfiguration(
        {
          monitorFolders: ['inbox'],
          duplicateDetectionConfig: { rules: { minFileSizeBytes: 100, maxFileSizeBytes: 10 } },
        },
        '/base'
      )
    );

    expect(issues).toEqual([
      'duplicateDetectionConfig.rules.maxFileSizeBytes: must not be smaller than minFileSizeBytes',
    ]);
  });

  it('rejects non-positive periods', () => {
    const issues = issuesOf(() =>
      parseConfiguration({ monitorFolders: ['inbox'], seisoConfig: { period: 0 } }, '/base')
    );

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^seisoConfig\.period: /);
  });
});

describe('loadConfiguration', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sortwell-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('loads a file and resolves paths beside it', async () => {
    await mkdir(join(root, 'inbox'));
    const file = join(root, 'sortwell.json');
    await writeFile(file, JSON.stringify({
      monitorFolders: ['./inbox'],
      seitonRules: [{ name: 'images', extensions: ['jpg'], destination: './pictures' }],
    }));

    const config = await loadConfiguration(file);

    expect(config.monitorFolders).toEqual([join(root, 'inbox')]);
    expect(config.seitonRules[0]?.destination).toBe(join(root, 'pictures'));
  });

  it('reports a missing file', async () => {
    await expect(loadConfiguration(join(root, 'absent.json'))).rejects.toMatchObject({
      name: 'ConfigurationError',
      issues: ['cannot read file (ENOENT)'],
    });
  });

  it('reports malformed JSON', async () => {
    const file = join(root, 'broken.json');
    await writeFile(file, '{ "monitorFolders": [');

    const error = await loadConfiguration(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^malformed JSON: /);
    }
  });

  it('rejects monitored folders that do not exist or are files', async () => {
    await writeFile(join(root, 'plain.txt'), 'x');
    const file = join(root, 'sortwell.json');
    await writeFile(file, JSON.stringify({ monitorFolders: ['missing', 'plain.txt'] }));

    await expect(loadConfiguration(file)).rejects.toMatchObject({
      issues: [
        `monitorFolders: cannot access ${join(root, 'missing')} (ENOENT)`,
        `monitorFolders: not a directory: ${join(root, 'plain.txt')}`,
      ],
    });
  });
});
