import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileTransferResolver } from '../transfer/index.js';
import type { TransferResult } from '../transfer/index.js';
import { dispatchCreatedFile } from './dispatch.js';
import { ExtensionMoveStrategy } from './extensionMoveStrategy.js';
import type { RealtimeStrategy } from './types.js';

function fakeStrategy(name: string, extensions: string[]) {
  const apply = vi.fn(async (filePath: string): Promise<TransferResult> => ({
    status: 'unchanged',
    source: filePath,
  }));
  const matches = vi.fn((extension: string) => extensions.includes(extension));
  const strategy: RealtimeStrategy = { name, matches, apply };
  return { strategy, apply, matches };
}

describe('dispatchCreatedFile', () => {
  it('applies only the first matching rule', async () => {
    const first = fakeStrategy('documents', ['pdf']);
    const second = fakeStrategy('everything', ['pdf', 'txt']);

    const outcome = await dispatchCreatedFile('/in/report.PDF', [first.strategy, second.strategy]);

    expect(outcome?.strategy).toBe(first.strategy);
    expect(first.apply).toHaveBeenCalledWith('/in/report.PDF');
    expect(second.matches).not.toHaveBeenCalled();
    expect(second.apply).not.toHaveBeenCalled();
  });

  it('falls through to later rules', async () => {
    const first = fakeStrategy('documents', ['pdf']);
    const second = fakeStrategy('text', ['txt']);

    const outcome = await dispatchCreatedFile('/in/notes.txt', [first.strategy, second.strategy]);

    expect(outcome?.strategy).toBe(second.strategy);
    expect(first.apply).not.toHaveBeenCalled();
  });

  it('skips files without an extension', async () => {
    const rule = fakeStrategy('all', ['']);

    expect(await dispatchCreatedFile('/in/README', [rule.strategy])).toBeNull();
    expect(rule.matches).not.toHaveBeenCalled();
  });

  it('returns null when nothing matches', async () => {
    const rule = fakeStrategy('images', ['jpg']);
    expect(await dispatchCreatedFile('/in/song.mp3', [rule.strategy])).toBeNull();
  });

  it('contains a throwing rule', async () => {
    const strategy: RealtimeStrategy = {
      name: 'broken',
      matches: () => true,
      apply: async () => {
        throw new Error('boom');
      },
    };

    const outcome = await dispatchCreatedFile('/in/a.txt', [strategy]);

    expect(outcome).toEqual({ strategy });
  });
});

describe('ExtensionMoveStrategy', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sortwell-seiton-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('matches extensions regardless of case or leading dot', () => {
    const strategy = new ExtensionMoveStrategy(
      { name: 'docs', extensions: ['.PDF', 'Txt'], destination: '/docs' },
      new FileTransferResolver()
    );

    expect(strategy.matches('pdf')).toBe(true);
    expect(strategy.matches('TXT')).toBe(true);
    expect(strategy.matches('doc')).toBe(false);
  });

  it('moves the file into the rule destination', async () => {
    const inbox = join(root, 'inbox');
    const images = join(root, 'images');
    await mkdir(inbox);
    await writeFile(join(inbox, 'photo.jpg'), 'pixels');

    const strategy = new ExtensionMoveStrategy(
      { name: 'images', extensions: ['jpg'], destination: images },
      new FileTransferResolver()
    );
    const result = await strategy.apply(join(inbox, 'photo.jpg'));

    expect(result).toMatchObject({ status: 'moved', destination: join(images, 'photo.jpg') });
    expect(await readFile(join(images, 'photo.jpg'), 'utf8')).toBe('pixels');
  });
});
