/**
 * Temp Folder Cleanup Strategy (Seiso)
 * 
 * Empties each configured temp folder. Entries are removed deepest first so
 * directories are already empty when their turn comes; the folder itself is kept.
 */

import { rmdir, unlink } from 'node:fs/promises';
import type { CleanTempFoldersRule } from '@sortwell/core';
import { createLogger, pathExists, walkTree } from '@sortwell/utils';
import type { ScanContext, ScheduledStrategy } from './types.js';

const log = createLogger({ component: 'seiso' });

export interface CleanupResult {
  root: string;
  // In deletion order
  deleted: string[];
  failed: string[];
}

interface CleanupEntry {
  path: string;
  isDirectory: boolean;
}

/**
 * Reverse lexical order puts every child before its parent
 */
export function orderForDeletion<T extends { path: string }>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => (a.path < b.path ? 1 : a.path > b.path ? -1 : 0));
}

export class TempFolderCleanupStrategy implements ScheduledStrategy {
  readonly name = 'temp-folder-cleanup';

  constructor(private readonly rule: CleanTempFoldersRule) {}

  async execute(context: ScanContext): Promise<void> {
    if (!this.rule.enabled) {
      log.info('Temp folder cleanup rule is disabled');
      return;
    }

    for (const folder of this.rule.folders) {
      if (context.signal.aborted) {
        break;
      }
      await this.cleanFolder(folder, context.signal);
    }
  }

  async cleanFolder(root: string, signal?: AbortSignal): Promise<CleanupResult> {
    const result: CleanupResult = { root, deleted: [], failed: [] };

    let exists: boolean;
    try {
      exists = await pathExists(root);
    } catch (error) {
      // ENOTDIR, EACCES, ...: skip this folder, the others still get cleaned
      result.failed.push(root);
      log.error({ err: error, path: root }, 'Cannot access temp folder; skipping it');
      return result;
    }

    if (!exists) {
      log.warn({ path: root }, 'Temp folder does not exist');
      return result;
    }

    const entries: CleanupEntry[] = [];
    for await (const entry of walkTree(root, {
      signal,
      onError: (path, error) => log.error({ err: error, path }, 'Cannot read directory'),
    })) {
      entries.push({ path: entry.path, isDirectory: entry.stats.isDirectory() });
    }

    for (const entry of orderForDeletion(entries)) {
      if (signal?.aborted) {
        break;
      }
      try {
        if (entry.isDirectory) {
          await rmdir(entry.path);
        } else {
          await unlink(entry.path);
        }
        result.deleted.push(entry.path);
        log.debug({ path: entry.path }, 'Deleted');
      } catch (error) {
        result.failed.push(entry.path);
        log.warn({ err: error, path: entry.path }, 'Could not delete entry; it may be in use');
      }
    }

    log.info({ path: root, deleted: result.deleted.length, failed: result.failed.length }, 'Temp folder cleaned');
    return result;
  }
}
