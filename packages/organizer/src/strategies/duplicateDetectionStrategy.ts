/**
 * Duplicate Detection Strategy
 * 
 * Groups files by SHA-256 digest. Every scan starts from an empty map, so no
 * state survives between firings. Equal digests are treated as equal content;
 * there is no byte-by-byte confirmation.
 * 
 * With `autoRemove`, one survivor per group is chosen by the keep strategy
 * and the others are quarantined (moved) or deleted.
 */

import { unlink } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DuplicateRules, KeepStrategy } from '@sortwell/core';
import {
  calculateFileHash,
  createLogger,
  formatMegabytes,
  isWithin,
  listRegularFiles,
  type TreeEntry,
} from '@sortwell/utils';
import type { FileTransferResolver } from '../transfer/index.js';
import type { ScanContext, ScheduledStrategy } from './types.js';

const log = createLogger({ component: 'duplicates' });

// Read whole below this size, stream above it
const SMALL_FILE_THRESHOLD = 8 * 1024;
const HASH_CHUNK_SIZE = 64 * 1024;

const SYSTEM_FILES = new Set(['.ds_store', 'thumbs.db', 'desktop.ini']);

export interface FileRecord {
  readonly path: string;
  readonly size: number;
  readonly lastModified: number;
  readonly digest: string;
}

export interface DuplicateGroup {
  readonly digest: string;
  // First-seen order
  readonly files: readonly FileRecord[];
  readonly wastedBytes: number;
}

export interface DuplicateScanResult {
  scannedFiles: number;
  scannedBytes: number;
  groups: DuplicateGroup[];
  duplicateFiles: number;
  wastedBytes: number;
  durationMs: number;
}

export interface RemediationResult {
  kept: string;
  quarantined: string[];
  deleted: string[];
  failed: string[];
}

/**
 * Pick the member of a group that stays. Ties keep the first-seen file.
 */
export function selectSurvivor(files: readonly FileRecord[], strategy: KeepStrategy): FileRecord {
  const [first, ...rest] = files;
  if (!first) {
    throw new Error('Cannot select a survivor from an empty group');
  }

  switch (strategy) {
    case 'NEWEST':
      return rest.reduce((kept, file) => (file.lastModified > kept.lastModified ? file : kept), first);
    case 'OLDEST':
      return rest.reduce((kept, file) => (file.lastModified < kept.lastModified ? file : kept), first);
    case 'MANUAL':
      return first;
  }
}

export class DuplicateDetectionStrategy implements ScheduledStrategy {
  readonly name = 'duplicate-detection';

  constructor(
    private readonly rules: DuplicateRules,
    private readonly resolver: FileTransferResolver
  ) {}

  async execute(context: ScanContext): Promise<void> {
    log.info('Starting duplicate scan');

    const result = await this.scan(context.monitorFolders, context.signal);
    this.report(result);

    if (!this.rules.autoRemove) {
      return;
    }

    for (const group of result.groups) {
      if (context.signal.aborted) {
        break;
      }
      await this.remediate(group);
    }
  }

  /**
   * Hash every relevant file and return the groups with more than one member
   */
  async scan(folders: readonly string[], signal?: AbortSignal): Promise<DuplicateScanResult> {
    const startTime = Date.now();
    const byDigest = new Map<string, FileRecord[]>();
    const quarantine = this.rules.duplicatesDestination;
    let scannedFiles = 0;
    let scannedBytes = 0;

    for (const folder of folders) {
      if (signal?.aborted) {
        break;
      }

      const files = await listRegularFiles(folder, {
        signal,
        skipDirectory: (dir) => quarantine !== '' && isWithin(quarantine, dir),
        onError: (path, error) => log.debug({ err: error, path }, 'Cannot access path'),
      });

      for (const file of files) {
        if (signal?.aborted) {
          break;
        }
        if (!this.isRelevant(file)) {
          continue;
        }

        const record = await this.toRecord(file);
        if (!record) {
          continue;
        }

        const group = byDigest.get(record.digest);
        if (group) {
          group.push(record);
        } else {
          byDigest.set(record.digest, [record]);
        }
        scannedFiles++;
        scannedBytes += record.size;
      }
    }

    const groups: DuplicateGroup[] = [];
    for (const [digest, files] of byDigest) {
      if (files.length > 1) {
        const size = files[0]?.size ?? 0;
        groups.push({ digest, files, wastedBytes: size * (files.length - 1) });
      }
    }

    return {
      scannedFiles,
      scannedBytes,
      groups,
      duplicateFiles: groups.reduce((sum, group) => sum + group.files.length, 0),
      wastedBytes: groups.reduce((sum, group) => sum + group.wastedBytes, 0),
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Keep one member of the group; quarantine or delete the rest
   */
  async remediate(group: DuplicateGroup): Promise<RemediationResult> {
    const survivor = selectSurvivor(group.files, this.rules.keepStrategy);
    const result: RemediationResult = { kept: survivor.path, quarantined: [], deleted: [], failed: [] };
    const quarantine = this.rules.duplicatesDestination;

    for (const file of group.files) {
      if (file === survivor) {
        continue;
      }

      if (quarantine !== '') {
        const moved = await this.resolver.move(file.path, quarantine);
        if (moved.status === 'moved') {
          result.quarantined.push(moved.destination);
        } else {
          result.failed.push(file.path);
        }
        continue;
      }

      try {
        await unlink(file.path);
        result.deleted.push(file.path);
        log.info({ path: file.path, kept: survivor.path }, 'Duplicate removed');
      } catch (error) {
        result.failed.push(file.path);
        log.error({ err: error, path: file.path }, 'Duplicate removal failed');
      }
    }

    return result;
  }

  private isRelevant(file: TreeEntry): boolean {
    const size = file.stats.size;
    const { minFileSizeBytes, maxFileSizeBytes } = this.rules;

    if (minFileSizeBytes > 0 && size < minFileSizeBytes) {
      return false;
    }
    if (maxFileSizeBytes > 0 && size > maxFileSizeBytes) {
      return false;
    }

    const name = basename(file.path).toLowerCase();
    return !SYSTEM_FILES.has(name) && !name.startsWith('.');
  }

  private async toRecord(file: TreeEntry): Promise<FileRecord | null> {
    try {
      const digest = await calculateFileHash(file.path, {
        algorithm: 'sha256',
        smallFileThreshold: SMALL_FILE_THRESHOLD,
        chunkSize: HASH_CHUNK_SIZE,
      });
      return {
        path: file.path,
        size: file.stats.size,
        lastModified: file.stats.mtimeMs,
        digest,
      };
    } catch (error) {
      log.debug({ err: error, path: file.path }, 'Cannot hash file');
      return null;
    }
  }

  private report(result: DuplicateScanResult): void {
    for (const group of result.groups) {
      log.warn({
        digest: group.digest,
        count: group.files.length,
        wasted: formatMegabytes(group.wastedBytes),
        files: group.files.map((file) => file.path),
      }, 'Duplicates found');
    }

    log.info({
      scannedFiles: result.scannedFiles,
      scanned: formatMegabytes(result.scannedBytes),
      groups: result.groups.length,
      duplicateFiles: result.duplicateFiles,
      wasted: formatMegabytes(result.wastedBytes),
      durationMs: result.durationMs,
      duplicatePercent: result.scannedBytes > 0
        ? Number(((result.wastedBytes * 100) / result.scannedBytes).toFixed(1))
        : 0,
    }, 'Duplicate scan report');
  }
}
