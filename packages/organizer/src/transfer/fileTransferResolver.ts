/**
 * File Transfer Resolver
 * 
 * Moves a single file into a destination folder.
 * 
 * - Creates the destination folder (and parents) when missing
 * - Never overwrites: a taken name becomes `name_1.ext`, `name_2.ext`, ...
 *   Files are linked into place, so a name claimed after the check is
 *   detected (EEXIST) and the next suffix is tried
 * - Falls back to copy + unlink across devices
 * - Failures are logged and reported; the source stays where it was
 */

import { copyFile, link, rename, rm, unlink, constants } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import { createLogger, ensureDir, errorCode, pathExists } from '@sortwell/utils';
import { FileTransferError } from '@sortwell/core';
import { DEFAULT_MAX_SUFFIX, resolveAvailablePath } from './uniqueName.js';

const log = createLogger({ component: 'file-transfer' });

export type TransferResult =
  | { status: 'moved'; source: string; destination: string; renamed: boolean }
  | { status: 'unchanged'; source: string }
  | { status: 'failed'; source: string; error: FileTransferError };

export interface FileTransferResolverConfig {
  // Highest `_N` suffix tried before giving up
  maxSuffix?: number;

  // Name lookup used before each attempt
  exists?: (path: string) => Promise<boolean>;
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);

// link() errors meaning the filesystem has no hard links
const NO_HARD_LINK_CODES = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP']);

export class FileTransferResolver {
  private readonly maxSuffix: number;
  private readonly exists: (path: string) => Promise<boolean>;

  constructor(config: FileTransferResolverConfig = {}) {
    this.maxSuffix = config.maxSuffix ?? DEFAULT_MAX_SUFFIX;
    this.exists = config.exists ?? pathExists;
  }

  /**
   * Move `source` into `destinationFolder`, keeping its name when free
   */
  async move(source: string, destinationFolder: string): Promise<TransferResult> {
    const folder = resolve(destinationFolder);

    // Already there; renaming it would only produce `name_1` copies of itself
    if (dirname(resolve(source)) === folder) {
      log.debug({ path: source }, 'File already in destination folder');
      return { status: 'unchanged', source };
    }

    try {
      await ensureDir(folder);
      const fileName = basename(source);
      const target = await this.place(source, folder, fileName);
      const renamed = basename(target) !== fileName;

      if (renamed) {
        log.info({ path: source, target }, 'Name taken in destination, used unique name');
      }

      log.info({ path: source, target }, 'File moved');
      return { status: 'moved', source, destination: target, renamed };
    } catch (error) {
      const failure = new FileTransferError(source, folder, error);
      const code = errorCode(error);

      if (code !== undefined && PERMISSION_CODES.has(code)) {
        log.error({ err: failure, path: source, code }, 'Permission denied while moving file; left in place');
      } else {
        log.error({ err: failure, path: source, code }, 'Failed to move file; left in place');
      }

      return { status: 'failed', source, error: failure };
    }
  }

  /**
   * Relocate into the first free name, moving on when a name is claimed
   * between the lookup and the move
   */
  private async place(source: string, folder: string, fileName: string): Promise<string> {
    const claimed = new Set<string>();
    const taken = async (path: string) => claimed.has(path) || (await this.exists(path));

    for (;;) {
      const target = await resolveAvailablePath(folder, fileName, this.maxSuffix, taken);
      try {
        await this.relocate(source, target);
        return target;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
        claimed.add(target);
        log.debug({ path: source, target }, 'Name claimed during move; trying the next one');
      }
    }
  }

  private async relocate(source: string, target: string): Promise<void> {
    try {
      // Fails with EEXIST instead of replacing an existing target
      await link(source, target);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EXDEV') {
        await this.copyAcross(source, target);
        return;
      }
      if (code === undefined || !NO_HARD_LINK_CODES.has(code)) {
        throw error;
      }
      await rename(source, target);
      return;
    }

    try {
      await unlink(source);
    } catch (error) {
      // Target is a second link to the source; dropping it restores the original state
      await rm(target, { force: true });
      throw error;
    }
  }

  // Different filesystem: copy, then drop the source. Roll back the copy on failure.
  private async copyAcross(source: string, target: string): Promise<void> {
    let copied = false;
    try {
      await copyFile(source, target, constants.COPYFILE_EXCL);
      copied = true;
      await unlink(source);
    } catch (error) {
      // EEXIST before copying means the target belongs to someone else
      if (copied || errorCode(error) !== 'EEXIST') {
        await rm(target, { force: true });
      }
      throw error;
    }
  }
}
