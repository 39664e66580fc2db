/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, readFile, readdir, lstat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { join } from 'node:path';
import { errorCode } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Check whether anything exists at a path (without following a final symlink)
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export interface FileHashOptions {
  algorithm?: 'md5' | 'sha1' | 'sha256';
  // Files up to this size are read in one call
  smallFileThreshold?: number;
  // Read size for streamed files
  chunkSize?: number;
}

/**
 * Calculate the hash of a file.
 * Larger files are streamed so memory stays bounded by the chunk size.
 */
export async function calculateFileHash(
  filePath: string,
  options: FileHashOptions = {}
): Promise<string> {
  const algorithm = options.algorithm ?? 'sha256';
  const smallFileThreshold = options.smallFileThreshold ?? 8192;
  const chunkSize = options.chunkSize ?? 64 * 1024;

  const hash = createHash(algorithm);
  const stats = await lstat(filePath);

  if (stats.size <= smallFileThreshold) {
    hash.update(await readFile(filePath));
    return hash.digest('hex');
  }

  const stream = createReadStream(filePath, { highWaterMark: chunkSize });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export interface TreeEntry {
  path: string;
  stats: Stats;
}

export interface WalkOptions {
  // Called for directories that cannot be read; the walk continues
  onError?: (path: string, error: unknown) => void;
  // Directories for which this returns true are not descended into
  skipDirectory?: (path: string) => boolean;
  signal?: AbortSignal;
}

/**
 * Walk a directory tree depth-first in name order, yielding every entry
 * below the root (not the root itself). Symlinks are yielded, never followed.
 */
export async function* walkTree(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<TreeEntry> {
  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    options.onError?.(root, error);
    return;
  }

  names.sort();

  for (const name of names) {
    if (options.signal?.aborted) {
      return;
    }

    const fullPath = join(root, name);
    let stats: Stats;
    try {
      stats = await lstat(fullPath);
    } catch (error) {
      options.onError?.(fullPath, error);
      continue;
    }

    yield { path: fullPath, stats };

    if (stats.isDirectory() && !options.skipDirectory?.(fullPath)) {
      yield* walkTree(fullPath, options);
    }
  }
}

/**
 * Collect every regular file below a root
 */
export async function listRegularFiles(
  root: string,
  options: WalkOptions = {}
): Promise<TreeEntry[]> {
  const files: TreeEntry[] = [];
  for await (const entry of walkTree(root, options)) {
    if (entry.stats.isFile()) {
      files.push(entry);
    }
  }
  return files;
}
