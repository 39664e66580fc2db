/**
 * Unique Naming
 * 
 * Finds a free file name in a folder by appending `_N` before the extension.
 */

import { join } from 'node:path';
import { pathExists, splitFileName } from '@sortwell/utils';
import { UniqueNameExhaustedError } from '@sortwell/core';

export const DEFAULT_MAX_SUFFIX = 999;

/**
 * `report.pdf`, 2 -> `report_2.pdf`
 */
export function buildSuffixedName(fileName: string, counter: number): string {
  const { base, extension } = splitFileName(fileName);
  return `${base}_${counter}${extension}`;
}

/**
 * Return `folder/fileName` if free, otherwise the first free `_N` variant.
 * Throws UniqueNameExhaustedError once `maxSuffix` variants are taken.
 */
export async function resolveAvailablePath(
  folder: string,
  fileName: string,
  maxSuffix: number = DEFAULT_MAX_SUFFIX,
  exists: (path: string) => Promise<boolean> = pathExists
): Promise<string> {
  const target = join(folder, fileName);
  if (!(await exists(target))) {
    return target;
  }

  for (let counter = 1; counter <= maxSuffix; counter++) {
    const candidate = join(folder, buildSuffixedName(fileName, counter));
    if (!(await exists(candidate))) {
      return candidate;
    }
  }

  throw new UniqueNameExhaustedError(target, maxSuffix);
}
