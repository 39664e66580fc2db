/**
 * Path Utilities
 */

import { basename, relative, isAbsolute, resolve, sep } from 'node:path';

/**
 * Get file extension: the text after the last dot of the name, lowercased.
 * Returns null when the name has no dot or ends with one.
 */
export function getExtension(filePath: string): string | null {
  const name = basename(filePath);
  const dotIndex = name.lastIndexOf('.');
  if (dotIndex === -1 || dotIndex === name.length - 1) {
    return null;
  }
  return name.substring(dotIndex + 1).toLowerCase();
}

/**
 * Split a file name into base and extension (with its dot).
 * A leading dot is part of the base, so `.bashrc` has no extension.
 */
export function splitFileName(fileName: string): { base: string; extension: string } {
  const dotIndex = fileName.lastIndexOf('.');
  if (dotIndex > 0) {
    return {
      base: fileName.substring(0, dotIndex),
      extension: fileName.substring(dotIndex),
    };
  }
  return { base: fileName, extension: '' };
}

/**
 * True when `child` is `parent` itself or lies somewhere beneath it
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}
