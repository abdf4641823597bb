/**
 * Path Utilities
 */

import { extname, relative, isAbsolute, sep } from 'node:path';

/**
 * Convert any platform path to forward-slash form
 */
export function toPosixPath(path: string): string {
  return sep === '\\' ? path.split(sep).join('/') : path.replace(/\\/g, '/');
}

/**
 * Check whether `child` is `parent` itself or lies beneath it
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Get file extension (lowercase, with dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}
