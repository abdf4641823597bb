/**
 * Path Mapper
 * 
 * Maps local watched paths to the storage keys used by the targets.
 * Keys are relative to the project root and always use `/` separators.
 */

import { resolve, relative } from 'node:path';
import { isWithin, toPosixPath } from '@dashsync/utils';

export class PathMapper {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  get root(): string {
    return this.basePath;
  }

  /**
   * Get the relative path from base.
   * Paths outside the base are passed through in normalized form.
   */
  getRelativePath(absolutePath: string): string {
    const resolved = resolve(absolutePath);

    if (isWithin(this.basePath, resolved)) {
      return toPosixPath(relative(this.basePath, resolved));
    }

    return toPosixPath(resolved);
  }
}
