/**
 * Path Filter
 *
 * Decides whether a changed path should trigger a rebuild.
 */

import * as path from 'path';
import * as micromatch from 'micromatch';
import { MANIFEST_FILES } from '../config/types';
import { normalizeExt } from '../config/config-loader';

export interface PathFilterOptions {
  /** Root that relative matching is done against */
  root: string;
  ignore: readonly string[];
  includeExt: readonly string[];
  excludeExt: readonly string[];
}

export class PathFilter {
  private readonly root: string;
  private readonly ignore: string[];
  private readonly includeExt: Set<string>;
  private readonly excludeExt: Set<string>;

  constructor(options: PathFilterOptions) {
    this.root = options.root;
    this.ignore = [...options.ignore];
    this.includeExt = new Set(options.includeExt.map(normalizeExt));
    this.excludeExt = new Set(options.excludeExt.map(normalizeExt));
  }

  /**
   * Path relative to the root with forward slashes; absolute paths outside
   * the root are kept absolute.
   */
  toMatchPath(filePath: string): string {
    const absolute = path.resolve(this.root, filePath);
    const relative = path.relative(this.root, absolute);
    const chosen = relative.startsWith('..') || path.isAbsolute(relative) ? absolute : relative;
    return chosen.split(path.sep).join('/');
  }

  isIgnored(filePath: string): boolean {
    const candidate = this.toMatchPath(filePath);
    if (this.ignore.length === 0 || candidate === '') {
      return false;
    }
    return micromatch.isMatch(candidate, this.ignore, { dot: true });
  }

  /**
   * Manifest files are always relevant. Otherwise the extension decides:
   * none or excluded means no, included means yes.
   */
  isRelevantExtension(filePath: string): boolean {
    const base = path.basename(filePath);
    if (MANIFEST_FILES.includes(base)) {
      return true;
    }

    const ext = normalizeExt(path.extname(base));
    if (ext === '') {
      return false;
    }
    if (this.excludeExt.has(ext)) {
      return false;
    }
    return this.includeExt.has(ext);
  }

  accepts(filePath: string): boolean {
    return !this.isIgnored(filePath) && this.isRelevantExtension(filePath);
  }
}
