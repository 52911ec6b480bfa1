import { existsSync, statSync } from 'fs';
import { basename, relative, resolve, sep } from 'path';
import { glob } from 'glob';
import { DEFAULT_INCLUDE_PATTERNS } from '../types/filter.js';
import type { FilterConfig } from '../types/filter.js';

const TEST_FILE_RE = /^(test_.*|.*_test|conftest)\.py$/;
const TEST_DIRECTORIES = new Set(['tests', 'test']);

/**
 * Finds the Python sources to lint below a file or directory.
 */
export class SourceResolver {
  private rootPath: string;
  private filter: FilterConfig;

  constructor(rootPath: string, filter: FilterConfig) {
    this.rootPath = resolve(rootPath);
    this.filter = filter;
  }

  async resolve(): Promise<string[]> {
    if (!existsSync(this.rootPath)) {
      throw new Error(`Path does not exist: ${this.rootPath}`);
    }

    if (statSync(this.rootPath).isFile()) {
      return [this.rootPath];
    }

    const patterns =
      this.filter.includePatterns.length > 0 ? this.filter.includePatterns : DEFAULT_INCLUDE_PATTERNS;
    const matches = await glob(patterns, {
      cwd: this.rootPath,
      absolute: true,
      nodir: true,
      ignore: this.filter.excludePatterns,
    });

    return matches.filter((filePath) => this.isIncluded(filePath)).sort();
  }

  private isIncluded(filePath: string): boolean {
    if (this.filter.excludeTestFiles && TEST_FILE_RE.test(basename(filePath))) {
      return false;
    }

    if (this.filter.excludeTestsDirectory) {
      const directories = relative(this.rootPath, filePath).split(sep).slice(0, -1);
      if (directories.some((dir) => TEST_DIRECTORIES.has(dir))) {
        return false;
      }
    }

    return true;
  }
}
