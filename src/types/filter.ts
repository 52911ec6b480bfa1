export interface FilterConfig {
  excludePatterns: string[];
  includePatterns: string[];
  excludeTestFiles: boolean;
  excludeTestsDirectory: boolean;
}

export const DEFAULT_INCLUDE_PATTERNS = ['**/*.py'];

export function createDefaultFilterConfig(): FilterConfig {
  return {
    excludePatterns: [],
    includePatterns: [],
    excludeTestFiles: false,
    excludeTestsDirectory: false,
  };
}

export function createNoTestsFilterConfig(): FilterConfig {
  return {
    excludePatterns: [],
    includePatterns: [],
    excludeTestFiles: true,
    excludeTestsDirectory: true,
  };
}
