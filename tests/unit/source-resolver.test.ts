import { fileURLToPath } from 'url';
import { join, relative } from 'path';
import { describe, expect, it } from 'vitest';

import { SourceResolver } from '../../src/parser/source-resolver.js';
import { createDefaultFilterConfig, createNoTestsFilterConfig } from '../../src/types/filter.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/project', import.meta.url));

async function resolveRelative(resolver: SourceResolver): Promise<string[]> {
  const files = await resolver.resolve();
  return files.map((file) => relative(FIXTURES, file).split('\\').join('/'));
}

describe('SourceResolver', () => {
  it('finds every Python file below a directory in sorted order', async () => {
    const files = await resolveRelative(new SourceResolver(FIXTURES, createDefaultFilterConfig()));

    expect(files).toEqual(['broken_syntax.py', 'clean.py', 'pkg/undocumented.py', 'tests/test_thing.py']);
  });

  it('drops test files and test directories when asked to', async () => {
    const files = await resolveRelative(new SourceResolver(FIXTURES, createNoTestsFilterConfig()));

    expect(files).toEqual(['broken_syntax.py', 'clean.py', 'pkg/undocumented.py']);
  });

  it('applies include and exclude patterns', async () => {
    const excluding = { ...createDefaultFilterConfig(), excludePatterns: ['pkg/**', 'tests/**'] };
    expect(await resolveRelative(new SourceResolver(FIXTURES, excluding))).toEqual([
      'broken_syntax.py',
      'clean.py',
    ]);

    const including = { ...createDefaultFilterConfig(), includePatterns: ['pkg/**/*.py'] };
    expect(await resolveRelative(new SourceResolver(FIXTURES, including))).toEqual(['pkg/undocumented.py']);
  });

  it('returns a single file path as is', async () => {
    const file = join(FIXTURES, 'clean.py');

    expect(await new SourceResolver(file, createDefaultFilterConfig()).resolve()).toEqual([file]);
  });

  it('rejects paths that do not exist', async () => {
    const resolver = new SourceResolver(join(FIXTURES, 'missing'), createDefaultFilterConfig());

    await expect(resolver.resolve()).rejects.toThrow(/Path does not exist/);
  });
});
