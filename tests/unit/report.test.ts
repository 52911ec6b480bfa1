import { describe, expect, it } from 'vitest';

import { FileReport, Report } from '../../src/analysis/report.js';
import { errorDiagnostic, warningDiagnostic } from '../../src/types/diagnostic.js';
import type { ModuleSignature } from '../../src/types/signature.js';

function moduleNode(name: string): ModuleSignature {
  return { kind: 'module', name, filePath: `/src/${name}`, line: 0, docstring: null, isPrivate: false, children: [] };
}

const location = { name: 'foo.py', line: 0 };

describe('FileReport', () => {
  it('starts empty', () => {
    const fileReport = new FileReport('somefile.py');

    expect(fileReport.filePath).toBe('somefile.py');
    expect(fileReport.nodes).toEqual([]);
    expect(fileReport.errorCount).toBe(0);
    expect(fileReport.warningCount).toBe(0);
    expect(fileReport.hasIssues()).toBe(false);
  });

  it('tallies errors and warnings per added node', () => {
    const fileReport = new FileReport('somefile.py');
    const node = moduleNode('foo.py');
    fileReport.add(node, [
      errorDiagnostic('missing-module-docstring', 'error', location),
      warningDiagnostic('unknown-field', 'warning1', location),
      warningDiagnostic('duplicate-field', 'warning2', location),
    ]);

    expect(fileReport.nodes[0]?.node).toBe(node);
    expect(fileReport.errorCount).toBe(1);
    expect(fileReport.warningCount).toBe(2);
    expect(fileReport.hasIssues()).toBe(true);
  });
});

describe('Report', () => {
  it('sums counts over files and merges partial reports', () => {
    const first = new FileReport('a.py');
    first.add(moduleNode('a.py'), [errorDiagnostic('missing-module-docstring', 'missing', location)]);
    const second = new FileReport('b.py');
    second.add(moduleNode('b.py'), [
      warningDiagnostic('unknown-field', 'w1', location),
      warningDiagnostic('unknown-field', 'w2', location),
    ]);

    const report = new Report();
    report.add(first);
    const partial = new Report();
    partial.add(second);
    partial.addUnanalyzable({ filePath: 'c.py', reason: 'syntax error at line 1' });
    report.merge(partial);

    expect(report.files.map((file) => file.filePath)).toEqual(['a.py', 'b.py']);
    expect(report.unanalyzable).toEqual([{ filePath: 'c.py', reason: 'syntax error at line 1' }]);
    expect(report.errorCount).toBe(1);
    expect(report.warningCount).toBe(2);
    expect(report.hasIssues()).toBe(true);
  });

  it('has no issues when every file is clean', () => {
    const report = new Report();
    const clean = new FileReport('a.py');
    clean.add(moduleNode('a.py'), []);
    report.add(clean);

    expect(report.hasIssues()).toBe(false);
    expect(report.errorCount).toBe(0);
  });
});

describe('diagnostics', () => {
  it('are frozen once created', () => {
    const diagnostic = errorDiagnostic('missing-docstring', 'Docstring missing', { name: 'f', line: 2 });

    expect(Object.isFrozen(diagnostic)).toBe(true);
    expect(Object.isFrozen(diagnostic.location)).toBe(true);
  });
});
