import type { Diagnostic } from '../types/diagnostic.js';
import type { SignatureNode } from '../types/signature.js';

export interface NodeReport {
  node: SignatureNode;
  diagnostics: readonly Diagnostic[];
}

export interface UnanalyzableUnit {
  filePath: string;
  reason: string;
}

/**
 * Diagnostics for one source file, in depth-first declaration order.
 */
export class FileReport {
  readonly filePath: string;
  private entries: NodeReport[] = [];
  private errors = 0;
  private warnings = 0;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  add(node: SignatureNode, diagnostics: readonly Diagnostic[]): void {
    this.entries.push({ node, diagnostics });
    for (const diagnostic of diagnostics) {
      if (diagnostic.severity === 'error') {
        this.errors++;
      } else {
        this.warnings++;
      }
    }
  }

  get nodes(): readonly NodeReport[] {
    return this.entries;
  }

  get errorCount(): number {
    return this.errors;
  }

  get warningCount(): number {
    return this.warnings;
  }

  hasIssues(): boolean {
    return this.errors + this.warnings > 0;
  }
}

/**
 * All file reports of one run plus the files that could not be analyzed.
 *
 * Workers may each fill their own `Report` and `merge` them at the end.
 */
export class Report {
  private fileReports: FileReport[] = [];
  private skipped: UnanalyzableUnit[] = [];

  add(fileReport: FileReport): void {
    this.fileReports.push(fileReport);
  }

  addUnanalyzable(unit: UnanalyzableUnit): void {
    this.skipped.push(unit);
  }

  merge(other: Report): void {
    this.fileReports.push(...other.files);
    this.skipped.push(...other.unanalyzable);
  }

  get files(): readonly FileReport[] {
    return this.fileReports;
  }

  get unanalyzable(): readonly UnanalyzableUnit[] {
    return this.skipped;
  }

  get errorCount(): number {
    return this.fileReports.reduce((sum, file) => sum + file.errorCount, 0);
  }

  get warningCount(): number {
    return this.fileReports.reduce((sum, file) => sum + file.warningCount, 0);
  }

  hasIssues(): boolean {
    return this.fileReports.some((file) => file.hasIssues());
  }
}
