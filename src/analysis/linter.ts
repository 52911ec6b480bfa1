import type { ParseResult, PythonParser } from '../parser/python-parser.js';
import { SignatureExtractor } from '../parser/signature-extractor.js';
import { UnanalyzableUnitError } from '../parser/errors.js';
import { checkNode } from './rule-engine.js';
import { FileReport, Report } from './report.js';
import { isCallable } from '../types/signature.js';
import type { ModuleSignature, SignatureNode } from '../types/signature.js';

/**
 * Depth-first walk in declaration order. Private callables are exempt along
 * with everything defined inside them.
 */
function collect(node: SignatureNode, fileReport: FileReport): void {
  if (isCallable(node) && node.isPrivate) return;

  fileReport.add(node, checkNode(node));
  for (const child of node.children) {
    collect(child, fileReport);
  }
}

export function lintModule(module: ModuleSignature, displayPath = module.filePath): FileReport {
  const fileReport = new FileReport(displayPath);
  collect(module, fileReport);
  return fileReport;
}

function lintParseResult(parseResult: ParseResult): FileReport {
  return lintModule(new SignatureExtractor(parseResult).extractModule());
}

export function lintSource(source: string, filePath: string, parser: PythonParser): FileReport {
  return lintParseResult(parser.parseSource(source, filePath));
}

export function lintFile(filePath: string, parser: PythonParser): FileReport {
  return lintParseResult(parser.parseFile(filePath));
}

function isReadError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Lint every file into one report. Unreadable or unparsable files are
 * recorded as unanalyzable and the batch continues.
 */
export function lintFiles(filePaths: readonly string[], parser: PythonParser): Report {
  const report = new Report();

  for (const filePath of filePaths) {
    try {
      report.add(lintFile(filePath, parser));
    } catch (error) {
      if (error instanceof UnanalyzableUnitError) {
        report.addUnanalyzable({ filePath, reason: error.reason });
      } else if (isReadError(error)) {
        report.addUnanalyzable({ filePath, reason: error.message });
      } else {
        throw error;
      }
    }
  }

  return report;
}
