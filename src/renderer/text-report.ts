import type { FileReport, NodeReport, Report } from '../analysis/report.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { SignatureNode } from '../types/signature.js';

export const DIVIDER = '*'.repeat(80);

export type Stylize = (text: string) => string;

export interface ReportStyle {
  divider: Stylize;
  path: Stylize;
  header: Stylize;
  error: Stylize;
  warning: Stylize;
  summary: Stylize;
}

const identity: Stylize = (text) => text;

export const PLAIN_STYLE: ReportStyle = {
  divider: identity,
  path: identity,
  header: identity,
  error: identity,
  warning: identity,
  summary: identity,
};

export function formatNodeHeader(node: SignatureNode): string {
  switch (node.kind) {
    case 'module':
      return `module: ${node.name}`;
    case 'class':
      return `${node.line}: class: ${node.name}`;
    case 'function':
    case 'method':
    case 'staticmethod': {
      const kind = node.kind === 'function' ? 'function' : 'method';
      const names = node.parameters.map((param) => param.name);
      const signature = node.receiver === null ? names : [node.receiver, ...names];
      return `${node.line}: ${kind}: ${node.name}(${signature.join(',')})`;
    }
  }
}

export function formatDiagnostic(diagnostic: Diagnostic, style: ReportStyle = PLAIN_STYLE): string {
  return diagnostic.severity === 'error'
    ? `  ${style.error('E:')} ${diagnostic.message}`
    : `  ${style.warning('W:')} ${diagnostic.message}`;
}

function renderNode(entry: NodeReport, style: ReportStyle): string[] {
  if (entry.node.kind !== 'module' && entry.diagnostics.length === 0) return [];
  return [
    style.header(formatNodeHeader(entry.node)),
    ...entry.diagnostics.map((diagnostic) => formatDiagnostic(diagnostic, style)),
  ];
}

export function renderFileReport(fileReport: FileReport, style: ReportStyle = PLAIN_STYLE): string[] {
  if (!fileReport.hasIssues()) return [];

  const lines = [style.divider(DIVIDER), style.path(fileReport.filePath)];
  for (const entry of fileReport.nodes) {
    lines.push(...renderNode(entry, style));
  }
  return lines;
}

/**
 * Render the whole run. A run without any diagnostics renders to no lines.
 */
export function renderReport(report: Report, style: ReportStyle = PLAIN_STYLE): string[] {
  const lines = report.files.flatMap((fileReport) => renderFileReport(fileReport, style));
  if (lines.length === 0) return lines;

  lines.push(
    style.divider(DIVIDER),
    style.summary('SUMMARY'),
    `errors: ${report.errorCount}`,
    `warnings: ${report.warningCount}`
  );
  return lines;
}
