import {
  documentedParameterNames,
  parameterDoc,
  parseDocstring,
} from '../parser/docstring-parser.js';
import { errorDiagnostic, warningDiagnostic } from '../types/diagnostic.js';
import { fieldKey } from '../types/docstring.js';
import type { Diagnostic, DiagnosticLocation } from '../types/diagnostic.js';
import type { DocField, ParsedDocstring } from '../types/docstring.js';
import { isCallable } from '../types/signature.js';
import type { CallableSignature, SignatureNode } from '../types/signature.js';

/**
 * Cross-checks a signature node against its parsed docstring.
 *
 * Each rule is a pure function returning diagnostics in a fixed order, so
 * reports stay stable between runs.
 */

function locationOf(node: SignatureNode): DiagnosticLocation {
  return { name: node.name, line: node.line };
}

function describeField(field: DocField): string {
  switch (field.tag) {
    case 'param':
    case 'type':
      return `${field.tag} ${field.name}`;
    case 'raises':
      return field.name === null ? field.tag : `${field.tag} ${field.name}`;
    case 'return':
    case 'rtype':
      return field.tag;
  }
}

export function checkDocstringPresence(node: SignatureNode): readonly Diagnostic[] {
  if (node.docstring !== null) return [];

  const location = locationOf(node);
  switch (node.kind) {
    case 'module':
      return [errorDiagnostic('missing-module-docstring', 'Docstring for module is missing', location)];
    case 'class':
      return [errorDiagnostic('missing-class-docstring', 'Docstring for class is missing', location)];
    case 'function':
    case 'method':
    case 'staticmethod':
      return [errorDiagnostic('missing-docstring', 'Docstring missing', location)];
  }
}

/**
 * Structural problems in the field list itself: unknown markers, then fields
 * written more than once.
 */
export function checkFieldList(node: CallableSignature, parsed: ParsedDocstring): readonly Diagnostic[] {
  const location = locationOf(node);
  const results: Diagnostic[] = [];

  for (const field of parsed.malformed) {
    results.push(
      warningDiagnostic('unknown-field', `Unknown field ':${field.marker}:' in docstring.`, location)
    );
  }

  for (const field of parsed.duplicates) {
    results.push(
      warningDiagnostic('duplicate-field', `Duplicate ':${describeField(field)}:' in docstring.`, location)
    );
  }

  return results;
}

/**
 * Runs once per name in signature parameters followed by documented-only names.
 * An entirely undocumented parameter reports only the missing `:param`.
 */
export function checkParameters(node: CallableSignature, parsed: ParsedDocstring): readonly Diagnostic[] {
  const location = locationOf(node);
  const results: Diagnostic[] = [];
  const signatureNames = node.parameters.map((param) => param.name);
  const known = new Set(signatureNames);
  const extraNames = documentedParameterNames(parsed).filter((name) => !known.has(name));

  for (const name of [...signatureNames, ...extraNames]) {
    if (!known.has(name)) {
      results.push(errorDiagnostic('extra-param', `Additional ':param ${name}' in docstring.`, location));
      continue;
    }

    const doc = parameterDoc(parsed, name);
    if (!doc.documented) {
      results.push(errorDiagnostic('missing-param', `Missing :param for parameter: ${name}`, location));
      continue;
    }

    if (doc.description.length === 0) {
      results.push(
        errorDiagnostic(
          'missing-param-description',
          `No description in docstring for parameter: ${name}`,
          location
        )
      );
    }
    if (doc.type === null) {
      results.push(
        warningDiagnostic('missing-param-type', `No type in docstring for parameter: ${name}`, location)
      );
    }
  }

  return results;
}

export function checkReturns(node: CallableSignature, parsed: ParsedDocstring): readonly Diagnostic[] {
  const location = locationOf(node);
  const results: Diagnostic[] = [];
  const returnField = parsed.fields.get(fieldKey('return'));
  const rtypeField = parsed.fields.get(fieldKey('rtype'));

  if (node.returnsValue && !returnField) {
    results.push(errorDiagnostic('missing-return', "':return: {description}' is missing.", location));
  }
  if (returnField && returnField.text.length === 0) {
    results.push(
      errorDiagnostic('missing-return-description', "Description after 'return': missing", location)
    );
  }
  if (rtypeField && rtypeField.text.length === 0) {
    results.push(
      errorDiagnostic('missing-rtype-description', "Description after 'rtype': missing", location)
    );
  }
  if (node.returnsValue && returnField && !rtypeField) {
    results.push(warningDiagnostic('missing-rtype', "':rtype: {description}' is missing.", location));
  }
  if (!node.returnsValue && returnField) {
    results.push(
      errorDiagnostic(
        'unexpected-return',
        'Docstring describes return values but function does not return anything!',
        location
      )
    );
  }

  return results;
}

/**
 * Run every rule for one node. Private callables are exempt and yield nothing.
 * Modules and classes only get the presence check.
 */
export function checkNode(node: SignatureNode): Diagnostic[] {
  if (isCallable(node) && node.isPrivate) return [];

  const presence = checkDocstringPresence(node);
  if (node.docstring === null || !isCallable(node)) return [...presence];

  const parsed = parseDocstring(node.docstring);
  return [
    ...checkFieldList(node, parsed),
    ...checkParameters(node, parsed),
    ...checkReturns(node, parsed),
  ];
}

