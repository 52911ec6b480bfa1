import { fieldKey } from '../types/docstring.js';
import type {
  DocField,
  FieldTag,
  MalformedField,
  ParamField,
  ParameterDoc,
  ParsedDocstring,
  TypeField,
} from '../types/docstring.js';

/**
 * Line-oriented parser for Sphinx field lists.
 *
 * Recognizes `:tag:` and `:tag argument:` markers. Text after the marker, plus
 * any following lines indented deeper than the marker, belongs to the field.
 * Unknown tags are kept as malformed fields instead of failing the parse.
 */

interface FieldMarker {
  tag: string;
  argument: string | null;
  rest: string;
}

// A backtick right after the closing colon means an inline role such as
// :class:`Foo` opening a prose line, not a marker.
const FIELD_MARKER_RE = /^:\s*([A-Za-z_]+)(?:\s+([^:]*?))?\s*:(?!`)(.*)$/;

const EXPLICIT_MARKUP_RE = /^\s*\.\.\s/;

const FIELD_TAGS = new Map<string, FieldTag>([
  ['param', 'param'],
  ['parameter', 'param'],
  ['arg', 'param'],
  ['argument', 'param'],
  ['key', 'param'],
  ['keyword', 'param'],
  ['type', 'type'],
  ['return', 'return'],
  ['returns', 'return'],
  ['rtype', 'rtype'],
  ['raises', 'raises'],
  ['raise', 'raises'],
  ['except', 'raises'],
  ['exception', 'raises'],
]);

export function parseFieldMarker(line: string): FieldMarker | undefined {
  const match = line.trim().match(FIELD_MARKER_RE);
  if (!match) return undefined;

  const argument = match[2]?.trim() ?? '';
  return {
    tag: match[1] ?? '',
    argument: argument.length > 0 ? argument : null,
    rest: match[3]?.trim() ?? '',
  };
}

function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

function lineIndent(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Fold field text: trim every line, drop empty ones, join with single spaces.
 */
export function foldText(pieces: string[]): string {
  return pieces
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0)
    .join(' ');
}

/**
 * Split `(int) a`, `int a` or `a` into a parameter name and an optional type hint.
 */
function splitParamArgument(argument: string): { name: string; typeHint: string | null } {
  const split = argument.search(/\s+\S+$/);
  if (split === -1) {
    return { name: stripStars(argument), typeHint: null };
  }

  const name = stripStars(argument.slice(split).trim());
  let typeHint = argument.slice(0, split).trim();
  if (typeHint.startsWith('(') && typeHint.endsWith(')')) {
    typeHint = typeHint.slice(1, -1).trim();
  }
  return { name, typeHint: typeHint.length > 0 ? typeHint : null };
}

function stripStars(name: string): string {
  return name.replace(/^\*{1,2}/, '');
}

/**
 * Lines belonging to an explicit markup block (`.. module:: x` and its
 * indented options) never open a field.
 */
function markDirectiveLines(lines: string[]): boolean[] {
  const flags = lines.map(() => false);
  let directiveIndent: number | null = null;

  lines.forEach((line, index) => {
    if (isBlankLine(line)) {
      flags[index] = directiveIndent !== null;
      return;
    }

    const indent = lineIndent(line);
    if (directiveIndent !== null && indent > directiveIndent) {
      flags[index] = true;
      return;
    }

    directiveIndent = EXPLICIT_MARKUP_RE.test(line) ? indent : null;
    flags[index] = directiveIndent !== null;
  });

  return flags;
}

/**
 * Consume continuation lines for a field whose marker sits at `indent`.
 *
 * Returns the index of the first line that does not belong to the field.
 */
function collectContinuation(
  lines: string[],
  markers: (FieldMarker | undefined)[],
  start: number,
  indent: number,
  pieces: string[]
): number {
  let index = start;

  while (index < lines.length) {
    const line = lines[index] ?? '';

    if (isBlankLine(line)) {
      let next = index + 1;
      while (next < lines.length && isBlankLine(lines[next] ?? '')) next += 1;
      if (next >= lines.length) return lines.length;

      if (markers[next] || lineIndent(lines[next] ?? '') <= indent) return next;
      index = next;
      continue;
    }

    if (markers[index] || lineIndent(line) <= indent) return index;

    pieces.push(line);
    index += 1;
  }

  return index;
}

function buildField(marker: FieldMarker, text: string, line: number): DocField | MalformedField {
  const tag = FIELD_TAGS.get(marker.tag);
  const malformed: MalformedField = {
    marker: marker.argument === null ? marker.tag : `${marker.tag} ${marker.argument}`,
    text,
    line,
  };

  switch (tag) {
    case 'param': {
      if (marker.argument === null) return malformed;
      const { name, typeHint } = splitParamArgument(marker.argument);
      return { tag, name, typeHint, text, line };
    }
    case 'type': {
      if (marker.argument === null) return malformed;
      return { tag, name: splitParamArgument(marker.argument).name, text, line };
    }
    case 'return':
    case 'rtype':
      return { tag, text, line };
    case 'raises':
      return { tag, name: marker.argument, text, line };
    case undefined:
      return malformed;
  }
}

function isDocField(field: DocField | MalformedField): field is DocField {
  return 'tag' in field;
}

function keyOf(field: DocField): string {
  switch (field.tag) {
    case 'param':
    case 'type':
    case 'raises':
      return fieldKey(field.tag, field.name);
    case 'return':
    case 'rtype':
      return fieldKey(field.tag);
  }
}

/**
 * Parse a cleaned docstring into its description and field list.
 *
 * Never throws: unrecognized markers end up in `malformed`, repeated fields
 * overwrite earlier ones and the overwritten field is kept in `duplicates`.
 */
export function parseDocstring(text: string): ParsedDocstring {
  const lines = text.split(/\r?\n/);
  const directives = markDirectiveLines(lines);
  const markers = lines.map((line, index) => (directives[index] ? undefined : parseFieldMarker(line)));
  const fields = new Map<string, DocField>();
  const duplicates: DocField[] = [];
  const malformed: MalformedField[] = [];
  const descriptionLines: string[] = [];
  const epilogueLines: string[] = [];

  let index = 0;
  while (index < lines.length && !markers[index]) {
    descriptionLines.push(lines[index] ?? '');
    index += 1;
  }

  while (index < lines.length) {
    const line = lines[index] ?? '';
    const marker = markers[index];

    if (!marker) {
      if (!isBlankLine(line)) epilogueLines.push(line.trim());
      index += 1;
      continue;
    }

    const markerLine = index + 1;
    const pieces = [marker.rest];
    index = collectContinuation(lines, markers, index + 1, lineIndent(line), pieces);

    const field = buildField(marker, foldText(pieces), markerLine);
    if (!isDocField(field)) {
      malformed.push(field);
      continue;
    }

    const key = keyOf(field);
    const previous = fields.get(key);
    if (previous) duplicates.push(previous);
    fields.set(key, field);
  }

  return {
    description: descriptionLines.join('\n').trim(),
    fields,
    duplicates,
    malformed,
    epilogue: epilogueLines.join('\n'),
  };
}

export function getParamField(parsed: ParsedDocstring, name: string): ParamField | undefined {
  const field = parsed.fields.get(fieldKey('param', name));
  return field?.tag === 'param' ? field : undefined;
}

export function getTypeField(parsed: ParsedDocstring, name: string): TypeField | undefined {
  const field = parsed.fields.get(fieldKey('type', name));
  return field?.tag === 'type' ? field : undefined;
}

/**
 * Names mentioned by `param` or `type` fields, in order of first appearance.
 */
export function documentedParameterNames(parsed: ParsedDocstring): string[] {
  const names = new Set<string>();
  for (const field of parsed.fields.values()) {
    if (field.tag === 'param' || field.tag === 'type') {
      names.add(field.name);
    }
  }
  return Array.from(names);
}

/**
 * Unified view of one parameter's documentation across the combined
 * `:param (T) name:` form and the separate `:param name:` + `:type name:` form.
 */
export function parameterDoc(parsed: ParsedDocstring, name: string): ParameterDoc {
  const param = getParamField(parsed, name);
  const typeField = getTypeField(parsed, name);
  const declaredType = typeField && typeField.text.length > 0 ? typeField.text : null;

  return {
    documented: param !== undefined,
    description: param?.text ?? '',
    type: param?.typeHint ?? declaredType,
  };
}
