export type FieldTag = 'param' | 'type' | 'return' | 'rtype' | 'raises';

export interface ParamField {
  tag: 'param';
  name: string;
  typeHint: string | null;
  text: string;
  line: number;
}

export interface TypeField {
  tag: 'type';
  name: string;
  text: string;
  line: number;
}

export interface ReturnField {
  tag: 'return';
  text: string;
  line: number;
}

export interface RtypeField {
  tag: 'rtype';
  text: string;
  line: number;
}

export interface RaisesField {
  tag: 'raises';
  name: string | null;
  text: string;
  line: number;
}

export type DocField = ParamField | TypeField | ReturnField | RtypeField | RaisesField;

/**
 * A line that opens a field list entry with a tag outside the known set.
 */
export interface MalformedField {
  marker: string;
  text: string;
  line: number;
}

export interface ParsedDocstring {
  description: string;
  /** Keyed by `fieldKey`, in order of first appearance. */
  fields: Map<string, DocField>;
  duplicates: DocField[];
  malformed: MalformedField[];
  /** Prose that follows the field list at the marker's indentation. */
  epilogue: string;
}

export interface ParameterDoc {
  documented: boolean;
  description: string;
  type: string | null;
}

export function fieldKey(tag: FieldTag, name: string | null = null): string {
  return name === null ? tag : `${tag}:${name}`;
}
