import { describe, expect, it } from 'vitest';

import {
  documentedParameterNames,
  foldText,
  getParamField,
  parameterDoc,
  parseDocstring,
  parseFieldMarker,
} from '../../src/parser/docstring-parser.js';

describe('parseFieldMarker', () => {
  it('reads tag, argument and trailing text', () => {
    expect(parseFieldMarker(':param int a: First number.')).toEqual({
      tag: 'param',
      argument: 'int a',
      rest: 'First number.',
    });
    expect(parseFieldMarker(':return:')).toEqual({ tag: 'return', argument: null, rest: '' });
  });

  it('ignores whitespace around the marker parts', () => {
    expect(parseFieldMarker('   :param  a :  desc')).toEqual({ tag: 'param', argument: 'a', rest: 'desc' });
  });

  it('accepts text directly after the closing colon', () => {
    expect(parseFieldMarker(':param int a:desc')).toEqual({ tag: 'param', argument: 'int a', rest: 'desc' });
    expect(parseFieldMarker(':rtype:int')).toEqual({ tag: 'rtype', argument: null, rest: 'int' });
  });

  it('does not treat inline roles as markers', () => {
    expect(parseFieldMarker(':class:`Foo` does things.')).toBeUndefined();
    expect(parseFieldMarker('plain prose')).toBeUndefined();
  });
});

describe('parseDocstring', () => {
  it('splits the description from the field list', () => {
    const parsed = parseDocstring(
      [
        'Add two numbers.',
        '',
        ':param int a: First number.',
        ':param int b: Second number.',
        ':return: Sum of the two numbers.',
        ':rtype: int',
      ].join('\n')
    );

    expect(parsed.description).toBe('Add two numbers.');
    expect(Array.from(parsed.fields.keys())).toEqual(['param:a', 'param:b', 'return', 'rtype']);
    expect(getParamField(parsed, 'a')).toEqual({
      tag: 'param',
      name: 'a',
      typeHint: 'int',
      text: 'First number.',
      line: 3,
    });
    expect(parsed.fields.get('rtype')?.text).toBe('int');
    expect(parsed.malformed).toEqual([]);
    expect(parsed.duplicates).toEqual([]);
  });

  it('reads fields written without a space after the colon', () => {
    const parsed = parseDocstring('Doc.\n\n:param int a:desc\n:return:sum\n:rtype:int');

    expect(parsed.description).toBe('Doc.');
    expect(Array.from(parsed.fields.keys())).toEqual(['param:a', 'return', 'rtype']);
    expect(parameterDoc(parsed, 'a')).toEqual({ documented: true, description: 'desc', type: 'int' });
    expect(parsed.fields.get('return')?.text).toBe('sum');
    expect(parsed.fields.get('rtype')?.text).toBe('int');
  });

  it('treats the parenthesized combined form like separate param and type fields', () => {
    const combined = parseDocstring(':param (int) a: desc');
    const separate = parseDocstring(':param a: desc\n:type a: int');

    expect(getParamField(combined, 'a')?.typeHint).toBe('int');
    expect(getParamField(combined, 'a')?.text).toBe('desc');
    expect(parameterDoc(combined, 'a')).toEqual({ documented: true, description: 'desc', type: 'int' });
    expect(parameterDoc(separate, 'a')).toEqual(parameterDoc(combined, 'a'));
  });

  it('folds indented continuation lines, across blank lines, into the field text', () => {
    const parsed = parseDocstring(
      [
        'Summary.',
        '',
        ':param a: The first',
        '    operand, spread over',
        '',
        '    several lines.',
        ':return: Result.',
      ].join('\n')
    );

    expect(getParamField(parsed, 'a')?.text).toBe('The first operand, spread over several lines.');
    expect(parsed.fields.get('return')?.text).toBe('Result.');
  });

  it('is idempotent on folded text', () => {
    const first = getParamField(parseDocstring(':param a: one\n   two\n     three'), 'a')?.text ?? '';
    const second = getParamField(parseDocstring(`:param a: ${first}`), 'a')?.text;

    expect(first).toBe('one two three');
    expect(second).toBe(first);
    expect(foldText([first])).toBe(first);
  });

  it('ends a field at de-indented prose and keeps that prose as epilogue', () => {
    const afterBlank = parseDocstring(':param a: Value.\n\nTrailing note.');
    expect(getParamField(afterBlank, 'a')?.text).toBe('Value.');
    expect(afterBlank.epilogue).toBe('Trailing note.');

    const noBlank = parseDocstring(':param a: Value.\nmore');
    expect(getParamField(noBlank, 'a')?.text).toBe('Value.');
    expect(noBlank.epilogue).toBe('more');
  });

  it('records empty field text as an empty string', () => {
    const parsed = parseDocstring(':param a:\n:return:');

    expect(getParamField(parsed, 'a')?.text).toBe('');
    expect(parsed.fields.get('return')?.text).toBe('');
  });

  it('keeps unknown tags and argument-less params as malformed fields', () => {
    const parsed = parseDocstring('Doc.\n\n:note: something\n:param:');

    expect(parsed.malformed).toEqual([
      { marker: 'note', text: 'something', line: 3 },
      { marker: 'param', text: '', line: 4 },
    ]);
    expect(parsed.fields.size).toBe(0);
  });

  it('leaves directive options alone', () => {
    const parsed = parseDocstring('.. module:: report\n   :synopsis: Report class');

    expect(parsed.fields.size).toBe(0);
    expect(parsed.malformed).toEqual([]);
    expect(parsed.description).toBe('.. module:: report\n   :synopsis: Report class');
  });

  it('normalizes Sphinx aliases', () => {
    const parsed = parseDocstring(':arg x: X.\n:returns: Y.\n:raises ValueError: when bad.');

    expect(Array.from(parsed.fields.keys())).toEqual(['param:x', 'return', 'raises:ValueError']);
  });

  it('lets a repeated field overwrite the earlier one', () => {
    const parsed = parseDocstring(':return: first\n:return: second');

    expect(parsed.fields.get('return')?.text).toBe('second');
    expect(parsed.duplicates.map((field) => field.text)).toEqual(['first']);
  });

  it('tolerates interleaved return and parameter fields', () => {
    const parsed = parseDocstring(':return: r\n:param a: x\n:rtype: int\n:type a: str');

    expect(Array.from(parsed.fields.keys())).toEqual(['return', 'param:a', 'rtype', 'type:a']);
    expect(parameterDoc(parsed, 'a')).toEqual({ documented: true, description: 'x', type: 'str' });
  });

  it('records parameters that no signature may have, stripping star prefixes', () => {
    const parsed = parseDocstring(':param z: nope\n:param *args: extra\n:type **kwargs: dict');

    expect(documentedParameterNames(parsed)).toEqual(['z', 'args', 'kwargs']);
  });

  it('reports an undocumented parameter as such', () => {
    expect(parameterDoc(parseDocstring('Only prose.'), 'a')).toEqual({
      documented: false,
      description: '',
      type: null,
    });
  });
});
