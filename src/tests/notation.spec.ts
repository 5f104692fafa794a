import { describe, it, expect } from 'vitest';
import { parseType } from '../schema/parse.js';
import { formatType } from '../schema/format.js';
import { MalformedContractError } from '../errors.js';

describe('type notation', () => {
  it('parses every kind and prints it back', () => {
    for (const notation of [
      'float',
      'datetime',
      'sequence<integer>',
      'array<float>[*, 3]',
      'mapping<string, sequence<float>>',
      'opaque<sklearn.Lasso>',
      'record{id: string, scores: array<float>[2]}'
    ]) {
      expect(formatType(parseType(notation))).toBe(notation);
    }
  });

  it('treats T[] as a sequence', () => {
    expect(formatType(parseType('float[]'))).toBe('sequence<float>');
    expect(formatType(parseType('string[][]'))).toBe('sequence<sequence<string>>');
    expect(formatType(parseType('array<float>[*, 2][]'))).toBe('sequence<array<float>[*, 2]>');
  });

  it('reads unconstrained dimensions as null', () => {
    const t = parseType('array<float>[*, 3]');
    expect(t.kind === 'shapedArray' && t.dimensions).toEqual([null, 3]);
  });

  it('tolerates whitespace', () => {
    expect(formatType(parseType('  mapping< string ,float >  '))).toBe('mapping<string, float>');
  });

  it('reports where parsing failed', () => {
    expect(() => parseType('flaot')).toThrow(
      'cannot parse type "flaot" at offset 0: expected a scalar kind or one of sequence, array, mapping, opaque, record'
    );
    expect(() => parseType('float extra')).toThrow('cannot parse type "float extra" at offset 6: expected end of input');
    expect(() => parseType('sequence<float')).toThrow("expected '>'");
    expect(() => parseType('mapping<text, float>')).toThrow('at offset 8: expected a scalar kind');
    expect(() => parseType('record{a: float, a: string}')).toThrow(MalformedContractError);
  });

  it('rejects invalid dimensions as malformed', () => {
    expect(() => parseType('array<float>[0]')).toThrow('dimension 0 must be a positive integer');
  });
});
