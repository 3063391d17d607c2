/**
 * Value builder tests - assembling values, equality, error channel
 */

import { describe, it, expect } from 'vitest';
import { buildValue, readValue } from './builder.js';
import { charsOf } from './cursor.js';
import { Parser } from './parser.js';
import { EdnError, EdnSyntaxError, ErrorCode } from '../errors.js';
import {
  type Value,
  type ValueModel,
  makeCharacter,
  makeFloat,
  makeInteger,
  makeKeyword,
  makeList,
  makeMap,
  makeSet,
  makeString,
  makeSymbol,
  makeTag,
  makeVector,
  structuralModel,
  theNil,
  theTrue,
  valuesEqual,
} from '../value.js';

function readError(run: () => unknown): EdnError {
  try {
    run();
  } catch (err) {
    if (err instanceof EdnError) return err;
    throw err;
  }
  throw new Error('expected an EdnError');
}

describe('readValue', () => {
  it('should build every kind of value', () => {
    const value = readValue('[1 (a b) {:k "v"} #{1 2 1} #inst "x" \\c nil true 1.5]');
    expect(value).toEqual(
      makeVector([
        makeInteger(1),
        makeList([makeSymbol('a'), makeSymbol('b')]),
        makeMap([[makeKeyword('k'), makeString('v')]]),
        makeSet([makeInteger(1), makeInteger(2)]),
        makeTag('inst', makeString('x')),
        makeCharacter('c'),
        theNil,
        theTrue,
        makeFloat(1.5),
      ])
    );
  });

  it('should collapse duplicate set members', () => {
    const value = readValue('#{[1 2] [1 2] (1 2)}');
    expect(value).toEqual({
      kind: 'set',
      items: [makeVector([makeInteger(1), makeInteger(2)]), makeList([makeInteger(1), makeInteger(2)])],
    });
  });

  it('should keep the last value for a repeated map key', () => {
    expect(readValue('{:a 1 :b 2 :a 3}')).toEqual({
      kind: 'map',
      entries: [
        [makeKeyword('a'), makeInteger(3)],
        [makeKeyword('b'), makeInteger(2)],
      ],
    });
  });

  it('should accept collections as map keys', () => {
    expect(readValue('{[1] :one}')).toEqual(makeMap([[makeVector([makeInteger(1)]), makeKeyword('one')]]));
  });

  it('should apply stacked tags innermost first', () => {
    expect(readValue('#a #b [1]')).toEqual(makeTag('a', makeTag('b', makeVector([makeInteger(1)]))));
  });

  it('should read from chunked input', () => {
    expect(readValue(charsOf(['{:a ', '[1', ' 2]}']))).toEqual(
      makeMap([[makeKeyword('a'), makeVector([makeInteger(1), makeInteger(2)])]])
    );
  });

  it('should build deeply nested input without recursion', () => {
    const depth = 10000;
    let value: Value = readValue('['.repeat(depth) + ']'.repeat(depth));
    let levels = 0;
    while (value.kind === 'vector' && value.items.length > 0) {
      value = value.items[0];
      levels++;
    }
    expect(levels).toBe(depth - 1);
    expect(value).toEqual(makeVector([]));
  });

  it('should key deeply nested set members without recursion', () => {
    const depth = 20000;
    const deep = '['.repeat(depth) + ']'.repeat(depth);
    const set = readValue(`#{${deep} ${deep}}`);
    expect(set.kind).toBe('set');
    if (set.kind !== 'set') return;
    expect(set.items).toHaveLength(1);

    let value: Value = set.items[0];
    let levels = 0;
    while (value.kind === 'vector' && value.items.length > 0) {
      value = value.items[0];
      levels++;
    }
    expect(levels).toBe(depth - 1);
  });

  it('should key deeply nested map keys without recursion', () => {
    const depth = 20000;
    const map = readValue(`{${'('.repeat(depth)}${')'.repeat(depth)} 1}`);
    expect(map.kind).toBe('map');
    if (map.kind !== 'map') return;
    expect(map.entries).toHaveLength(1);
    expect(map.entries[0][1]).toEqual(makeInteger(1));
  });

  it('should build from a parser constructed by the caller', () => {
    const parser = new Parser(charsOf(['(a', ' b)']), { file: 'list.edn' });
    expect(buildValue(parser)).toEqual(makeList([makeSymbol('a'), makeSymbol('b')]));
    expect(parser.finished).toBe(true);
  });
});

describe('readValue - errors', () => {
  it('should throw the parser error', () => {
    const err = readError(() => readValue('[1 2'));
    expect(err).toBeInstanceOf(EdnSyntaxError);
    expect(err.detail).toEqual({ type: 'syntax', code: ErrorCode.EOFWhileParsingArray, line: 1, column: 4 });
    expect(err.toString()).toBe('Unexpected end of input inside a collection (line 1, column 4)');
  });

  it('should name the file in the location', () => {
    const err = readError(() => readValue('[1 2', { file: 'data.edn' }));
    expect(err.location).toBe('data.edn, line 1, column 4');
  });

  it('should report trailing characters', () => {
    const err = readError(() => readValue('1 2'));
    expect(err.detail).toEqual({ type: 'syntax', code: ErrorCode.TrailingCharacters, line: 1, column: 3 });
  });

  it('should pass parser options through', () => {
    const err = readError(() => readValue('[1,]', { allowTrailingComma: false }));
    expect(err.detail).toEqual({ type: 'syntax', code: ErrorCode.TrailingComma, line: 1, column: 4 });
  });

  it('should surface a throwing value model as a foreign error', () => {
    const noKeywords: ValueModel = {
      keyOf(value) {
        if (value.kind === 'keyword') throw new Error('keywords are not hashable here');
        return structuralModel.keyOf(value);
      },
    };
    const err = readError(() => readValue('{:a 1}', { model: noKeywords }));
    expect(err.detail.type).toBe('foreign');
    expect(err.message).toBe('Value model rejected key: keywords are not hashable here');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('should reject keys the value model refuses', () => {
    const noFloats: ValueModel = {
      keyOf: (value) => (value.kind === 'float' ? undefined : structuralModel.keyOf(value)),
    };
    const err = readError(() => readValue('#{1.5}', { model: noFloats }));
    expect(err.detail).toEqual({ type: 'syntax', code: ErrorCode.KeyMustBeAValue, line: 1, column: 6 });
  });

  it('should leave vectors alone when the model refuses their items', () => {
    const noFloats: ValueModel = {
      keyOf: (value) => (value.kind === 'float' ? undefined : structuralModel.keyOf(value)),
    };
    expect(readValue('[1.5]', { model: noFloats })).toEqual(makeVector([makeFloat(1.5)]));
  });
});

describe('value model', () => {
  it('should keep integers and floats apart', () => {
    expect(makeSet([makeInteger(1), makeFloat(1), makeInteger(1)]).items).toEqual([makeInteger(1), makeFloat(1)]);
  });

  it('should compare maps and sets regardless of order', () => {
    const a = makeMap([
      [makeKeyword('a'), makeInteger(1)],
      [makeKeyword('b'), makeInteger(2)],
    ]);
    const b = makeMap([
      [makeKeyword('b'), makeInteger(2)],
      [makeKeyword('a'), makeInteger(1)],
    ]);
    expect(valuesEqual(a, b)).toBe(true);
    expect(valuesEqual(makeSet([makeInteger(1), makeInteger(2)]), makeSet([makeInteger(2), makeInteger(1)]))).toBe(true);
  });

  it('should tell nesting shapes apart', () => {
    const one = makeInteger(1);
    expect(valuesEqual(makeVector([makeVector([one])]), makeVector([makeVector([one])]))).toBe(true);
    expect(valuesEqual(makeVector([makeVector([one])]), makeVector([makeList([one])]))).toBe(false);
    expect(valuesEqual(makeTag('t', makeVector([])), makeTag('t', makeList([])))).toBe(false);
    expect(valuesEqual(makeMap([[one, makeVector([])]]), makeMap([[one, makeVector([])]]))).toBe(true);
  });

  it('should tell strings and symbols apart', () => {
    expect(valuesEqual(makeString('a'), makeSymbol('a'))).toBe(false);
    expect(valuesEqual(makeSymbol('a'), makeKeyword('a'))).toBe(false);
  });

  it('should validate constructor input', () => {
    expect(() => makeCharacter('ab')).toThrow(RangeError);
    expect(() => makeInteger(2n ** 63n)).toThrow(RangeError);
    expect(makeCharacter('😀').value).toBe('😀');
  });
});
