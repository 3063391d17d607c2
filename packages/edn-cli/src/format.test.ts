/**
 * Event dump formatting tests
 */

import { describe, it, expect } from 'vitest';
import { Parser } from 'edn-core';
import { describeEvent, dumpDocument, formatEvents } from './format.js';

describe('describeEvent', () => {
  it('should describe scalars', () => {
    const lines = [...new Parser('[nil true "a\\"b" \\x sym :kw -7 2.5 #t 0]')].map(describeEvent);
    expect(lines).toEqual([
      'start vector',
      'nil',
      'boolean true',
      'string "a\\"b"',
      'character "x"',
      'symbol sym',
      'keyword :kw',
      'integer -7',
      'float 2.5',
      'tag #t',
      'integer 0',
      'end vector',
    ]);
  });

  it('should describe a failing source', () => {
    function* failing(): Generator<string> {
      yield '[';
      throw new Error('pipe closed');
    }
    const last = [...new Parser(failing())].pop();
    expect(last && describeEvent(last)).toBe('error io: Read failed: pipe closed');
  });
});

describe('formatEvents', () => {
  it('should indent nested events by depth', () => {
    expect(formatEvents(new Parser('[1 {:a "x"}]'))).toEqual([
      'start vector',
      '  integer 1',
      '  start map',
      '    keyword :a',
      '    string "x"',
      '  end map',
      'end vector',
    ]);
  });

  it('should prefix positions when asked', () => {
    expect(formatEvents(new Parser('[nil]'), { positions: true })).toEqual([
      '1:1 start vector',
      '1:2   nil',
      '1:5 end vector',
    ]);
  });

  it('should take a custom indent', () => {
    expect(formatEvents(new Parser('(a)'), { indent: '\t' })).toEqual(['start list', '\tsymbol a', 'end list']);
  });

  it('should end with the error event', () => {
    expect(formatEvents(new Parser('[1'))).toEqual(['start vector', '  integer 1', '  error EOFWhileParsingArray']);
  });
});

describe('dumpDocument', () => {
  it('should format a clean document without an error', () => {
    const result = dumpDocument('(a)\n', { positions: true });
    expect(result.lines).toEqual(['1:1 start list', '1:2   symbol a', '1:3 end list']);
    expect(result.error).toBeUndefined();
  });

  it('should allow trailing commas unless strict', () => {
    expect(dumpDocument('[1,]').error).toBeUndefined();

    const strict = dumpDocument('[1,]', { strictCommas: true, file: 'in.edn' });
    expect(strict.lines).toEqual(['start vector', '  integer 1', '  error TrailingComma']);
    expect(strict.error?.toString()).toBe('Trailing comma before closing delimiter (in.edn, line 1, column 4)');
  });
});
