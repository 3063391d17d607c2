/**
 * Candidate matcher tests - symbol grammar, reserved words, numbers
 */

import { describe, it, expect } from 'vitest';
import { LiteralMatcher, Liveness, type Matcher, NumberMatcher, SymbolMatcher, candidates } from './matchers.js';

function scan(matcher: Matcher, text: string): Matcher {
  for (const c of text) matcher.offer(c);
  return matcher;
}

function symbol(text: string) {
  return scan(new SymbolMatcher(), text).finish();
}

function number(text: string) {
  return scan(new NumberMatcher(), text).finish();
}

describe('LiteralMatcher', () => {
  it('should accept the exact word', () => {
    expect(scan(new LiteralMatcher('nil', { type: 'nil' }), 'nil').finish()).toEqual({ type: 'nil' });
  });

  it('should reject a prefix', () => {
    expect(scan(new LiteralMatcher('nil', { type: 'nil' }), 'ni').finish()).toBeUndefined();
  });

  it('should die on a longer word', () => {
    const m = scan(new LiteralMatcher('nil', { type: 'nil' }), 'nils');
    expect(m.alive).toBe(false);
    expect(m.finish()).toBeUndefined();
  });

  it('should be case sensitive', () => {
    expect(scan(new LiteralMatcher('true', { type: 'boolean', value: true }), 'True').alive).toBe(false);
  });

  it('should never come back to life', () => {
    const m = new LiteralMatcher('nil', { type: 'nil' });
    expect(m.state).toBe(Liveness.Unknown);
    m.offer('n');
    expect(m.state).toBe(Liveness.Alive);
    m.offer('x');
    expect(m.state).toBe(Liveness.Dead);
    m.offer('i');
    m.offer('l');
    expect(m.state).toBe(Liveness.Dead);
  });
});

describe('SymbolMatcher', () => {
  it.each([
    ['foo', 'foo'],
    ['foo-bar?', 'foo-bar?'],
    ['my.ns/name', 'my.ns/name'],
    ['-foo', '-foo'],
    ['+', '+'],
    ['-', '-'],
    ['+#x', '+#x'],
    ['a1:b#', 'a1:b#'],
    ['ns/*var*', 'ns/*var*'],
    ['été', 'été'],
  ])('should accept symbol %s', (text, name) => {
    expect(symbol(text)).toEqual({ type: 'symbol', value: name });
  });

  it('should read keywords after the sigil', () => {
    expect(symbol(':kw')).toEqual({ type: 'keyword', value: 'kw' });
    expect(symbol(':a/b')).toEqual({ type: 'keyword', value: 'a/b' });
  });

  it.each(['f123/123', '+#:123/#', '+123', '/', 'a//b', '*foo', '1abc', '::x', ':', '.5', 'a/1'])(
    'should reject %s',
    (text) => {
      expect(symbol(text)).toBeUndefined();
    }
  );

  it('should reject a trailing separator only when finishing', () => {
    const m = scan(new SymbolMatcher(), 'abc/');
    expect(m.alive).toBe(true);
    expect(m.finish()).toBeUndefined();
  });

  it('should not read keywords when the sigil is disabled', () => {
    expect(scan(new SymbolMatcher(false), ':kw').finish()).toBeUndefined();
  });

  it('should classify its own output the same way again', () => {
    for (const text of ['foo', 'a.b/c', '-x', '+#x', ':kw', ':ns/kw']) {
      const first = symbol(text);
      expect(first).toBeDefined();
      const rescanned = first?.type === 'keyword' ? `:${first.value}` : first?.type === 'symbol' ? first.value : '';
      expect(symbol(rescanned)).toEqual(first);
    }
  });
});

describe('NumberMatcher', () => {
  it.each([
    ['123', { type: 'integer', text: '123' }],
    ['+123', { type: 'integer', text: '+123' }],
    ['-0', { type: 'integer', text: '-0' }],
    ['12N', { type: 'integer', text: '12' }],
    ['1.5', { type: 'float', text: '1.5' }],
    ['1e10', { type: 'float', text: '1e10' }],
    ['-2.5E-3', { type: 'float', text: '-2.5E-3' }],
    ['2.5M', { type: 'float', text: '2.5' }],
    ['1.', { type: 'float', text: '1.' }],
  ])('should accept %s', (text, token) => {
    expect(number(text)).toEqual(token);
  });

  it.each(['-', '+', '01', '1e', '1e+', '1.5N', '12NN', 'abc', '.5'])('should reject %s', (text) => {
    expect(number(text)).toBeUndefined();
  });

  it('should die on a digit after a leading zero', () => {
    expect(scan(new NumberMatcher(), '01').alive).toBe(false);
  });
});

describe('candidates', () => {
  it('should rank a reserved word ahead of the symbol reading', () => {
    const ms = candidates();
    for (const m of ms) scan(m, 'true');
    const winners = ms.map((m) => m.finish()).filter((t) => t !== undefined);
    expect(winners).toHaveLength(2);
    expect(winners[0]).toEqual({ type: 'boolean', value: true });
    expect(winners[1]).toEqual({ type: 'symbol', value: 'true' });
  });

  it('should let numbers and symbols split on a leading sign', () => {
    const plusDigits = candidates().map((m) => scan(m, '+12').finish());
    expect(plusDigits.filter((t) => t !== undefined)).toEqual([{ type: 'integer', text: '+12' }]);

    const plusWord = candidates().map((m) => scan(m, '+ab').finish());
    expect(plusWord.filter((t) => t !== undefined)).toEqual([{ type: 'symbol', value: '+ab' }]);
  });
});
