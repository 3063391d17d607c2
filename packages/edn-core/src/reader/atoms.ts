/**
 * Atom recognizer: strings, characters, and bare atoms (nil, booleans,
 * numbers, symbols, keywords), read from the cursor's lookahead onward.
 */

import { ErrorCode, EdnSyntaxError } from '../errors.js';
import { MAX_INTEGER, MIN_INTEGER } from '../value.js';
import { type Cursor, EOF, isWhitespace } from './cursor.js';
import type { ScalarEvent } from './events.js';
import {
  type AtomToken,
  SymbolMatcher,
  candidates,
  isAlpha,
  isAlphanumeric,
  isAtomChar,
  isDigit,
} from './matchers.js';

const NAMED_CHARACTERS = new Map<string, string>([
  ['newline', '\n'],
  ['return', '\r'],
  ['space', ' '],
  ['tab', '\t'],
  ['formfeed', '\f'],
  ['backspace', '\b'],
]);

const SIMPLE_ESCAPES = new Map<string, string>([
  ['t', '\t'],
  ['r', '\r'],
  ['n', '\n'],
  ['\\', '\\'],
  ['"', '"'],
  ['b', '\b'],
  ['f', '\f'],
]);

/** Throw a syntax error positioned at the lookahead character. */
export function fail(cursor: Cursor, code: ErrorCode): never {
  throw new EdnSyntaxError(code, cursor.line, cursor.column, cursor.file);
}

export function isAtomStart(c: string): boolean {
  if (c === EOF) return false;
  return c === '"' || c === '\\' || c === '+' || c === '-' || c === '.' || c === ':' || isAlphanumeric(c);
}

export function readAtom(cursor: Cursor): ScalarEvent {
  const c = cursor.current;
  if (c === '"') return { type: 'string', value: readString(cursor) };
  if (c === '\\') return { type: 'character', value: readCharacter(cursor) };
  if (isAtomStart(c)) return readBareAtom(cursor);
  return fail(cursor, ErrorCode.InvalidSyntax);
}

/**
 * Offer each character to every candidate until the atom ends or no
 * candidate is left, then take the first candidate that finished cleanly.
 */
function readBareAtom(cursor: Cursor): ScalarEvent {
  const matchers = candidates();
  let text = '';

  while (isAtomChar(cursor.current)) {
    const c = cursor.current;
    for (const m of matchers) m.offer(c);
    if (!matchers.some((m) => m.alive)) {
      return fail(cursor, bareFailure(text + c));
    }
    text += cursor.take();
  }

  for (const m of matchers) {
    const token = m.finish();
    if (token) return toScalar(cursor, token);
  }
  return fail(cursor, bareFailure(text));
}

function bareFailure(text: string): ErrorCode {
  const first = text.charAt(0);
  const looksNumeric = isDigit(first) || ((first === '+' || first === '-') && isDigit(text.charAt(1)));
  return looksNumeric ? ErrorCode.InvalidNumber : ErrorCode.InvalidSyntax;
}

function toScalar(cursor: Cursor, token: AtomToken): ScalarEvent {
  switch (token.type) {
    case 'integer': {
      const value = BigInt(token.text.startsWith('+') ? token.text.slice(1) : token.text);
      if (value < MIN_INTEGER || value > MAX_INTEGER) fail(cursor, ErrorCode.InvalidNumber);
      return { type: 'integer', value };
    }
    case 'float': {
      const value = parseFloat(token.text);
      if (!Number.isFinite(value)) fail(cursor, ErrorCode.InvalidNumber);
      return { type: 'float', value };
    }
    default:
      return token;
  }
}

export function readString(cursor: Cursor): string {
  cursor.advance(); // opening quote
  let out = '';
  for (;;) {
    const c = cursor.current;
    if (c === EOF) fail(cursor, ErrorCode.EOFWhileParsingString);
    if (c === '"') {
      cursor.advance();
      return out;
    }
    if (c === '\\') {
      cursor.advance();
      out += readEscape(cursor);
    } else {
      out += cursor.take();
    }
  }
}

function readEscape(cursor: Cursor): string {
  const c = cursor.current;
  if (c === EOF) fail(cursor, ErrorCode.EOFWhileParsingString);
  const simple = SIMPLE_ESCAPES.get(c);
  if (simple !== undefined) {
    cursor.advance();
    return simple;
  }
  if (c !== 'u') fail(cursor, ErrorCode.InvalidEscape);
  cursor.advance();

  const unit = readHex4(cursor);
  if (isLowSurrogate(unit)) fail(cursor, ErrorCode.InvalidUnicodeCodePoint);
  if (!isHighSurrogate(unit)) return String.fromCharCode(unit);

  // a high surrogate must be followed by an escaped low surrogate
  if (!cursor.is('\\')) fail(cursor, ErrorCode.InvalidUnicodeCodePoint);
  cursor.advance();
  if (!cursor.is('u')) fail(cursor, ErrorCode.InvalidUnicodeCodePoint);
  cursor.advance();
  const low = readHex4(cursor);
  if (!isLowSurrogate(low)) fail(cursor, ErrorCode.InvalidUnicodeCodePoint);
  return String.fromCharCode(unit, low);
}

function readHex4(cursor: Cursor): number {
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const c = cursor.current;
    if (c === EOF) fail(cursor, ErrorCode.EOFWhileParsingString);
    if (!/^[0-9a-fA-F]$/.test(c)) fail(cursor, ErrorCode.InvalidEscape);
    value = value * 16 + parseInt(c, 16);
    cursor.advance();
  }
  return value;
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/**
 * `\c`, a named character such as `\newline`, or `\uXXXX`. A letter or digit
 * after the backslash starts a name that runs to the end of the alphanumerics.
 */
export function readCharacter(cursor: Cursor): string {
  cursor.advance(); // backslash
  const first = cursor.current;
  if (first === EOF) fail(cursor, ErrorCode.EOFWhileParsingValue);
  if (isWhitespace(first)) fail(cursor, ErrorCode.InvalidSyntax);
  cursor.advance();
  if (!isAlphanumeric(first)) return first;

  let name = first;
  while (isAlphanumeric(cursor.current)) {
    name += cursor.take();
  }
  if (name === first) return first;

  const named = NAMED_CHARACTERS.get(name);
  if (named !== undefined) return named;

  if (/^u[0-9a-fA-F]{4}$/.test(name)) {
    const unit = parseInt(name.slice(1), 16);
    if (isHighSurrogate(unit) || isLowSurrogate(unit)) fail(cursor, ErrorCode.InvalidUnicodeCodePoint);
    return String.fromCharCode(unit);
  }
  return fail(cursor, ErrorCode.InvalidSyntax);
}

/** Tag name after `#`: symbol grammar, starting with a letter. */
export function readTagName(cursor: Cursor): string {
  if (!isAlpha(cursor.current)) fail(cursor, ErrorCode.InvalidSyntax);
  const matcher = new SymbolMatcher(false);
  while (isAtomChar(cursor.current)) {
    matcher.offer(cursor.current);
    if (!matcher.alive) fail(cursor, ErrorCode.InvalidSyntax);
    cursor.advance();
  }
  const token = matcher.finish();
  if (token === undefined || token.type !== 'symbol') return fail(cursor, ErrorCode.InvalidSyntax);
  return token.value;
}
