/**
 * edn-core - streaming, resumable Edn reader
 *
 * - Cursor and whitespace skipper over any code point source
 * - Atom recognizer running candidate matchers in parallel
 * - Structural state machine producing parse events
 * - Value builder folding events into values
 */

export * from './errors.js';
export * from './value.js';

export { type CharSource, Cursor, EOF, charsOf, isWhitespace, skipWhitespace } from './reader/cursor.js';
export {
  type AtomToken,
  Liveness,
  LiteralMatcher,
  Matcher,
  NumberMatcher,
  SymbolMatcher,
  candidates,
} from './reader/matchers.js';
export { readAtom } from './reader/atoms.js';
export {
  type CollectionKind,
  type EdnEvent,
  type EventPosition,
  type ScalarEvent,
  CLOSERS,
  isScalarEvent,
  scalarValue,
} from './reader/events.js';
export { Parser, type ParserOptions, type ParserState } from './reader/parser.js';
export { type BuildOptions, buildValue, readValue } from './reader/builder.js';
