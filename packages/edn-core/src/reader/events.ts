/**
 * Parse events produced by the reader.
 */

import type { ParserError } from '../errors.js';
import {
  type Value,
  makeBoolean,
  makeCharacter,
  makeFloat,
  makeKeyword,
  makeNil,
  makeString,
  makeSymbol,
} from '../value.js';

export type CollectionKind = 'list' | 'vector' | 'set' | 'map';

/** Start of the source text that produced the event. */
export interface EventPosition {
  line: number;
  column: number;
}

export type ScalarEvent =
  | { type: 'nil' }
  | { type: 'boolean'; value: boolean }
  | { type: 'string'; value: string }
  | { type: 'character'; value: string }
  | { type: 'symbol'; value: string }
  | { type: 'keyword'; value: string }
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number };

export type EdnEvent = EventPosition &
  (
    | ScalarEvent
    | { type: 'tag'; tag: string }
    | { type: 'start'; collection: CollectionKind }
    | { type: 'end'; collection: CollectionKind }
    | { type: 'error'; error: ParserError }
  );

export function isScalarEvent(event: EdnEvent): event is EdnEvent & ScalarEvent {
  switch (event.type) {
    case 'tag':
    case 'start':
    case 'end':
    case 'error':
      return false;
    default:
      return true;
  }
}

export function scalarValue(event: ScalarEvent): Value {
  switch (event.type) {
    case 'nil':
      return makeNil();
    case 'boolean':
      return makeBoolean(event.value);
    case 'string':
      return makeString(event.value);
    case 'character':
      return makeCharacter(event.value);
    case 'symbol':
      return makeSymbol(event.value);
    case 'keyword':
      return makeKeyword(event.value);
    case 'integer':
      return { kind: 'integer', value: event.value };
    case 'float':
      return makeFloat(event.value);
  }
}

export const CLOSERS: Readonly<Record<CollectionKind, string>> = {
  list: ')',
  vector: ']',
  set: '}',
  map: '}',
};
