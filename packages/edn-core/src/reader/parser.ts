/**
 * Edn event parser.
 *
 * Nesting lives on an explicit frame stack and the run state says what the
 * next pull has to do, so the parser can be left alone between any two
 * pulls and picked up again later. Each pull performs one logical step and
 * yields at most one event; an error is always the last event.
 */

import { EdnError, ErrorCode, type ParserError } from '../errors.js';
import { fail, readAtom, readTagName } from './atoms.js';
import { type CharSource, Cursor, EOF, skipWhitespace } from './cursor.js';
import { CLOSERS, type CollectionKind, type EdnEvent } from './events.js';

export interface ParserOptions {
  /** When false, a comma directly before a closing delimiter is an error (default true). */
  allowTrailingComma?: boolean;
  /** Name used in error descriptions. */
  file?: string;
}

export type ParserState =
  | { kind: 'start' }
  | { kind: 'inArray'; first: boolean }
  | { kind: 'awaitingArrayComma' }
  | { kind: 'inObject'; first: boolean }
  | { kind: 'awaitingObjectComma' }
  | { kind: 'beforeFinish' }
  | { kind: 'finished' };

interface Frame {
  collection: CollectionKind;
  /** Elements begun so far; in a map, odd means a key is waiting for its value. */
  count: number;
}

function isCloser(c: string): boolean {
  return c === ')' || c === ']' || c === '}';
}

function describeState(state: ParserState): string {
  return 'first' in state ? `${state.kind}(${state.first})` : state.kind;
}

export class Parser implements IterableIterator<EdnEvent> {
  private readonly cursor: Cursor;
  private readonly stack: Frame[] = [];
  private readonly allowTrailingComma: boolean;
  private _state: ParserState = { kind: 'start' };
  private primed = false;
  /** A tag was emitted and the value it applies to has not started yet. */
  private tagPending = false;

  constructor(source: CharSource, options: ParserOptions = {}) {
    this.cursor = new Cursor(source, options.file);
    this.allowTrailingComma = options.allowTrailingComma ?? true;
  }

  get state(): Readonly<ParserState> {
    return this._state;
  }

  /** Number of collections currently open. */
  get depth(): number {
    return this.stack.length;
  }

  get line(): number {
    return this.cursor.line;
  }

  get column(): number {
    return this.cursor.column;
  }

  get file(): string | undefined {
    return this.cursor.file;
  }

  get finished(): boolean {
    return this._state.kind === 'finished';
  }

  /** Next event, or undefined once the stream has ended. */
  pull(): EdnEvent | undefined {
    if (this._state.kind === 'finished') return undefined;
    try {
      if (!this.primed) {
        this.primed = true;
        this.cursor.advance();
      }
      return this.step();
    } catch (err) {
      if (!(err instanceof EdnError)) throw err;
      this.transition({ kind: 'finished' });
      return this.errorEvent(err.detail);
    }
  }

  next(): IteratorResult<EdnEvent, undefined> {
    const event = this.pull();
    return event === undefined ? { done: true, value: undefined } : { done: false, value: event };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private step(): EdnEvent | undefined {
    const state = this._state;
    switch (state.kind) {
      case 'start':
        return this.parseStart();
      case 'inArray':
      case 'inObject':
        return this.parseInCollection(skipWhitespace(this.cursor));
      case 'awaitingArrayComma':
      case 'awaitingObjectComma':
        return this.parseAfterElement();
      case 'beforeFinish':
        return this.parseBeforeFinish();
      case 'finished':
        return undefined;
    }
  }

  private parseStart(): EdnEvent {
    skipWhitespace(this.cursor);
    const c = this.cursor.current;
    if (c === EOF) fail(this.cursor, ErrorCode.EOFWhileParsingValue);
    if (isCloser(c)) fail(this.cursor, ErrorCode.InvalidSyntax);
    return this.parseElement();
  }

  /**
   * After an element: either the collection closes, or a separator run has
   * to come before the next element.
   */
  private parseAfterElement(): EdnEvent {
    const span = skipWhitespace(this.cursor);
    const c = this.cursor.current;
    if (span === undefined && c !== EOF && !isCloser(c)) {
      fail(this.cursor, ErrorCode.ExpectedSeparator);
    }
    this.transition(this.top().collection === 'map' ? { kind: 'inObject', first: false } : { kind: 'inArray', first: false });
    return this.parseInCollection(span);
  }

  /** `span` is the separator run consumed just before the lookahead. */
  private parseInCollection(span: string | undefined): EdnEvent {
    const frame = this.top();
    const c = this.cursor.current;

    if (this.tagPending) {
      if (c === EOF) fail(this.cursor, ErrorCode.EOFWhileParsingValue);
      if (isCloser(c)) fail(this.cursor, ErrorCode.InvalidSyntax);
      return this.parseElement();
    }
    if (c === EOF) {
      fail(this.cursor, frame.collection === 'map' ? ErrorCode.EOFWhileParsingObject : ErrorCode.EOFWhileParsingArray);
    }
    if (!isCloser(c)) return this.parseElement();

    if (c !== CLOSERS[frame.collection]) fail(this.cursor, ErrorCode.InvalidSyntax);
    if (!this.allowTrailingComma && span !== undefined && span.trimEnd().endsWith(',')) {
      fail(this.cursor, ErrorCode.TrailingComma);
    }
    if (frame.collection === 'map' && frame.count % 2 === 1) {
      fail(this.cursor, ErrorCode.MissingMapValue);
    }
    return this.close();
  }

  private parseBeforeFinish(): EdnEvent | undefined {
    skipWhitespace(this.cursor);
    if (this.cursor.eof) {
      this.transition({ kind: 'finished' });
      return undefined;
    }
    return fail(this.cursor, ErrorCode.TrailingCharacters);
  }

  /** One element at the lookahead: a collection opener, a tag, or an atom. */
  private parseElement(): EdnEvent {
    const line = this.cursor.line;
    const column = this.cursor.column;

    if (this.tagPending) {
      this.tagPending = false;
    } else if (this.stack.length > 0) {
      this.top().count++;
    }

    switch (this.cursor.current) {
      case '(':
        this.cursor.advance();
        return this.open('list', line, column);
      case '[':
        this.cursor.advance();
        return this.open('vector', line, column);
      case '{':
        this.cursor.advance();
        return this.open('map', line, column);
      case '#': {
        this.cursor.advance();
        if (this.cursor.is('{')) {
          this.cursor.advance();
          return this.open('set', line, column);
        }
        const tag = readTagName(this.cursor);
        this.tagPending = true;
        return { type: 'tag', tag, line, column };
      }
    }

    const scalar = readAtom(this.cursor);
    this.transition(this.afterValue());
    return { ...scalar, line, column };
  }

  private open(collection: CollectionKind, line: number, column: number): EdnEvent {
    this.stack.push({ collection, count: 0 });
    this.transition(collection === 'map' ? { kind: 'inObject', first: true } : { kind: 'inArray', first: true });
    return { type: 'start', collection, line, column };
  }

  private close(): EdnEvent {
    const line = this.cursor.line;
    const column = this.cursor.column;
    this.cursor.advance();
    const frame = this.top();
    this.stack.pop();
    this.transition(this.afterValue());
    return { type: 'end', collection: frame.collection, line, column };
  }

  /** State once a complete value has been produced at the current depth. */
  private afterValue(): ParserState {
    const top = this.stack[this.stack.length - 1];
    if (top === undefined) return { kind: 'beforeFinish' };
    return top.collection === 'map' ? { kind: 'awaitingObjectComma' } : { kind: 'awaitingArrayComma' };
  }

  private top(): Frame {
    const frame = this.stack[this.stack.length - 1];
    if (frame === undefined) {
      throw new Error(`Parser in state ${describeState(this._state)} has no open collection`);
    }
    return frame;
  }

  private transition(next: ParserState): void {
    if (process.env.DEBUG_EDN) {
      console.error(
        `[edn] ${describeState(this._state)} -> ${describeState(next)} at ${this.cursor.line}:${this.cursor.column} depth=${this.stack.length}`
      );
    }
    this._state = next;
  }

  private errorEvent(error: ParserError): EdnEvent {
    if (error.type === 'io') {
      return { type: 'error', error, line: this.cursor.line, column: this.cursor.column };
    }
    return { type: 'error', error, line: error.line, column: error.column };
  }
}
