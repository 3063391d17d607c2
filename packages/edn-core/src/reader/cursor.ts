/**
 * Cursor over a character source, plus the whitespace skipper.
 *
 * The cursor holds exactly one character of lookahead and never buffers
 * anything behind it. `line`/`column` are the 1-based position of the
 * lookahead character.
 */

import { EdnSourceError } from '../errors.js';

/** Lookahead value once the source is exhausted. Never a real code point. */
export const EOF = '';

/** Anything that yields code points one at a time; a plain string qualifies. */
export type CharSource = Iterable<string>;

/**
 * Turn a sequence of arbitrary string chunks (file reads, socket data) into a
 * code point source.
 */
export function* charsOf(chunks: Iterable<string>): Generator<string, void, undefined> {
  for (const chunk of chunks) {
    yield* chunk;
  }
}

export class Cursor {
  private readonly source: Iterator<string>;
  private ch: string = EOF;
  private started = false;
  private exhausted = false;
  private _line = 1;
  private _column = 1;

  constructor(source: CharSource, readonly file?: string) {
    this.source = source[Symbol.iterator]();
  }

  get current(): string {
    return this.ch;
  }

  get line(): number {
    return this._line;
  }

  get column(): number {
    return this._column;
  }

  get eof(): boolean {
    return this.ch === EOF;
  }

  is(c: string): boolean {
    return this.ch === c;
  }

  /**
   * Pull the next character into the lookahead. Returns false once the
   * source is exhausted; the position then stays on the last character, so
   * a newline that ends the input does not start a new line.
   */
  advance(): boolean {
    if (this.exhausted) return false;

    let step: IteratorResult<string>;
    try {
      step = this.source.next();
    } catch (err) {
      this.exhausted = true;
      this.ch = EOF;
      throw new EdnSourceError(err, this.file);
    }

    if (step.done) {
      this.exhausted = true;
      this.ch = EOF;
      return false;
    }

    if (this.started) {
      if (this.ch === '\n') {
        this._line++;
        this._column = 1;
      } else {
        this._column++;
      }
    }
    this.started = true;
    this.ch = step.value;
    return true;
  }

  /** Consume the lookahead and return it. */
  take(): string {
    const c = this.ch;
    this.advance();
    return c;
  }
}

export function isWhitespace(c: string): boolean {
  return c === ' ' || c === ',' || c === '\t' || c === '\n' || c === '\r';
}

/**
 * Consume a maximal run of whitespace and commas. Returns the consumed span,
 * or undefined when the lookahead was not whitespace.
 */
export function skipWhitespace(cursor: Cursor): string | undefined {
  let span = '';
  while (isWhitespace(cursor.current)) {
    span += cursor.take();
  }
  return span.length > 0 ? span : undefined;
}
