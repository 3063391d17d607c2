/**
 * Folds a parser's event stream into a single value.
 *
 * Like the parser, the builder keeps nesting on an explicit stack, so
 * depth is bounded by memory rather than by the call stack.
 */

import { EdnForeignError, EdnSyntaxError, ErrorCode, errorFromDetail } from '../errors.js';
import {
  type MapEntry,
  type Value,
  type ValueModel,
  makeList,
  makeTag,
  makeVector,
  structuralModel,
} from '../value.js';
import type { CharSource } from './cursor.js';
import { type CollectionKind, isScalarEvent, scalarValue } from './events.js';
import { Parser, type ParserOptions } from './parser.js';

export interface BuildOptions extends ParserOptions {
  /** Equality for map keys and set members (default: structural). */
  model?: ValueModel;
}

interface BuildFrame {
  collection: CollectionKind | 'root';
  items: Value[];
  /** Equality keys of `items`; only kept for sets and maps. */
  keys: Map<string, number>;
  /** Set when a map key has been read and its value has not. */
  pendingKey?: { value: Value; key: string };
  /** Tags waiting for the next complete value, outermost first. */
  tags: string[];
}

function newFrame(collection: BuildFrame['collection']): BuildFrame {
  return { collection, items: [], keys: new Map(), tags: [] };
}

class ValueBuilder {
  private readonly stack: BuildFrame[] = [newFrame('root')];
  private result: Value | undefined;

  constructor(
    private readonly parser: Parser,
    private readonly model: ValueModel
  ) {}

  build(): Value {
    while (this.result === undefined) {
      const event = this.parser.pull();
      if (event === undefined) {
        // the parser only ends without an error after a complete value
        throw new EdnSyntaxError(ErrorCode.EOFWhileParsingValue, this.parser.line, this.parser.column, this.parser.file);
      }
      if (event.type === 'error') throw errorFromDetail(event.error, this.parser.file);

      if (isScalarEvent(event)) {
        this.deliver(scalarValue(event));
      } else if (event.type === 'tag') {
        this.top().tags.push(event.tag);
      } else if (event.type === 'start') {
        this.stack.push(newFrame(event.collection));
      } else {
        const frame = this.stack.pop();
        if (frame === undefined || frame.collection !== event.collection) {
          throw new Error(`Unbalanced ${event.collection} end event`);
        }
        this.deliver(this.complete(frame));
      }
    }

    // confirm nothing but whitespace follows the value
    const trailing = this.parser.pull();
    if (trailing?.type === 'error') throw errorFromDetail(trailing.error, this.parser.file);
    return this.result;
  }

  private top(): BuildFrame {
    const frame = this.stack[this.stack.length - 1];
    if (frame === undefined) throw new Error('Value builder stack is empty');
    return frame;
  }

  private complete(frame: BuildFrame): Value {
    switch (frame.collection) {
      case 'list':
        return makeList(frame.items);
      case 'vector':
        return makeVector(frame.items);
      case 'set':
        return { kind: 'set', items: frame.items };
      case 'map': {
        const entries: MapEntry[] = [];
        for (let i = 0; i + 1 < frame.items.length; i += 2) {
          entries.push([frame.items[i], frame.items[i + 1]]);
        }
        return { kind: 'map', entries };
      }
      case 'root':
        throw new Error('Root frame cannot be completed');
    }
  }

  /** Hand a finished value to the enclosing frame, applying pending tags. */
  private deliver(value: Value): void {
    const frame = this.top();
    let tagged = value;
    for (let tag = frame.tags.pop(); tag !== undefined; tag = frame.tags.pop()) {
      tagged = makeTag(tag, tagged);
    }

    switch (frame.collection) {
      case 'root':
        this.result = tagged;
        return;
      case 'list':
      case 'vector':
        frame.items.push(tagged);
        return;
      case 'set': {
        const key = this.keyOf(tagged);
        if (frame.keys.has(key)) return;
        frame.keys.set(key, frame.items.length);
        frame.items.push(tagged);
        return;
      }
      case 'map': {
        const pending = frame.pendingKey;
        if (pending === undefined) {
          frame.pendingKey = { value: tagged, key: this.keyOf(tagged) };
          return;
        }
        frame.pendingKey = undefined;
        const at = frame.keys.get(pending.key);
        if (at === undefined) {
          frame.keys.set(pending.key, frame.items.length);
          frame.items.push(pending.value, tagged);
        } else {
          frame.items[at + 1] = tagged;
        }
        return;
      }
    }
  }

  private keyOf(value: Value): string {
    let key: string | undefined;
    try {
      key = this.model.keyOf(value);
    } catch (err) {
      throw new EdnForeignError(err, this.parser.line, this.parser.column, this.parser.file);
    }
    if (key === undefined) {
      throw new EdnSyntaxError(ErrorCode.KeyMustBeAValue, this.parser.line, this.parser.column, this.parser.file);
    }
    return key;
  }
}

/**
 * Pull events from `parser` until one top-level value is complete and the
 * stream has ended. Any error event is thrown as an `EdnError`.
 */
export function buildValue(parser: Parser, model: ValueModel = structuralModel): Value {
  return new ValueBuilder(parser, model).build();
}

/** Parse exactly one value from `source`. */
export function readValue(source: CharSource, options: BuildOptions = {}): Value {
  const { model, ...parserOptions } = options;
  return buildValue(new Parser(source, parserOptions), model);
}
