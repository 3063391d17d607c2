/**
 * Edn values.
 *
 * A closed union discriminated on `kind`; consumers switch over it and the
 * compiler checks the switch is exhaustive. Collections own their items and
 * nothing points back at its container.
 */

export type Value =
  | NilValue
  | BooleanValue
  | StringValue
  | CharacterValue
  | SymbolValue
  | KeywordValue
  | IntegerValue
  | FloatValue
  | ListValue
  | VectorValue
  | SetValue
  | MapValue
  | TagValue;

export interface NilValue {
  readonly kind: 'nil';
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/** A single code point. */
export interface CharacterValue {
  readonly kind: 'character';
  readonly value: string;
}

export interface SymbolValue {
  readonly kind: 'symbol';
  readonly name: string;
}

/** `name` excludes the leading colon. */
export interface KeywordValue {
  readonly kind: 'keyword';
  readonly name: string;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface VectorValue {
  readonly kind: 'vector';
  readonly items: readonly Value[];
}

export interface SetValue {
  readonly kind: 'set';
  readonly items: readonly Value[];
}

export type MapEntry = readonly [Value, Value];

export interface MapValue {
  readonly kind: 'map';
  readonly entries: readonly MapEntry[];
}

export interface TagValue {
  readonly kind: 'tag';
  readonly tag: string;
  readonly value: Value;
}

export const MIN_INTEGER = -(2n ** 63n);
export const MAX_INTEGER = 2n ** 63n - 1n;

export const theNil: NilValue = Object.freeze({ kind: 'nil' });
export const theTrue: BooleanValue = Object.freeze({ kind: 'boolean', value: true });
export const theFalse: BooleanValue = Object.freeze({ kind: 'boolean', value: false });

export function makeNil(): NilValue {
  return theNil;
}

export function makeBoolean(value: boolean): BooleanValue {
  return value ? theTrue : theFalse;
}

export function makeString(value: string): StringValue {
  return { kind: 'string', value };
}

export function makeCharacter(value: string): CharacterValue {
  if ([...value].length !== 1) {
    throw new RangeError(`Character must be a single code point: ${JSON.stringify(value)}`);
  }
  return { kind: 'character', value };
}

export function makeSymbol(name: string): SymbolValue {
  return { kind: 'symbol', name };
}

export function makeKeyword(name: string): KeywordValue {
  return { kind: 'keyword', name };
}

export function makeInteger(value: bigint | number): IntegerValue {
  const n = BigInt(value);
  if (n < MIN_INTEGER || n > MAX_INTEGER) {
    throw new RangeError(`Integer out of 64-bit range: ${n}`);
  }
  return { kind: 'integer', value: n };
}

export function makeFloat(value: number): FloatValue {
  return { kind: 'float', value };
}

export function makeList(items: readonly Value[]): ListValue {
  return { kind: 'list', items };
}

export function makeVector(items: readonly Value[]): VectorValue {
  return { kind: 'vector', items };
}

/** Collapses duplicates under `model`, keeping the first occurrence. */
export function makeSet(items: readonly Value[], model: ValueModel = structuralModel): SetValue {
  const seen = new Set<string>();
  const unique: Value[] = [];
  for (const item of items) {
    const key = requireKey(model, item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return { kind: 'set', items: unique };
}

/** A repeated key keeps its first position and takes the last value. */
export function makeMap(entries: readonly MapEntry[], model: ValueModel = structuralModel): MapValue {
  const index = new Map<string, number>();
  const out: MapEntry[] = [];
  for (const [k, v] of entries) {
    const key = requireKey(model, k);
    const at = index.get(key);
    if (at === undefined) {
      index.set(key, out.length);
      out.push([k, v]);
    } else {
      out[at] = [out[at][0], v];
    }
  }
  return { kind: 'map', entries: out };
}

export function makeTag(tag: string, value: Value): TagValue {
  return { kind: 'tag', tag, value };
}

/**
 * Equality for map keys and set members. `keyOf` returns a string that is
 * equal for equal values, or undefined when the value cannot be a key.
 */
export interface ValueModel {
  keyOf(value: Value): string | undefined;
}

function requireKey(model: ValueModel, value: Value): string {
  const key = model.keyOf(value);
  if (key === undefined) {
    throw new TypeError(`Value of kind ${value.kind} cannot be used as a key`);
  }
  return key;
}

function scalarKey(value: Value): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return `s${JSON.stringify(value.value)}`;
    case 'character':
      return `c${JSON.stringify(value.value)}`;
    case 'symbol':
      return `y${JSON.stringify(value.name)}`;
    case 'keyword':
      return `k${JSON.stringify(value.name)}`;
    case 'integer':
      return `i${value.value}`;
    case 'float':
      return Object.is(value.value, -0) ? 'f0' : `f${value.value}`;
    default:
      throw new TypeError(`Value of kind ${value.kind} is not a scalar`);
  }
}

/** Direct children in key order; map entries contribute key then value. */
function childrenOf(value: Value): readonly Value[] {
  switch (value.kind) {
    case 'list':
    case 'vector':
    case 'set':
      return value.items;
    case 'map': {
      const children: Value[] = [];
      for (const [k, v] of value.entries) children.push(k, v);
      return children;
    }
    case 'tag':
      return [value.value];
    default:
      return [];
  }
}

function combineKeys(value: Value, keys: readonly string[]): string {
  switch (value.kind) {
    case 'list':
      return `(${keys.join(' ')})`;
    case 'vector':
      return `[${keys.join(' ')}]`;
    case 'set':
      return `#{${[...keys].sort().join(' ')}}`;
    case 'map': {
      const pairs: string[] = [];
      for (let i = 0; i + 1 < keys.length; i += 2) pairs.push(`${keys[i]} ${keys[i + 1]}`);
      return `{${pairs.sort().join(',')}}`;
    }
    case 'tag':
      return `#${value.tag} ${keys.join('')}`;
    default:
      return scalarKey(value);
  }
}

// values are immutable, so a subtree's key never changes once computed
const keyCache = new WeakMap<Value, string>();

function remember(value: Value, key: string): string {
  keyCache.set(value, key);
  return key;
}

interface KeyFrame {
  value: Value;
  children: readonly Value[];
  keys: string[];
}

/** Post-order walk on an explicit stack; nesting depth is bounded by memory. */
function structuralKey(root: Value): string {
  const stack: KeyFrame[] = [];
  let next: Value = root;
  for (;;) {
    let key = keyCache.get(next);
    if (key === undefined) {
      const children = childrenOf(next);
      if (children.length > 0) {
        stack.push({ value: next, children, keys: [] });
        next = children[0];
        continue;
      }
      key = remember(next, combineKeys(next, []));
    }

    // hand the key up through every frame it completes
    for (;;) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) return key;
      frame.keys.push(key);
      if (frame.keys.length < frame.children.length) {
        next = frame.children[frame.keys.length];
        break;
      }
      stack.pop();
      key = remember(frame.value, combineKeys(frame.value, frame.keys));
    }
  }
}

/**
 * Default model: equal when variant and content are equal. Integers and
 * floats never compare equal to each other, nor do lists and vectors.
 */
export const structuralModel: ValueModel = {
  keyOf: structuralKey,
};

export function valuesEqual(a: Value, b: Value, model: ValueModel = structuralModel): boolean {
  const ka = model.keyOf(a);
  return ka !== undefined && ka === model.keyOf(b);
}
