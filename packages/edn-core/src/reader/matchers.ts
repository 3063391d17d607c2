/**
 * Candidate matchers for bare atoms.
 *
 * Every matcher is offered the same characters in lockstep; each one decides
 * for itself whether the text so far can still become its kind of token.
 * Liveness only ever moves towards `Dead`, so a matcher that has rejected a
 * character stays out for the rest of the atom.
 */

export enum Liveness {
  Unknown,
  Alive,
  Dead,
}

/** What a matcher reports for a finished atom. */
export type AtomToken =
  | { type: 'nil' }
  | { type: 'boolean'; value: boolean }
  | { type: 'symbol'; value: string }
  | { type: 'keyword'; value: string }
  | { type: 'integer'; text: string }
  | { type: 'float'; text: string };

const GENERAL_SPECIAL = '.*+!-_?$%&=<>/';
const EXTENDED_SPECIAL = '#:';
const LEADING_SPECIAL = '+-.';

export function isAlpha(c: string): boolean {
  return /^\p{L}$/u.test(c);
}

export function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

export function isAlphanumeric(c: string): boolean {
  return isDigit(c) || isAlpha(c);
}

export function isGeneralSpecial(c: string): boolean {
  return c.length === 1 && GENERAL_SPECIAL.includes(c);
}

export function isExtendedSpecial(c: string): boolean {
  return c.length === 1 && EXTENDED_SPECIAL.includes(c);
}

/** Characters that may appear anywhere inside a bare atom. */
export function isAtomChar(c: string): boolean {
  return isAlphanumeric(c) || isGeneralSpecial(c) || isExtendedSpecial(c);
}

export abstract class Matcher {
  private liveness = Liveness.Unknown;

  get state(): Liveness {
    return this.liveness;
  }

  get alive(): boolean {
    return this.liveness !== Liveness.Dead;
  }

  offer(c: string): void {
    if (this.liveness === Liveness.Dead) return;
    this.liveness = this.accept(c) ? Liveness.Alive : Liveness.Dead;
  }

  /** The token, if the characters offered so far form a complete one. */
  finish(): AtomToken | undefined {
    if (this.liveness !== Liveness.Alive) return undefined;
    return this.complete();
  }

  protected abstract accept(c: string): boolean;
  protected abstract complete(): AtomToken | undefined;
}

/** Exact, case-sensitive match of a reserved word such as `nil`. */
export class LiteralMatcher extends Matcher {
  private matched = 0;

  constructor(
    private readonly word: string,
    private readonly token: AtomToken
  ) {
    super();
  }

  protected accept(c: string): boolean {
    if (this.matched >= this.word.length || this.word[this.matched] !== c) return false;
    this.matched++;
    return true;
  }

  protected complete(): AtomToken | undefined {
    return this.matched === this.word.length ? this.token : undefined;
  }
}

/**
 * Bare symbols, and keywords when the first character is the `:` sigil.
 * The body rules are the same for both.
 */
export class SymbolMatcher extends Matcher {
  private body = '';
  private keyword = false;
  private offered = 0;

  constructor(private readonly allowKeyword = true) {
    super();
  }

  protected accept(c: string): boolean {
    const first = this.offered === 0;
    this.offered++;
    if (first && c === ':' && this.allowKeyword) {
      this.keyword = true;
      return true;
    }
    if (!this.bodyAccepts(c)) return false;
    this.body += c;
    return true;
  }

  private bodyAccepts(c: string): boolean {
    const body = this.body;
    if (body.length === 0) {
      return isAlpha(c) || LEADING_SPECIAL.includes(c);
    }
    if (body.length === 1 && LEADING_SPECIAL.includes(body)) {
      return isAlpha(c) || isGeneralSpecial(c) || isExtendedSpecial(c);
    }
    if (body.endsWith('/')) {
      return c !== '/' && (isAlpha(c) || isGeneralSpecial(c));
    }
    return isAlphanumeric(c) || isGeneralSpecial(c) || isExtendedSpecial(c);
  }

  protected complete(): AtomToken | undefined {
    if (this.body.length === 0 || this.body.endsWith('/')) return undefined;
    return this.keyword ? { type: 'keyword', value: this.body } : { type: 'symbol', value: this.body };
  }
}

type NumberPhase =
  | 'start'
  | 'sign'
  | 'zero'
  | 'int'
  | 'fracStart'
  | 'frac'
  | 'expStart'
  | 'expSign'
  | 'exp'
  | 'bigSuffix'
  | 'decSuffix';

/** Integers (`N` suffix allowed) and floats (`M` suffix allowed). */
export class NumberMatcher extends Matcher {
  private phase: NumberPhase = 'start';
  private text = '';

  protected accept(c: string): boolean {
    const next = this.transition(c);
    if (next === undefined) return false;
    this.phase = next;
    this.text += c;
    return true;
  }

  private transition(c: string): NumberPhase | undefined {
    switch (this.phase) {
      case 'start':
        if (c === '+' || c === '-') return 'sign';
        if (c === '0') return 'zero';
        return isDigit(c) ? 'int' : undefined;
      case 'sign':
        if (c === '0') return 'zero';
        return isDigit(c) ? 'int' : undefined;
      case 'zero':
        return this.afterInteger(c);
      case 'int':
        return isDigit(c) ? 'int' : this.afterInteger(c);
      case 'fracStart':
      case 'frac':
        if (isDigit(c)) return 'frac';
        if (c === 'e' || c === 'E') return 'expStart';
        return c === 'M' ? 'decSuffix' : undefined;
      case 'expStart':
        if (c === '+' || c === '-') return 'expSign';
        return isDigit(c) ? 'exp' : undefined;
      case 'expSign':
        return isDigit(c) ? 'exp' : undefined;
      case 'exp':
        if (isDigit(c)) return 'exp';
        return c === 'M' ? 'decSuffix' : undefined;
      case 'bigSuffix':
      case 'decSuffix':
        return undefined;
    }
  }

  private afterInteger(c: string): NumberPhase | undefined {
    switch (c) {
      case '.':
        return 'fracStart';
      case 'e':
      case 'E':
        return 'expStart';
      case 'N':
        return 'bigSuffix';
      case 'M':
        return 'decSuffix';
      default:
        return undefined;
    }
  }

  protected complete(): AtomToken | undefined {
    switch (this.phase) {
      case 'zero':
      case 'int':
        return { type: 'integer', text: this.text };
      case 'bigSuffix':
        return { type: 'integer', text: this.text.slice(0, -1) };
      case 'fracStart':
      case 'frac':
      case 'exp':
        return { type: 'float', text: this.text };
      case 'decSuffix':
        return { type: 'float', text: this.text.slice(0, -1) };
      default:
        return undefined;
    }
  }
}

/** Fresh candidates for one bare atom, in precedence order. */
export function candidates(): Matcher[] {
  return [
    new LiteralMatcher('nil', { type: 'nil' }),
    new LiteralMatcher('true', { type: 'boolean', value: true }),
    new LiteralMatcher('false', { type: 'boolean', value: false }),
    new NumberMatcher(),
    new SymbolMatcher(),
  ];
}
