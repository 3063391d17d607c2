/**
 * Reader errors. Every failure, whether a syntax error, a failing character
 * source or a rejected map key, travels as a `ParserError` detail; the
 * classes here wrap a detail so it can be thrown.
 */

export enum ErrorCode {
  InvalidSyntax = 'InvalidSyntax',
  InvalidNumber = 'InvalidNumber',
  InvalidEscape = 'InvalidEscape',
  InvalidUnicodeCodePoint = 'InvalidUnicodeCodePoint',
  EOFWhileParsingObject = 'EOFWhileParsingObject',
  EOFWhileParsingArray = 'EOFWhileParsingArray',
  EOFWhileParsingValue = 'EOFWhileParsingValue',
  EOFWhileParsingString = 'EOFWhileParsingString',
  KeyMustBeAValue = 'KeyMustBeAValue',
  ExpectedSeparator = 'ExpectedSeparator',
  MissingMapValue = 'MissingMapValue',
  TrailingCharacters = 'TrailingCharacters',
  TrailingComma = 'TrailingComma',
}

export interface SyntaxErrorDetail {
  type: 'syntax';
  code: ErrorCode;
  line: number;
  column: number;
}

/** The character source threw while being pulled. */
export interface IoErrorDetail {
  type: 'io';
  message: string;
  cause: unknown;
}

/** The value model refused a map key or set member. */
export interface ForeignErrorDetail {
  type: 'foreign';
  message: string;
  line: number;
  column: number;
  cause: unknown;
}

export type ParserError = SyntaxErrorDetail | IoErrorDetail | ForeignErrorDetail;

const MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.InvalidSyntax]: 'Invalid syntax',
  [ErrorCode.InvalidNumber]: 'Invalid number',
  [ErrorCode.InvalidEscape]: 'Invalid escape sequence',
  [ErrorCode.InvalidUnicodeCodePoint]: 'Invalid unicode code point',
  [ErrorCode.EOFWhileParsingObject]: 'Unexpected end of input inside a map',
  [ErrorCode.EOFWhileParsingArray]: 'Unexpected end of input inside a collection',
  [ErrorCode.EOFWhileParsingValue]: 'Unexpected end of input, expected a value',
  [ErrorCode.EOFWhileParsingString]: 'Unterminated string',
  [ErrorCode.KeyMustBeAValue]: 'Value is not acceptable as a key',
  [ErrorCode.ExpectedSeparator]: 'Expected whitespace or comma between elements',
  [ErrorCode.MissingMapValue]: 'Map key has no value',
  [ErrorCode.TrailingCharacters]: 'Trailing characters after value',
  [ErrorCode.TrailingComma]: 'Trailing comma before closing delimiter',
};

/** One-line human-readable message for an error detail (no location). */
export function describeError(detail: ParserError): string {
  switch (detail.type) {
    case 'syntax':
      return MESSAGES[detail.code];
    case 'io':
      return `Read failed: ${detail.message}`;
    case 'foreign':
      return `Value model rejected key: ${detail.message}`;
  }
}

export class EdnError extends Error {
  override readonly name: string = 'EdnError';
  readonly detail: ParserError;
  readonly file?: string;

  constructor(detail: ParserError, file?: string) {
    super(describeError(detail));
    this.detail = detail;
    this.file = file;
    if (detail.type !== 'syntax') this.cause = detail.cause;
    Object.setPrototypeOf(this, EdnError.prototype);
  }

  get line(): number | undefined {
    return this.detail.type === 'io' ? undefined : this.detail.line;
  }

  get column(): number | undefined {
    return this.detail.type === 'io' ? undefined : this.detail.column;
  }

  /** Human-readable location string */
  get location(): string {
    if (this.detail.type === 'io') return this.file ?? '';
    const at = `line ${this.detail.line}, column ${this.detail.column}`;
    return this.file ? `${this.file}, ${at}` : at;
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export class EdnSyntaxError extends EdnError {
  override readonly name = 'EdnSyntaxError';
  declare readonly detail: SyntaxErrorDetail;

  constructor(code: ErrorCode, line: number, column: number, file?: string) {
    super({ type: 'syntax', code, line, column }, file);
    Object.setPrototypeOf(this, EdnSyntaxError.prototype);
  }

  get code(): ErrorCode {
    return this.detail.code;
  }
}

export class EdnSourceError extends EdnError {
  override readonly name = 'EdnSourceError';
  declare readonly detail: IoErrorDetail;

  constructor(cause: unknown, file?: string) {
    super({ type: 'io', message: cause instanceof Error ? cause.message : String(cause), cause }, file);
    Object.setPrototypeOf(this, EdnSourceError.prototype);
  }
}

export class EdnForeignError extends EdnError {
  override readonly name = 'EdnForeignError';
  declare readonly detail: ForeignErrorDetail;

  constructor(cause: unknown, line: number, column: number, file?: string) {
    super(
      {
        type: 'foreign',
        message: cause instanceof Error ? cause.message : String(cause),
        line,
        column,
        cause,
      },
      file
    );
    Object.setPrototypeOf(this, EdnForeignError.prototype);
  }
}

/** Rebuild the throwable for an error event's detail. */
export function errorFromDetail(detail: ParserError, file?: string): EdnError {
  switch (detail.type) {
    case 'syntax':
      return new EdnSyntaxError(detail.code, detail.line, detail.column, file);
    case 'io':
      return new EdnSourceError(detail.cause, file);
    case 'foreign':
      return new EdnForeignError(detail.cause, detail.line, detail.column, file);
  }
}
