/**
 * Error classes for the JSON5 parser and stringifier
 */

import type { Span } from "../core/types";

export type LexErrorKind =
  | "UnterminatedString"
  | "InvalidEscape"
  | "InvalidNumber"
  | "UnexpectedCharacter"
  | "UnterminatedComment";

export type SyntaxErrorKind =
  | "UnexpectedToken"
  | "UnterminatedStructure"
  | "TrailingContent"
  | "DuplicateKey"
  | "MaxDepthExceeded";

export type ParseErrorKind = LexErrorKind | SyntaxErrorKind;

/**
 * Base class for every error raised while parsing. `line` and `column` are
 * copied from the start of `span`.
 */
export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly span: Span;
  readonly line: number;
  readonly column: number;
  /** Message without the location suffix */
  readonly reason: string;

  constructor(kind: ParseErrorKind, reason: string, span: Span) {
    super(
      `${reason} at line ${span.start.line}, column ${span.start.column}`
    );
    this.name = "ParseError";
    this.kind = kind;
    this.reason = reason;
    this.span = span;
    this.line = span.start.line;
    this.column = span.start.column;
  }
}

/**
 * A malformed token
 */
export class LexError extends ParseError {
  declare readonly kind: LexErrorKind;

  constructor(kind: LexErrorKind, reason: string, span: Span) {
    super(kind, reason, span);
    this.name = "LexError";
  }
}

/**
 * Well-formed tokens in an order the grammar does not allow
 */
export class Json5SyntaxError extends ParseError {
  declare readonly kind: SyntaxErrorKind;
  /** What the parser would have accepted, for UnexpectedToken */
  readonly expected: readonly string[];
  /** Description of the offending token, for UnexpectedToken */
  readonly found?: string;

  constructor(
    kind: SyntaxErrorKind,
    reason: string,
    span: Span,
    details: { expected?: readonly string[]; found?: string } = {}
  ) {
    super(kind, reason, span);
    this.name = "Json5SyntaxError";
    this.expected = details.expected ?? [];
    this.found = details.found;
  }
}

export class StringifyOptionsError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "StringifyOptionsError";
    this.cause = cause;
  }
}
