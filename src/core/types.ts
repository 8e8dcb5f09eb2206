/**
 * Core types for the JSON5 lexer and parser
 */

/**
 * A point in the source text. `offset` counts UTF-16 code units from the
 * start of the input; `line` and `column` are 1-based.
 */
export type Position = {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
};

/**
 * Half-open range `[start, end)` over the source text
 */
export type Span = {
  readonly start: Position;
  readonly end: Position;
};

export type Punctuator = "{" | "}" | "[" | "]" | ":" | ",";

/**
 * Lexical shape of a numeric literal. The parser turns it into an integer
 * or float node without looking at the lexeme again.
 */
export type NumberLiteral =
  | {
      readonly kind: "decimal";
      readonly sign: 1 | -1;
      /** Integer part digits, possibly empty (".5") */
      readonly digits: string;
      /** Fraction digits, or null when there was no "." */
      readonly fraction: string | null;
      /** Exponent including its sign ("+3", "-2", "4"), or null */
      readonly exponent: string | null;
    }
  | {
      readonly kind: "hex";
      readonly sign: 1 | -1;
      /** Digit values (0-15), most significant first */
      readonly digits: readonly number[];
    }
  | {
      readonly kind: "infinity" | "nan";
      readonly sign: 1 | -1;
    };

type TokenBase = {
  /** Raw text exactly as written in the source */
  readonly lexeme: string;
  readonly span: Span;
};

export type PunctuatorToken = TokenBase & {
  readonly type: "punctuator";
  readonly value: Punctuator;
};

export type StringToken = TokenBase & {
  readonly type: "string";
  readonly value: string;
};

export type IdentifierToken = TokenBase & {
  readonly type: "identifier";
  readonly value: string;
};

export type NumberToken = TokenBase & {
  readonly type: "number";
  readonly literal: NumberLiteral;
};

export type BooleanToken = TokenBase & {
  readonly type: "boolean";
  readonly value: boolean;
};

export type NullToken = TokenBase & {
  readonly type: "null";
};

export type EofToken = TokenBase & {
  readonly type: "eof";
};

export type Token =
  | PunctuatorToken
  | StringToken
  | IdentifierToken
  | NumberToken
  | BooleanToken
  | NullToken
  | EofToken;

export type TokenType = Token["type"];

/**
 * Character code constants for the lexer hot loop
 */
export const CharCodes = {
  TAB: "\t".charCodeAt(0),
  NEWLINE: "\n".charCodeAt(0),
  VERTICAL_TAB: "\v".charCodeAt(0),
  FORM_FEED: "\f".charCodeAt(0),
  CARRIAGE_RETURN: "\r".charCodeAt(0),
  SPACE: " ".charCodeAt(0),
  DOUBLE_QUOTE: '"'.charCodeAt(0),
  SINGLE_QUOTE: "'".charCodeAt(0),
  PLUS: "+".charCodeAt(0),
  MINUS: "-".charCodeAt(0),
  DOT: ".".charCodeAt(0),
  SLASH: "/".charCodeAt(0),
  ASTERISK: "*".charCodeAt(0),
  BACKSLASH: "\\".charCodeAt(0),
  DIGIT_0: "0".charCodeAt(0),
  DIGIT_9: "9".charCodeAt(0),
  LOWER_E: "e".charCodeAt(0),
  UPPER_E: "E".charCodeAt(0),
  LOWER_X: "x".charCodeAt(0),
  UPPER_X: "X".charCodeAt(0),
  LOWER_U: "u".charCodeAt(0),
  NBSP: 0xa0,
  LINE_SEPARATOR: 0x2028,
  PARAGRAPH_SEPARATOR: 0x2029,
  BOM: 0xfeff,
} as const;
