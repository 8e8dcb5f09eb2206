/**
 * JSON5 lexer. Walks the source one code unit at a time, keeping offset,
 * line and column in step, and hands out tokens on demand.
 */

import { LexError } from "../errors/types";
import {
  hexDigitValue,
  isDecimalDigit,
  isIdentifierPart,
  isIdentifierStart,
  isLineTerminator,
  isWhitespace,
} from "./chars";
import type {
  NumberLiteral,
  Position,
  Punctuator,
  Span,
  Token,
} from "./types";
import { CharCodes } from "./types";

const SIMPLE_ESCAPES: Record<string, string> = {
  "'": "'",
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

const PUNCTUATORS: ReadonlySet<string> = new Set(["{", "}", "[", "]", ":", ","]);

function isPunctuator(ch: string): ch is Punctuator {
  return PUNCTUATORS.has(ch);
}

export class Json5Lexer implements Iterable<Token> {
  private pos = 0;
  private line = 1;
  private column = 1;
  private readonly source: string;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Read the next token. Once the input is exhausted every call returns an
   * "eof" token positioned at the end of the input.
   */
  next(): Token {
    this.skipTrivia();

    const start = this.position();
    if (this.pos >= this.source.length) {
      return { type: "eof", lexeme: "", span: this.spanFrom(start) };
    }

    const ch = this.source[this.pos];
    const code = this.source.charCodeAt(this.pos);

    if (isPunctuator(ch)) {
      this.advance();
      return {
        type: "punctuator",
        value: ch,
        lexeme: ch,
        span: this.spanFrom(start),
      };
    }

    if (code === CharCodes.DOUBLE_QUOTE || code === CharCodes.SINGLE_QUOTE) {
      return this.readString(start, code);
    }

    if (
      isDecimalDigit(code) ||
      code === CharCodes.DOT ||
      code === CharCodes.PLUS ||
      code === CharCodes.MINUS
    ) {
      return this.readNumber(start);
    }

    if (code === CharCodes.BACKSLASH || isIdentifierStart(this.codePointAt())) {
      return this.readIdentifier(start);
    }

    this.advanceCodePoint();
    throw new LexError(
      "UnexpectedCharacter",
      `Unexpected character ${JSON.stringify(this.source.slice(start.offset, this.pos))}`,
      this.spanFrom(start)
    );
  }

  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const token = this.next();
      yield token;
      if (token.type === "eof") {
        return;
      }
    }
  }

  private position(): Position {
    return Object.freeze({
      offset: this.pos,
      line: this.line,
      column: this.column,
    });
  }

  private spanFrom(start: Position): Span {
    return Object.freeze({ start, end: this.position() });
  }

  private peek(ahead = 0): number {
    return this.source.charCodeAt(this.pos + ahead);
  }

  private codePointAt(): number {
    return this.source.codePointAt(this.pos) ?? 0;
  }

  /**
   * Advance one code unit. A CR directly followed by LF does not start a
   * new line; the LF does.
   */
  private advance(): void {
    const code = this.source.charCodeAt(this.pos);
    this.pos++;
    if (
      isLineTerminator(code) &&
      !(
        code === CharCodes.CARRIAGE_RETURN &&
        this.source.charCodeAt(this.pos) === CharCodes.NEWLINE
      )
    ) {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
  }

  private advanceCodePoint(): void {
    const units = this.codePointAt() > 0xffff ? 2 : 1;
    for (let i = 0; i < units; i++) {
      this.advance();
    }
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  /**
   * Skip whitespace and comments
   */
  private skipTrivia(): void {
    while (!this.atEnd()) {
      const code = this.peek();
      if (isWhitespace(code)) {
        this.advance();
      } else if (code === CharCodes.SLASH && this.peek(1) === CharCodes.SLASH) {
        while (!(this.atEnd() || isLineTerminator(this.peek()))) {
          this.advance();
        }
      } else if (
        code === CharCodes.SLASH &&
        this.peek(1) === CharCodes.ASTERISK
      ) {
        this.skipBlockComment();
      } else {
        return;
      }
    }
  }

  private skipBlockComment(): void {
    const start = this.position();
    this.advance();
    this.advance();
    while (!this.atEnd()) {
      if (
        this.peek() === CharCodes.ASTERISK &&
        this.peek(1) === CharCodes.SLASH
      ) {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }
    throw new LexError(
      "UnterminatedComment",
      "Unterminated block comment",
      this.spanFrom(start)
    );
  }

  private readString(start: Position, quote: number): Token {
    this.advance();
    let value = "";

    while (true) {
      if (this.atEnd()) {
        throw new LexError(
          "UnterminatedString",
          "Unterminated string",
          this.spanFrom(start)
        );
      }

      const code = this.peek();
      if (code === quote) {
        this.advance();
        break;
      }
      if (
        code === CharCodes.NEWLINE ||
        code === CharCodes.CARRIAGE_RETURN
      ) {
        throw new LexError(
          "UnterminatedString",
          "Unterminated string: line break before closing quote",
          this.spanFrom(start)
        );
      }
      if (code === CharCodes.BACKSLASH) {
        value += this.readEscape(start);
      } else {
        value += this.source[this.pos];
        this.advance();
      }
    }

    return {
      type: "string",
      value,
      lexeme: this.source.slice(start.offset, this.pos),
      span: this.spanFrom(start),
    };
  }

  /**
   * Decode one escape sequence inside a string, starting at the backslash
   */
  private readEscape(stringStart: Position): string {
    const escapeStart = this.position();
    this.advance();

    if (this.atEnd()) {
      throw new LexError(
        "UnterminatedString",
        "Unterminated string",
        this.spanFrom(stringStart)
      );
    }

    const code = this.peek();
    const ch = this.source[this.pos];

    if (Object.hasOwn(SIMPLE_ESCAPES, ch)) {
      this.advance();
      return SIMPLE_ESCAPES[ch];
    }

    if (code === CharCodes.DIGIT_0 && !isDecimalDigit(this.peek(1))) {
      this.advance();
      return "\0";
    }

    if (isDecimalDigit(code)) {
      this.advance();
      throw new LexError(
        "InvalidEscape",
        `Invalid escape sequence \\${ch}`,
        this.spanFrom(escapeStart)
      );
    }

    if (code === CharCodes.LOWER_X) {
      this.advance();
      return String.fromCharCode(this.readHexEscapeDigits(2, escapeStart));
    }

    if (code === CharCodes.LOWER_U) {
      this.advance();
      return String.fromCharCode(this.readHexEscapeDigits(4, escapeStart));
    }

    if (isLineTerminator(code)) {
      // line continuation
      this.advance();
      if (
        code === CharCodes.CARRIAGE_RETURN &&
        this.peek() === CharCodes.NEWLINE
      ) {
        this.advance();
      }
      return "";
    }

    const start = this.pos;
    this.advanceCodePoint();
    return this.source.slice(start, this.pos);
  }

  private readHexEscapeDigits(count: number, escapeStart: Position): number {
    let value = 0;
    for (let i = 0; i < count; i++) {
      const digit = this.atEnd() ? -1 : hexDigitValue(this.peek());
      if (digit === -1) {
        throw new LexError(
          "InvalidEscape",
          `Invalid escape sequence: expected ${count} hex digits`,
          this.spanFrom(escapeStart)
        );
      }
      value = value * 16 + digit;
      this.advance();
    }
    return value;
  }

  private readNumber(start: Position): Token {
    let sign: 1 | -1 = 1;
    const first = this.peek();
    if (first === CharCodes.PLUS || first === CharCodes.MINUS) {
      sign = first === CharCodes.MINUS ? -1 : 1;
      this.advance();
    }

    const literal = this.readUnsignedNumber(start, sign);
    this.checkNumberEnd(start);

    return {
      type: "number",
      literal,
      lexeme: this.source.slice(start.offset, this.pos),
      span: this.spanFrom(start),
    };
  }

  private readUnsignedNumber(start: Position, sign: 1 | -1): NumberLiteral {
    if (this.atEnd()) {
      return this.invalidNumber(start);
    }

    const code = this.peek();

    if (isIdentifierStart(this.codePointAt())) {
      const word = this.readWord();
      if (word === "Infinity") {
        return { kind: "infinity", sign };
      }
      if (word === "NaN") {
        return { kind: "nan", sign };
      }
      throw new LexError(
        "InvalidNumber",
        `Invalid number ${JSON.stringify(this.source.slice(start.offset, this.pos))}`,
        this.spanFrom(start)
      );
    }

    if (
      code === CharCodes.DIGIT_0 &&
      (this.peek(1) === CharCodes.LOWER_X || this.peek(1) === CharCodes.UPPER_X)
    ) {
      this.advance();
      this.advance();
      const digits: number[] = [];
      while (!this.atEnd()) {
        const digit = hexDigitValue(this.peek());
        if (digit === -1) {
          break;
        }
        digits.push(digit);
        this.advance();
      }
      if (digits.length === 0) {
        return this.invalidNumber(start);
      }
      return { kind: "hex", sign, digits };
    }

    const digits = this.readDigits();
    if (digits.length > 1 && digits.startsWith("0")) {
      throw new LexError(
        "InvalidNumber",
        "Invalid number: leading zeros are not allowed",
        this.spanFrom(start)
      );
    }

    let fraction: string | null = null;
    if (this.peek() === CharCodes.DOT) {
      this.advance();
      fraction = this.readDigits();
    }

    if (digits.length === 0 && (fraction === null || fraction.length === 0)) {
      return this.invalidNumber(start);
    }

    let exponent: string | null = null;
    if (this.peek() === CharCodes.LOWER_E || this.peek() === CharCodes.UPPER_E) {
      this.advance();
      let exponentSign = "";
      if (this.peek() === CharCodes.PLUS || this.peek() === CharCodes.MINUS) {
        exponentSign = this.source[this.pos];
        this.advance();
      }
      const exponentDigits = this.readDigits();
      if (exponentDigits.length === 0) {
        return this.invalidNumber(start);
      }
      exponent = exponentSign + exponentDigits;
    }

    return { kind: "decimal", sign, digits, fraction, exponent };
  }

  private readDigits(): string {
    const start = this.pos;
    while (!this.atEnd() && isDecimalDigit(this.peek())) {
      this.advance();
    }
    return this.source.slice(start, this.pos);
  }

  /**
   * Read a run of identifier characters (used for Infinity and NaN)
   */
  private readWord(): string {
    const start = this.pos;
    while (!this.atEnd() && isIdentifierPart(this.codePointAt())) {
      this.advanceCodePoint();
    }
    return this.source.slice(start, this.pos);
  }

  /**
   * A number must not run straight into a digit, a dot or an identifier
   */
  private checkNumberEnd(start: Position): void {
    if (this.atEnd()) {
      return;
    }
    const code = this.peek();
    if (
      isDecimalDigit(code) ||
      code === CharCodes.DOT ||
      code === CharCodes.BACKSLASH ||
      isIdentifierPart(this.codePointAt())
    ) {
      this.invalidNumber(start);
    }
  }

  /**
   * Throw InvalidNumber covering the text read so far plus the offending
   * character, if any
   */
  private invalidNumber(start: Position): never {
    if (!this.atEnd()) {
      this.advanceCodePoint();
    }
    throw new LexError(
      "InvalidNumber",
      `Invalid number ${JSON.stringify(this.source.slice(start.offset, this.pos))}`,
      this.spanFrom(start)
    );
  }

  private readIdentifier(start: Position): Token {
    let name = "";
    let first = true;

    while (!this.atEnd()) {
      if (this.peek() === CharCodes.BACKSLASH) {
        name += this.readIdentifierEscape(first);
      } else {
        const codePoint = this.codePointAt();
        const accepted = first
          ? isIdentifierStart(codePoint)
          : isIdentifierPart(codePoint);
        if (!accepted) {
          break;
        }
        name += String.fromCodePoint(codePoint);
        this.advanceCodePoint();
      }
      first = false;
    }

    const lexeme = this.source.slice(start.offset, this.pos);
    const span = this.spanFrom(start);

    switch (lexeme) {
      case "true":
      case "false":
        return { type: "boolean", value: lexeme === "true", lexeme, span };
      case "null":
        return { type: "null", lexeme, span };
      case "Infinity":
        return {
          type: "number",
          literal: { kind: "infinity", sign: 1 },
          lexeme,
          span,
        };
      case "NaN":
        return { type: "number", literal: { kind: "nan", sign: 1 }, lexeme, span };
      default:
        return { type: "identifier", value: name, lexeme, span };
    }
  }

  private readIdentifierEscape(first: boolean): string {
    const escapeStart = this.position();
    this.advance();
    if (this.peek() !== CharCodes.LOWER_U) {
      if (!this.atEnd()) {
        this.advanceCodePoint();
      }
      throw new LexError(
        "InvalidEscape",
        "Invalid identifier escape: expected \\uXXXX",
        this.spanFrom(escapeStart)
      );
    }
    this.advance();
    const codePoint = this.readHexEscapeDigits(4, escapeStart);
    const valid = first
      ? isIdentifierStart(codePoint)
      : isIdentifierPart(codePoint);
    if (!valid) {
      throw new LexError(
        "InvalidEscape",
        `Invalid identifier escape: U+${codePoint.toString(16).toUpperCase().padStart(4, "0")} is not an identifier character`,
        this.spanFrom(escapeStart)
      );
    }
    return String.fromCharCode(codePoint);
  }
}
