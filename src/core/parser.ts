/**
 * Recursive-descent JSON5 parser. Pulls tokens from the lexer with one
 * token of lookahead and builds the node tree bottom-up.
 */

import { Json5SyntaxError } from "../errors/types";
import {
  normalizeParseOptions,
  type ParseOptions,
  type ResolvedParseOptions,
} from "../utils/options";
import { Json5Lexer } from "./lexer";
import {
  type ArrayNode,
  arrayNode,
  boolNode,
  floatNode,
  I64_MAX,
  I64_MIN,
  integerNode,
  type JsonNode,
  nullNode,
  type ObjectMember,
  type ObjectNode,
  objectNode,
  stringNode,
} from "./nodes";
import { OrderedMap } from "./ordered-map";
import type { NumberLiteral, Span, Token } from "./types";

const MAX_LEXEME_IN_MESSAGE = 40;

type OpenStructure = {
  kind: "object" | "array";
  span: Span;
};

type Key = {
  value: string;
  span: Span;
};

/**
 * Short human-readable description of a token for error messages
 */
export function describeToken(token: Token): string {
  const lexeme =
    token.lexeme.length > MAX_LEXEME_IN_MESSAGE
      ? `${token.lexeme.slice(0, MAX_LEXEME_IN_MESSAGE)}…`
      : token.lexeme;
  switch (token.type) {
    case "eof":
      return "end of input";
    case "punctuator":
    case "boolean":
    case "null":
      return `'${lexeme}'`;
    default:
      return `${token.type} ${lexeme}`;
  }
}

function joinSpans(start: Span, end: Span): Span {
  return Object.freeze({ start: start.start, end: end.end });
}

/**
 * Convert a numeric literal to an integer or float node. Only the literal's
 * shape decides the kind: decimal literals without fraction or exponent and
 * hex literals become integers while they fit in 64 bits.
 */
export function numberNode(literal: NumberLiteral, span: Span): JsonNode {
  switch (literal.kind) {
    case "infinity":
      return floatNode(literal.sign * Number.POSITIVE_INFINITY, span);
    case "nan":
      return floatNode(Number.NaN, span);
    case "hex": {
      let magnitude = 0n;
      for (const digit of literal.digits) {
        magnitude = magnitude * 16n + BigInt(digit);
      }
      return integerOrFloat(literal.sign, magnitude, span);
    }
    case "decimal": {
      if (literal.fraction === null && literal.exponent === null) {
        return integerOrFloat(literal.sign, BigInt(literal.digits), span);
      }
      const text = `${literal.digits || "0"}.${literal.fraction || "0"}e${literal.exponent ?? "0"}`;
      return floatNode(literal.sign * Number(text), span);
    }
    default: {
      const unreachable: never = literal;
      return unreachable;
    }
  }
}

function integerOrFloat(sign: 1 | -1, magnitude: bigint, span: Span): JsonNode {
  const value = sign < 0 ? -magnitude : magnitude;
  if (value < I64_MIN || value > I64_MAX) {
    return floatNode(Number(value), span);
  }
  return integerNode(value, span);
}

export class Json5Parser {
  private readonly lexer: Json5Lexer;
  private readonly options: ResolvedParseOptions;
  private lookahead: Token | null = null;
  private readonly openStructures: OpenStructure[] = [];

  constructor(source: string, options?: ParseOptions) {
    this.lexer = new Json5Lexer(source);
    this.options = normalizeParseOptions(options);
  }

  /**
   * Parse the whole input as exactly one JSON5 value
   */
  parse(): JsonNode {
    const value = this.parseValue();
    const next = this.peek();
    if (next.type !== "eof") {
      throw new Json5SyntaxError(
        "TrailingContent",
        `Unexpected ${describeToken(next)} after the end of the value`,
        next.span,
        { expected: ["end of input"], found: describeToken(next) }
      );
    }
    return value;
  }

  private peek(): Token {
    this.lookahead ??= this.lexer.next();
    return this.lookahead;
  }

  private consume(): Token {
    const token = this.peek();
    this.lookahead = null;
    return token;
  }

  private isPunctuator(token: Token, value: string): boolean {
    return token.type === "punctuator" && token.value === value;
  }

  /**
   * Raise the error for a token the grammar does not allow here. Running
   * out of input inside an array or object reports the innermost opening
   * bracket instead.
   */
  private unexpected(token: Token, expected: readonly string[]): never {
    const open = this.openStructures.at(-1);
    if (token.type === "eof" && open) {
      const closing = open.kind === "object" ? "'}'" : "']'";
      throw new Json5SyntaxError(
        "UnterminatedStructure",
        `Unterminated ${open.kind}: expected ${closing} before end of input`,
        open.span,
        { expected: [closing], found: describeToken(token) }
      );
    }
    throw new Json5SyntaxError(
      "UnexpectedToken",
      `Unexpected ${describeToken(token)}, expected ${expected.join(" or ")}`,
      token.span,
      { expected, found: describeToken(token) }
    );
  }

  /**
   * Record an opened array or object, refusing to go past the configured
   * nesting depth
   */
  private enter(kind: OpenStructure["kind"], openSpan: Span): void {
    const { maxDepth } = this.options;
    if (this.openStructures.length >= maxDepth) {
      throw new Json5SyntaxError(
        "MaxDepthExceeded",
        `Nesting exceeds the maximum depth of ${maxDepth}`,
        openSpan
      );
    }
    this.openStructures.push({ kind, span: openSpan });
  }

  private parseValue(): JsonNode {
    const token = this.consume();
    switch (token.type) {
      case "punctuator":
        if (token.value === "{") {
          return this.parseObject(token.span);
        }
        if (token.value === "[") {
          return this.parseArray(token.span);
        }
        return this.unexpected(token, ["value"]);
      case "string":
        return stringNode(token.value, token.span);
      case "number":
        return numberNode(token.literal, token.span);
      case "boolean":
        return boolNode(token.value, token.span);
      case "null":
        return nullNode(token.span);
      default:
        return this.unexpected(token, ["value"]);
    }
  }

  private parseObject(openSpan: Span): ObjectNode {
    this.enter("object", openSpan);
    const members = new OrderedMap<ObjectMember>();

    while (true) {
      const token = this.consume();
      if (this.isPunctuator(token, "}")) {
        this.openStructures.pop();
        return objectNode(members.values(), joinSpans(openSpan, token.span));
      }

      const key = this.readKey(token);
      if (members.has(key.value) && this.options.duplicateKeys === "error") {
        throw new Json5SyntaxError(
          "DuplicateKey",
          `Duplicate key ${JSON.stringify(key.value)}`,
          key.span
        );
      }

      const colon = this.consume();
      if (!this.isPunctuator(colon, ":")) {
        this.unexpected(colon, ["':'"]);
      }

      const value = this.parseValue();
      members.set(key.value, { key: key.value, keySpan: key.span, value });

      const separator = this.consume();
      if (this.isPunctuator(separator, "}")) {
        this.openStructures.pop();
        return objectNode(
          members.values(),
          joinSpans(openSpan, separator.span)
        );
      }
      if (!this.isPunctuator(separator, ",")) {
        this.unexpected(separator, ["','", "'}'"]);
      }
    }
  }

  /**
   * Object keys are strings, identifiers, or identifier-shaped literals
   * such as `null`, `true` and `Infinity`
   */
  private readKey(token: Token): Key {
    switch (token.type) {
      case "string":
      case "identifier":
        return { value: token.value, span: token.span };
      case "boolean":
      case "null":
        return { value: token.lexeme, span: token.span };
      case "number":
        if (token.lexeme === "Infinity" || token.lexeme === "NaN") {
          return { value: token.lexeme, span: token.span };
        }
        return this.unexpected(token, ["property name", "'}'"]);
      default:
        return this.unexpected(token, ["property name", "'}'"]);
    }
  }

  private parseArray(openSpan: Span): ArrayNode {
    this.enter("array", openSpan);
    const items: JsonNode[] = [];

    while (true) {
      if (this.isPunctuator(this.peek(), "]")) {
        const close = this.consume();
        this.openStructures.pop();
        return arrayNode(items, joinSpans(openSpan, close.span));
      }

      items.push(this.parseValue());

      const separator = this.consume();
      if (this.isPunctuator(separator, "]")) {
        this.openStructures.pop();
        return arrayNode(items, joinSpans(openSpan, separator.span));
      }
      if (!this.isPunctuator(separator, ",")) {
        this.unexpected(separator, ["','", "']'"]);
      }
    }
  }
}
