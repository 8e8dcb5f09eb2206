import { Json5Parser } from "./core/parser";
import type { JsonNode } from "./core/nodes";
import { ParseError } from "./errors/types";
import { logParseFailure } from "./utils/debug";
import type { ParseOptions } from "./utils/options";

export type SafeParseResult =
  | { success: true; node: JsonNode }
  | { success: false; error: ParseError };

/**
 * Parse JSON5 text into a node tree. Arrays and objects may nest up to
 * `options.maxDepth` levels (1000 by default).
 *
 * Error kinds:
 * - LexError: UnterminatedString, InvalidEscape, InvalidNumber,
 *   UnexpectedCharacter, UnterminatedComment (a block comment left open)
 * - Json5SyntaxError: UnexpectedToken, UnterminatedStructure,
 *   TrailingContent, DuplicateKey, MaxDepthExceeded
 *
 * @throws {ParseError} LexError or Json5SyntaxError for malformed input
 * @throws {TypeError} for invalid options
 *
 * @example
 * ```typescript
 * const root = parse("{port: -1}");
 * const port = findNode(root, ["port"]);
 * // port.span.start -> { offset: 7, line: 1, column: 8 }
 * ```
 */
export function parse(source: string, options?: ParseOptions): JsonNode {
  try {
    return new Json5Parser(source, options).parse();
  } catch (error) {
    if (error instanceof ParseError) {
      logParseFailure({ source, error });
    }
    throw error;
  }
}

/**
 * Like {@link parse}, but returns parse errors instead of throwing them
 */
export function safeParse(
  source: string,
  options?: ParseOptions
): SafeParseResult {
  try {
    return { success: true, node: parse(source, options) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

// Builders
export { formatFloat, quoteString, stringify } from "./builders/stringify";
// Core
export { Json5Lexer } from "./core/lexer";
export {
  arrayNode,
  boolNode,
  EMPTY_SPAN,
  floatNode,
  I64_MAX,
  I64_MIN,
  integerNode,
  isJsonNode,
  nodeEquals,
  nullNode,
  objectNode,
  stringNode,
} from "./core/nodes";
export { OrderedMap } from "./core/ordered-map";
export { Json5Parser } from "./core/parser";
// Types
export type {
  ArrayNode,
  BoolNode,
  FloatNode,
  IntegerNode,
  JsonNode,
  JsonNodeType,
  NullNode,
  ObjectMember,
  ObjectNode,
  StringNode,
} from "./core/nodes";
export type { ReadonlyOrderedMap } from "./core/ordered-map";
export type {
  NumberLiteral,
  Position,
  Span,
  Token,
  TokenType,
} from "./core/types";
export type {
  LexErrorKind,
  ParseErrorKind,
  SyntaxErrorKind,
} from "./errors/types";
export type { ParseOptions, StringifyOptions } from "./utils/options";
export type { JsonValue, NodePath, ToValueOptions } from "./utils/tree";
// Errors
export {
  Json5SyntaxError,
  LexError,
  ParseError,
  StringifyOptionsError,
} from "./errors/types";
// Utils
export { MAX_NESTING_DEPTH } from "./utils/options";
export { sourceSnippet } from "./utils/debug";
export { findNode, fromValue, toValue } from "./utils/tree";
