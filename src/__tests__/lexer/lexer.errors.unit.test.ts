import { describe, expect, it } from "vitest";

import { Json5Lexer, LexError, type LexErrorKind } from "@/index";

function lexError(source: string): LexError {
  try {
    [...new Json5Lexer(source)];
  } catch (error) {
    if (error instanceof LexError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail`);
}

function expectLexError(
  source: string,
  kind: LexErrorKind,
  startOffset: number,
  endOffset: number
) {
  const error = lexError(source);
  expect(error.kind).toBe(kind);
  expect(error.span.start.offset).toBe(startOffset);
  expect(error.span.end.offset).toBe(endOffset);
  return error;
}

describe("Json5Lexer errors", () => {
  describe("UnterminatedString", () => {
    it("spans from the opening quote to the end of input", () => {
      const error = expectLexError('"abc', "UnterminatedString", 0, 4);
      expect(error.message).toBe("Unterminated string at line 1, column 1");
    });

    it("stops at a raw line break", () => {
      expectLexError('"ab\ncd"', "UnterminatedString", 0, 3);
      expectLexError("'ab\rcd'", "UnterminatedString", 0, 3);
    });

    it("reports a backslash at the very end", () => {
      expectLexError('"ab\\', "UnterminatedString", 0, 4);
    });
  });

  describe("InvalidEscape", () => {
    it("rejects digit escapes other than \\0", () => {
      expectLexError('"\\1"', "InvalidEscape", 1, 3);
      expectLexError('"\\01"', "InvalidEscape", 1, 3);
    });

    it("rejects short hex and unicode escapes", () => {
      expectLexError('"\\x4"', "InvalidEscape", 1, 4);
      expectLexError('"\\u12G4"', "InvalidEscape", 1, 5);
    });

    it("rejects identifier escapes that are not \\u", () => {
      expectLexError("a\\x", "InvalidEscape", 1, 3);
    });

    it("rejects identifier escapes naming a non-identifier character", () => {
      const error = expectLexError(
        "\\u0031abc",
        "InvalidEscape",
        0,
        6
      );
      expect(error.reason).toBe(
        "Invalid identifier escape: U+0031 is not an identifier character"
      );
    });
  });

  describe("InvalidNumber", () => {
    it("rejects leading zeros", () => {
      const error = expectLexError("01", "InvalidNumber", 0, 2);
      expect(error.reason).toBe("Invalid number: leading zeros are not allowed");
    });

    it("includes the offending character in the span", () => {
      const error = expectLexError("1a", "InvalidNumber", 0, 2);
      expect(error.reason).toBe('Invalid number "1a"');
      expectLexError("1.2.3", "InvalidNumber", 0, 4);
    });

    it("rejects incomplete literals", () => {
      expectLexError("0x", "InvalidNumber", 0, 2);
      expectLexError("1e", "InvalidNumber", 0, 2);
      expectLexError("1e+", "InvalidNumber", 0, 3);
      expectLexError("+", "InvalidNumber", 0, 1);
      expectLexError("-.", "InvalidNumber", 0, 2);
    });

    it("rejects signed words other than Infinity and NaN", () => {
      const error = expectLexError("-Infinit", "InvalidNumber", 0, 8);
      expect(error.reason).toBe('Invalid number "-Infinit"');
    });
  });

  describe("UnexpectedCharacter", () => {
    it("reports the character and its position", () => {
      const error = expectLexError("[1, @]", "UnexpectedCharacter", 4, 5);
      expect(error.message).toBe(
        'Unexpected character "@" at line 1, column 5'
      );
    });

    it("covers a whole astral code point", () => {
      const error = expectLexError("\u{1F600}", "UnexpectedCharacter", 0, 2);
      expect(error.span.end.column).toBe(3);
    });

    it("rejects a lone slash", () => {
      expectLexError("/", "UnexpectedCharacter", 0, 1);
    });
  });

  describe("UnterminatedComment", () => {
    it("spans from the comment opener to the end of input", () => {
      const error = expectLexError("1 /* abc", "UnterminatedComment", 2, 8);
      expect(error.column).toBe(3);
    });
  });

  it("is an instance of LexError with its name set", () => {
    const error = lexError("@");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("LexError");
    expect(error.line).toBe(1);
  });
});
