/**
 * Character classification for the JSON5 lexer
 */

import { CharCodes } from "./types";

const SPACE_SEPARATOR_REGEX = /\p{Zs}/u;
const IDENTIFIER_START_REGEX = /[\p{L}\p{Nl}$_]/u;
const IDENTIFIER_PART_REGEX = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}$\u200C\u200D]/u;

export function isLineTerminator(code: number): boolean {
  return (
    code === CharCodes.NEWLINE ||
    code === CharCodes.CARRIAGE_RETURN ||
    code === CharCodes.LINE_SEPARATOR ||
    code === CharCodes.PARAGRAPH_SEPARATOR
  );
}

/**
 * JSON5 WhiteSpace and LineTerminator productions
 */
export function isWhitespace(code: number): boolean {
  switch (code) {
    case CharCodes.TAB:
    case CharCodes.NEWLINE:
    case CharCodes.VERTICAL_TAB:
    case CharCodes.FORM_FEED:
    case CharCodes.CARRIAGE_RETURN:
    case CharCodes.SPACE:
    case CharCodes.NBSP:
    case CharCodes.LINE_SEPARATOR:
    case CharCodes.PARAGRAPH_SEPARATOR:
    case CharCodes.BOM:
      return true;
    default:
      return code > 0x7f && SPACE_SEPARATOR_REGEX.test(String.fromCharCode(code));
  }
}

export function isDecimalDigit(code: number): boolean {
  return code >= CharCodes.DIGIT_0 && code <= CharCodes.DIGIT_9;
}

/**
 * Value of a hex digit, or -1 for anything else. The lexer accepts a hex
 * digit exactly when this returns a value, and stores that value, so the
 * parser never re-reads digit characters.
 */
export function hexDigitValue(code: number): number {
  if (code >= CharCodes.DIGIT_0 && code <= CharCodes.DIGIT_9) {
    return code - CharCodes.DIGIT_0;
  }
  // fold A-F onto a-f
  const lower = code | 0x20;
  if (lower >= 0x61 && lower <= 0x66) {
    return lower - 0x61 + 10;
  }
  return -1;
}

export function isIdentifierStart(codePoint: number): boolean {
  return IDENTIFIER_START_REGEX.test(String.fromCodePoint(codePoint));
}

export function isIdentifierPart(codePoint: number): boolean {
  return IDENTIFIER_PART_REGEX.test(String.fromCodePoint(codePoint));
}

/**
 * Check if a key can be written without quotes
 */
export function isIdentifierName(text: string): boolean {
  if (text.length === 0) {
    return false;
  }
  let first = true;
  for (const ch of text) {
    const codePoint = ch.codePointAt(0) ?? 0;
    if (first ? !isIdentifierStart(codePoint) : !isIdentifierPart(codePoint)) {
      return false;
    }
    first = false;
  }
  return true;
}
