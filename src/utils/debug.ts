import type { Span } from "../core/types";
import type { ParseError } from "../errors/types";

export type DebugLevel = "off" | "parse";

const LINE_SPLIT_REGEX = /\r\n|[\n\r\u2028\u2029]/;

function normalizeBooleanString(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return;
}

export function getDebugLevel(): DebugLevel {
  const envVal =
    (typeof process !== "undefined" &&
      process.env &&
      process.env.DEBUG_JSON5) ||
    "off";
  const envLower = String(envVal).toLowerCase();
  if (envLower === "parse") {
    return "parse";
  }
  return normalizeBooleanString(envLower) === true ? "parse" : "off";
}

function color(code: number) {
  return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

// ANSI color codes
const ANSI_GRAY = 90;
const ANSI_YELLOW = 33;
const ANSI_CYAN = 36;
const ANSI_BG_BLUE = 44;

const cGray = color(ANSI_GRAY);
const cYellow = color(ANSI_YELLOW);
const cCyan = color(ANSI_CYAN);
const cBgBlue = color(ANSI_BG_BLUE);

const MAX_SNIPPET_LENGTH = 800;

function truncateSnippet(snippet: string): string {
  if (snippet.length <= MAX_SNIPPET_LENGTH) {
    return snippet;
  }
  return `${snippet.slice(0, MAX_SNIPPET_LENGTH)}\n…[truncated ${snippet.length - MAX_SNIPPET_LENGTH} chars]`;
}

/**
 * The source line a span starts on, with carets under the spanned part.
 * A span running past the end of the line is underlined to the line end.
 */
export function sourceSnippet(source: string, span: Span): string {
  const lines = source.split(LINE_SPLIT_REGEX);
  const lineText = lines[span.start.line - 1] ?? "";
  const startColumn = span.start.column;
  const available = Math.max(lineText.length - startColumn + 1, 0);
  const width = Math.max(
    1,
    Math.min(span.end.offset - span.start.offset, available)
  );
  const gutter = String(span.start.line);
  return [
    `${gutter} | ${lineText}`,
    `${" ".repeat(gutter.length)} | ${" ".repeat(startColumn - 1)}${"^".repeat(width)}`,
  ].join("\n");
}

export function logParseFailure({
  source,
  error,
}: {
  source: string;
  error: ParseError;
}) {
  if (getDebugLevel() !== "parse") {
    return;
  }

  const label = cBgBlue(`[${error.kind}]`);
  console.log(cGray("[debug:json5:fail]"), label, cYellow(error.message));
  console.log(
    cGray("[debug:json5:fail:snippet]"),
    `\n${cCyan(truncateSnippet(sourceSnippet(source, error.span)))}`
  );
}
