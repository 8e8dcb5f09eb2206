import { z } from "zod";

import { StringifyOptionsError } from "../errors/types";

const MAX_INDENT = 10;

/**
 * Deepest nesting of arrays and objects `parse` accepts. The parser
 * recurses once per level, so the limit keeps it well inside the call
 * stack.
 */
export const MAX_NESTING_DEPTH = 1000;
const INDENT_REGEX = /^[ \t]*$/;

export const parseOptionsSchema = z
  .object({
    /**
     * What to do when an object literal repeats a key.
     * - "error": fail with a DuplicateKey error at the repeated key
     * - "last-wins": keep the later value at the earlier key's position
     */
    duplicateKeys: z.enum(["error", "last-wins"]).default("error"),
    /**
     * Maximum nesting of arrays and objects; deeper input fails with a
     * MaxDepthExceeded error at the first bracket past the limit
     */
    maxDepth: z
      .number()
      .int()
      .min(1)
      .max(MAX_NESTING_DEPTH)
      .default(MAX_NESTING_DEPTH),
  })
  .strict();

export const stringifyOptionsSchema = z
  .object({
    /** Pretty-print with this indent; null, 0 or "" produce compact output */
    indent: z
      .union([
        z.string().regex(INDENT_REGEX, "indent may only contain spaces and tabs"),
        z.number().int().nonnegative(),
        z.null(),
      ])
      .default(null),
    quoteStyle: z.enum(["double", "single"]).default("double"),
    /** Trailing comma after the last element of multi-line arrays and objects */
    trailingCommas: z.boolean().default(false),
    /** When false, keys that are valid identifiers are written without quotes */
    quoteKeys: z.boolean().default(true),
    /** Emit strict JSON; overrides quoteStyle, quoteKeys and trailingCommas */
    json: z.boolean().default(false),
  })
  .strict();

export type ParseOptions = z.input<typeof parseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof parseOptionsSchema>;
export type StringifyOptions = z.input<typeof stringifyOptionsSchema>;

export type ResolvedStringifyOptions = {
  /** Indent unit; empty for compact output */
  indent: string;
  quote: '"' | "'";
  trailingCommas: boolean;
  quoteKeys: boolean;
  json: boolean;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    .join("; ");
}

export function normalizeParseOptions(
  options?: ParseOptions
): ResolvedParseOptions {
  const result = parseOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new TypeError(`Invalid parse options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function normalizeStringifyOptions(
  options?: StringifyOptions
): ResolvedStringifyOptions {
  const result = stringifyOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw new StringifyOptionsError(
      `Invalid stringify options: ${formatIssues(result.error)}`,
      result.error
    );
  }

  const { indent, quoteStyle, trailingCommas, quoteKeys, json } = result.data;
  let indentUnit = "";
  if (typeof indent === "number") {
    indentUnit = " ".repeat(Math.min(indent, MAX_INDENT));
  } else if (typeof indent === "string") {
    indentUnit = indent.slice(0, MAX_INDENT);
  }

  if (json) {
    return {
      indent: indentUnit,
      quote: '"',
      trailingCommas: false,
      quoteKeys: true,
      json,
    };
  }

  return {
    indent: indentUnit,
    quote: quoteStyle === "single" ? "'" : '"',
    trailingCommas,
    quoteKeys,
    json,
  };
}
