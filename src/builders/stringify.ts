/**
 * Render a node tree as JSON5 or strict JSON text
 */

import { isIdentifierName } from "../core/chars";
import type { ArrayNode, JsonNode, ObjectNode } from "../core/nodes";
import {
  normalizeStringifyOptions,
  type ResolvedStringifyOptions,
  type StringifyOptions,
} from "../utils/options";

const FLOAT_MARKER_REGEX = /[.eE]/;

const CHARACTER_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\u2028": "\\u2028",
  "\u2029": "\\u2029",
};

type ContainerNode = ArrayNode | ObjectNode;

/**
 * A container whose entries are still being rendered. `prefix` is what
 * goes before the container's text in its parent: a key and separator, or
 * nothing for array items.
 */
type Frame = {
  node: ContainerNode;
  prefix: string;
  indent: string;
  innerIndent: string;
  entries: string[];
  children: Iterator<[string, JsonNode]>;
};

/**
 * Stringify a node tree. Never fails for a well-formed tree; only invalid
 * options throw. Containers are walked with an explicit stack, so nesting
 * depth is bounded by memory, not by the call stack.
 */
export function stringify(
  node: JsonNode,
  options: StringifyOptions = {}
): string {
  const resolved = normalizeStringifyOptions(options);
  if (!isContainer(node)) {
    return stringifyScalar(node, resolved);
  }

  const stack: Frame[] = [openFrame(node, "", "", resolved)];
  while (true) {
    const frame = stack[stack.length - 1];
    const next = frame.children.next();
    if (next.done) {
      stack.pop();
      const text = frame.prefix + closeFrame(frame, resolved);
      const parent = stack.at(-1);
      if (!parent) {
        return text;
      }
      parent.entries.push(text);
      continue;
    }

    const [prefix, child] = next.value;
    if (isContainer(child)) {
      stack.push(openFrame(child, prefix, frame.innerIndent, resolved));
    } else {
      frame.entries.push(prefix + stringifyScalar(child, resolved));
    }
  }
}

function isContainer(node: JsonNode): node is ContainerNode {
  return node.type === "array" || node.type === "object";
}

function stringifyScalar(
  node: Exclude<JsonNode, ContainerNode>,
  options: ResolvedStringifyOptions
): string {
  switch (node.type) {
    case "null":
      return "null";
    case "bool":
      return node.value ? "true" : "false";
    case "integer":
      return node.value.toString();
    case "float":
      return formatFloat(node.value, options.json);
    case "string":
      return quoteString(node.value, options.quote);
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

function openFrame(
  node: ContainerNode,
  prefix: string,
  indent: string,
  options: ResolvedStringifyOptions
): Frame {
  return {
    node,
    prefix,
    indent,
    innerIndent: indent + options.indent,
    entries: [],
    children: childEntries(node, options),
  };
}

function* childEntries(
  node: ContainerNode,
  options: ResolvedStringifyOptions
): Generator<[string, JsonNode]> {
  if (node.type === "array") {
    for (const item of node.items) {
      yield ["", item];
    }
    return;
  }
  const separator = options.indent === "" ? ":" : ": ";
  for (const [key, member] of node.members) {
    yield [formatKey(key, options) + separator, member.value];
  }
}

function closeFrame(frame: Frame, options: ResolvedStringifyOptions): string {
  const [open, close] = frame.node.type === "array" ? ["[", "]"] : ["{", "}"];
  return wrapEntries(
    open,
    close,
    frame.entries,
    options,
    frame.indent,
    frame.innerIndent
  );
}

/**
 * Floats always carry a "." or an exponent so they read back as floats.
 * Strict JSON has no NaN or Infinity; those become null.
 */
export function formatFloat(value: number, json = false): string {
  if (Number.isNaN(value)) {
    return json ? "null" : "NaN";
  }
  if (!Number.isFinite(value)) {
    if (json) {
      return "null";
    }
    return value > 0 ? "Infinity" : "-Infinity";
  }
  if (Object.is(value, -0)) {
    return "-0.0";
  }
  const text = String(value);
  return FLOAT_MARKER_REGEX.test(text) ? text : `${text}.0`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function unicodeEscape(code: number): string {
  return `\\u${code.toString(16).padStart(4, "0")}`;
}

/**
 * Quote a string, escaping the backslash, the quote character, control
 * characters, line/paragraph separators and unpaired surrogates
 */
export function quoteString(value: string, quote: '"' | "'"): string {
  let out = quote;
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    const code = value.charCodeAt(i);

    if (ch === quote) {
      out += `\\${quote}`;
    } else if (Object.hasOwn(CHARACTER_ESCAPES, ch)) {
      out += CHARACTER_ESCAPES[ch];
    } else if (code < 0x20 || code === 0x7f) {
      out += unicodeEscape(code);
    } else if (isHighSurrogate(code)) {
      if (isLowSurrogate(value.charCodeAt(i + 1))) {
        out += value.slice(i, i + 2);
        i++;
      } else {
        out += unicodeEscape(code);
      }
    } else if (isLowSurrogate(code)) {
      out += unicodeEscape(code);
    } else {
      out += ch;
    }
  }
  return out + quote;
}

function formatKey(key: string, options: ResolvedStringifyOptions): string {
  if (!options.quoteKeys && isIdentifierName(key)) {
    return key;
  }
  return quoteString(key, options.quote);
}

/**
 * Lay out already-rendered entries either on one line or one per line
 */
function wrapEntries(
  open: string,
  close: string,
  entries: string[],
  options: ResolvedStringifyOptions,
  indent: string,
  innerIndent: string
): string {
  if (entries.length === 0) {
    return open + close;
  }
  if (options.indent === "") {
    return open + entries.join(",") + close;
  }
  const trailing = options.trailingCommas ? "," : "";
  const body = entries.map((entry) => innerIndent + entry).join(",\n");
  return `${open}\n${body}${trailing}\n${indent}${close}`;
}
