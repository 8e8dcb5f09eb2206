import { describe, expect, it } from "vitest";

import { findNode, type JsonNode, parse, type Span } from "@/index";

function contains(outer: Span, inner: Span): boolean {
  return (
    outer.start.offset <= inner.start.offset &&
    inner.end.offset <= outer.end.offset
  );
}

function* children(node: JsonNode): Generator<[Span | null, JsonNode]> {
  if (node.type === "array") {
    for (const item of node.items) {
      yield [null, item];
    }
  } else if (node.type === "object") {
    for (const member of node.members.values()) {
      yield [member.keySpan, member.value];
    }
  }
}

function expectNested(node: JsonNode, source: string) {
  expect(node.span.end.offset).toBeLessThanOrEqual(source.length);
  for (const [keySpan, child] of children(node)) {
    expect(contains(node.span, child.span)).toBe(true);
    if (keySpan) {
      expect(contains(node.span, keySpan)).toBe(true);
      expect(keySpan.end.offset).toBeLessThanOrEqual(child.span.start.offset);
    }
    expectNested(child, source);
  }
}

function spanOf(root: JsonNode, path: (string | number)[]): Span {
  const node = findNode(root, path);
  if (!node) {
    throw new Error(`no node at ${path.join(".")}`);
  }
  return node.span;
}

describe("parse spans", () => {
  it("nests every child span inside its parent", () => {
    const source = `{"name": "x", 'list': [1, {deep: [true, null]}, -2.5e3], z: {}}`;
    const root = parse(source);
    expect(root.span.start.offset).toBe(0);
    expect(root.span.end.offset).toBe(source.length);
    expectNested(root, source);
  });

  it("spans strings including their quotes", () => {
    const root = parse(`  "abc"  `);
    expect(root.span.start.offset).toBe(2);
    expect(root.span.end.offset).toBe(7);
  });

  it("leaves surrounding comments out of spans", () => {
    const root = parse("/* c */ 1 // x");
    expect(root.span.start.offset).toBe(8);
    expect(root.span.end.offset).toBe(9);
  });

  it("includes the sign in number spans", () => {
    const root = parse("[ -Infinity ]");
    expect(spanOf(root, [0])).toEqual({
      start: { offset: 2, line: 1, column: 3 },
      end: { offset: 11, line: 1, column: 12 },
    });
  });

  it("reports lines and columns in multi-line documents", () => {
    const source = '{\n  "a": [\n    1,\n    2\n  ]\n}';
    const root = parse(source);

    expect(spanOf(root, ["a", 1]).start).toEqual({
      offset: 22,
      line: 4,
      column: 5,
    });
    expect(spanOf(root, ["a"])).toEqual({
      start: { offset: 9, line: 2, column: 8 },
      end: { offset: 27, line: 5, column: 4 },
    });
    expect(root.span.end).toEqual({ offset: 29, line: 6, column: 2 });
  });

  it("counts CRLF as one line break", () => {
    const root = parse("[\r\n1,\r\n2]");
    expect(spanOf(root, [1]).start).toEqual({
      offset: 7,
      line: 3,
      column: 1,
    });
  });

  it("counts line and paragraph separators as line breaks", () => {
    const root = parse("[1,\u2029\u20282]");
    expect(spanOf(root, [1]).start).toEqual({
      offset: 5,
      line: 3,
      column: 1,
    });
  });

  it("measures columns in UTF-16 code units", () => {
    const root = parse('["\u{1F600}", 1]');
    expect(spanOf(root, [0]).end.column).toBe(6);
    expect(spanOf(root, [1]).start).toEqual({
      offset: 7,
      line: 1,
      column: 8,
    });
  });
});
