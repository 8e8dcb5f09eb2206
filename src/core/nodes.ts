/**
 * Value tree produced by the parser. Every node records the span of source
 * text it was read from.
 */

import { OrderedMap, type ReadonlyOrderedMap } from "./ordered-map";
import type { Span } from "./types";

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

/**
 * Span given to nodes that were not read from source text
 */
export const EMPTY_SPAN: Span = Object.freeze({
  start: Object.freeze({ offset: 0, line: 1, column: 1 }),
  end: Object.freeze({ offset: 0, line: 1, column: 1 }),
});

type NodeBase = {
  readonly span: Span;
};

export type NullNode = NodeBase & {
  readonly type: "null";
};

export type BoolNode = NodeBase & {
  readonly type: "bool";
  readonly value: boolean;
};

export type IntegerNode = NodeBase & {
  readonly type: "integer";
  readonly value: bigint;
};

export type FloatNode = NodeBase & {
  readonly type: "float";
  readonly value: number;
};

export type StringNode = NodeBase & {
  readonly type: "string";
  readonly value: string;
};

export type ArrayNode = NodeBase & {
  readonly type: "array";
  readonly items: readonly JsonNode[];
};

export type ObjectMember = {
  readonly key: string;
  readonly keySpan: Span;
  readonly value: JsonNode;
};

export type ObjectNode = NodeBase & {
  readonly type: "object";
  readonly members: ReadonlyOrderedMap<ObjectMember>;
};

export type JsonNode =
  | NullNode
  | BoolNode
  | IntegerNode
  | FloatNode
  | StringNode
  | ArrayNode
  | ObjectNode;

export type JsonNodeType = JsonNode["type"];

const NODE_TYPES: ReadonlySet<string> = new Set<JsonNodeType>([
  "null",
  "bool",
  "integer",
  "float",
  "string",
  "array",
  "object",
]);

export function nullNode(span: Span = EMPTY_SPAN): NullNode {
  return Object.freeze({ type: "null", span });
}

export function boolNode(value: boolean, span: Span = EMPTY_SPAN): BoolNode {
  return Object.freeze({ type: "bool", value, span });
}

export function integerNode(
  value: bigint,
  span: Span = EMPTY_SPAN
): IntegerNode {
  if (value < I64_MIN || value > I64_MAX) {
    throw new RangeError(`Integer ${value} is outside the 64-bit signed range`);
  }
  return Object.freeze({ type: "integer", value, span });
}

export function floatNode(value: number, span: Span = EMPTY_SPAN): FloatNode {
  return Object.freeze({ type: "float", value, span });
}

export function stringNode(value: string, span: Span = EMPTY_SPAN): StringNode {
  return Object.freeze({ type: "string", value, span });
}

export function arrayNode(
  items: readonly JsonNode[],
  span: Span = EMPTY_SPAN
): ArrayNode {
  return Object.freeze({
    type: "array",
    items: Object.freeze(items.slice()),
    span,
  });
}

/**
 * Build an object node. Members with a repeated key replace the earlier
 * value and keep the earlier position.
 */
export function objectNode(
  members: Iterable<ObjectMember>,
  span: Span = EMPTY_SPAN
): ObjectNode {
  const map = new OrderedMap<ObjectMember>();
  for (const member of members) {
    map.set(member.key, Object.freeze({ ...member }));
  }
  return Object.freeze({ type: "object", members: map, span });
}

export function isJsonNode(value: unknown): value is JsonNode {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    NODE_TYPES.has(value.type) &&
    "span" in value
  );
}

/**
 * Compare two trees by value, ignoring spans. Integers and floats never
 * compare equal to each other; floats compare with Object.is. Walks both
 * trees with an explicit stack, so any depth the parser or the node
 * constructors produce can be compared.
 */
export function nodeEquals(a: JsonNode, b: JsonNode): boolean {
  const pending: [JsonNode, JsonNode][] = [[a, b]];
  for (let pair = pending.pop(); pair; pair = pending.pop()) {
    const [left, right] = pair;
    if (!shallowEquals(left, right, pending)) {
      return false;
    }
  }
  return true;
}

/**
 * Compare one pair of nodes. Children of containers are queued on
 * `pending` rather than compared here.
 */
function shallowEquals(
  a: JsonNode,
  b: JsonNode,
  pending: [JsonNode, JsonNode][]
): boolean {
  switch (a.type) {
    case "null":
      return b.type === "null";
    case "bool":
      return b.type === "bool" && b.value === a.value;
    case "string":
      return b.type === "string" && b.value === a.value;
    case "integer":
      return b.type === "integer" && b.value === a.value;
    case "float":
      return b.type === "float" && Object.is(a.value, b.value);
    case "array":
      if (b.type !== "array" || a.items.length !== b.items.length) {
        return false;
      }
      a.items.forEach((item, i) => {
        pending.push([item, b.items[i]]);
      });
      return true;
    case "object":
      return b.type === "object" && queueMembers(a, b, pending);
    default: {
      const unreachable: never = a;
      return unreachable;
    }
  }
}

function queueMembers(
  a: ObjectNode,
  b: ObjectNode,
  pending: [JsonNode, JsonNode][]
): boolean {
  if (a.members.size !== b.members.size) {
    return false;
  }
  const right = b.members.entries();
  for (const [key, member] of a.members) {
    const next = right.next();
    if (next.done) {
      return false;
    }
    const [otherKey, otherMember] = next.value;
    if (key !== otherKey) {
      return false;
    }
    pending.push([member.value, otherMember.value]);
  }
  return true;
}
