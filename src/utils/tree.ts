/**
 * Helpers for consumers of a parsed tree: path lookup and conversion to
 * and from plain JavaScript values
 */

import {
  arrayNode,
  boolNode,
  EMPTY_SPAN,
  floatNode,
  integerNode,
  type JsonNode,
  nullNode,
  type ObjectMember,
  objectNode,
  stringNode,
} from "../core/nodes";

export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type NodePath = readonly (string | number)[];

export type ToValueOptions = {
  /**
   * How integer nodes are returned. "number" loses precision outside the
   * safe integer range.
   * @default "number"
   */
  integers?: "number" | "bigint";
};

/**
 * Follow object keys and array indexes from `root`. Returns undefined when
 * a step does not exist or does not match the node type.
 */
export function findNode(
  root: JsonNode,
  path: NodePath
): JsonNode | undefined {
  let current: JsonNode = root;
  for (const step of path) {
    if (typeof step === "number") {
      if (current.type !== "array") {
        return;
      }
      const item: JsonNode | undefined = current.items[step];
      if (item === undefined) {
        return;
      }
      current = item;
    } else {
      if (current.type !== "object") {
        return;
      }
      const member = current.members.get(step);
      if (!member) {
        return;
      }
      current = member.value;
    }
  }
  return current;
}

/**
 * Convert a node tree to plain JavaScript values. Object properties are
 * defined in source order, although JavaScript itself lists integer-like
 * keys first.
 */
export function toValue(node: JsonNode, options: ToValueOptions = {}): JsonValue {
  const integers = options.integers ?? "number";
  switch (node.type) {
    case "null":
      return null;
    case "bool":
    case "string":
    case "float":
      return node.value;
    case "integer":
      return integers === "bigint" ? node.value : Number(node.value);
    case "array":
      return node.items.map((item) => toValue(item, options));
    case "object": {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, member] of node.members) {
        // defineProperty keeps "__proto__" an own data property
        Object.defineProperty(out, key, {
          value: toValue(member.value, options),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Build a node tree from plain JavaScript values. Safe integers and bigints
 * become integer nodes, other numbers float nodes. Nodes carry an empty
 * span at the start of the text.
 */
export function fromValue(value: unknown): JsonNode {
  return convertValue(value, new Set<object>());
}

function convertValue(value: unknown, ancestors: Set<object>): JsonNode {
  if (value === null) {
    return nullNode();
  }
  switch (typeof value) {
    case "boolean":
      return boolNode(value);
    case "string":
      return stringNode(value);
    case "bigint":
      return integerNode(value);
    case "number":
      return Number.isSafeInteger(value) && !Object.is(value, -0)
        ? integerNode(BigInt(value))
        : floatNode(value);
    case "object":
      return convertComposite(value, ancestors);
    default:
      throw new TypeError(`Cannot convert a value of type ${typeof value} to a JSON5 node`);
  }
}

function convertComposite(value: object, ancestors: Set<object>): JsonNode {
  if (ancestors.has(value)) {
    throw new TypeError("Cannot convert a circular structure to a JSON5 node");
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return arrayNode(items.map((item) => convertValue(item, ancestors)));
    }
    if (!isPlainObject(value)) {
      throw new TypeError(
        `Cannot convert an instance of ${value.constructor.name} to a JSON5 node`
      );
    }
    const members: ObjectMember[] = Object.entries(value).map(
      ([key, child]) => ({
        key,
        keySpan: EMPTY_SPAN,
        value: convertValue(child, ancestors),
      })
    );
    return objectNode(members);
  } finally {
    ancestors.delete(value);
  }
}
