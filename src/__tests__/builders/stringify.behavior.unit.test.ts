import { describe, expect, it } from "vitest";

import {
  arrayNode,
  floatNode,
  formatFloat,
  I64_MIN,
  integerNode,
  type JsonNode,
  nullNode,
  parse,
  quoteString,
  StringifyOptionsError,
  stringify,
  stringNode,
} from "@/index";

describe("stringify", () => {
  describe("compact output", () => {
    it("writes objects and arrays on one line", () => {
      const node = parse(`{a: 1, b: [true, null, 'x'], c: {}}`);
      expect(stringify(node)).toBe('{"a":1,"b":[true,null,"x"],"c":{}}');
    });

    it("keeps member order", () => {
      expect(stringify(parse('{z: 1, "10": 2, a: 3}'))).toBe(
        '{"z":1,"10":2,"a":3}'
      );
    });

    it("writes 64-bit integers exactly", () => {
      expect(stringify(integerNode(I64_MIN))).toBe("-9223372036854775808");
    });

    it("ignores trailingCommas without an indent", () => {
      expect(stringify(parse("[1, 2]"), { trailingCommas: true })).toBe(
        "[1,2]"
      );
    });

    it("writes trees nested deeper than the parser accepts", () => {
      let node: JsonNode = nullNode();
      for (let depth = 0; depth < 100000; depth++) {
        node = arrayNode([node]);
      }
      expect(stringify(node)).toBe(
        `${"[".repeat(100000)}null${"]".repeat(100000)}`
      );
    });
  });

  describe("pretty output", () => {
    it("indents nested containers", () => {
      const node = parse("{a: [1, 2], b: {}}");
      expect(stringify(node, { indent: 2 })).toBe(
        ["{", '  "a": [', "    1,", "    2", "  ],", '  "b": {}', "}"].join(
          "\n"
        )
      );
    });

    it("adds trailing commas when asked", () => {
      const node = parse("{a: [1], b: 2}");
      expect(stringify(node, { indent: 2, trailingCommas: true })).toBe(
        ["{", '  "a": [', "    1,", "  ],", '  "b": 2,', "}"].join("\n")
      );
    });

    it("accepts a string indent", () => {
      expect(stringify(parse("[1]"), { indent: "\t" })).toBe("[\n\t1\n]");
    });

    it("caps the indent at ten spaces", () => {
      expect(stringify(parse("[1]"), { indent: 20 })).toBe(
        `[\n${" ".repeat(10)}1\n]`
      );
    });

    it("treats a zero indent as compact", () => {
      expect(stringify(parse("{a: [1]}"), { indent: 0 })).toBe('{"a":[1]}');
    });
  });

  describe("keys and quotes", () => {
    it("leaves identifier keys bare when quoteKeys is false", () => {
      const node = parse(`{a: 1, "b-c": 2, "$x": 3, "1a": 4, "": 5}`);
      expect(stringify(node, { quoteKeys: false })).toBe(
        '{a:1,"b-c":2,$x:3,"1a":4,"":5}'
      );
    });

    it("switches to single quotes", () => {
      const node = parse(`{"it's": "say \\"hi\\""}`);
      expect(stringify(node, { quoteStyle: "single" })).toBe(
        `{'it\\'s':'say "hi"'}`
      );
    });
  });

  describe("strict JSON mode", () => {
    it("overrides JSON5-only options", () => {
      const node = parse(`{a: 'x', b: [NaN, -Infinity], c: 1.5}`);
      expect(
        stringify(node, {
          json: true,
          quoteStyle: "single",
          quoteKeys: false,
          trailingCommas: true,
        })
      ).toBe('{"a":"x","b":[null,null],"c":1.5}');
    });

    it("still pretty-prints", () => {
      expect(stringify(parse("[1]"), { json: true, indent: 1 })).toBe(
        "[\n 1\n]"
      );
    });
  });

  describe("formatFloat", () => {
    it("marks whole floats with a fraction", () => {
      expect(formatFloat(1)).toBe("1.0");
      expect(formatFloat(-3)).toBe("-3.0");
      expect(formatFloat(1.5)).toBe("1.5");
      expect(formatFloat(-0)).toBe("-0.0");
    });

    it("keeps exponent notation", () => {
      expect(formatFloat(1e21)).toBe("1e+21");
      expect(formatFloat(1e-7)).toBe("1e-7");
    });

    it("writes non-finite values as JSON5 literals or null", () => {
      expect(formatFloat(Number.NaN)).toBe("NaN");
      expect(formatFloat(Number.POSITIVE_INFINITY)).toBe("Infinity");
      expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("-Infinity");
      expect(formatFloat(Number.NaN, true)).toBe("null");
      expect(formatFloat(Number.NEGATIVE_INFINITY, true)).toBe("null");
    });

    it("is used for float nodes", () => {
      expect(stringify(parse("1e2"))).toBe("100.0");
      expect(stringify(arrayNode([floatNode(0.1), integerNode(100n)]))).toBe(
        "[0.1,100]"
      );
    });
  });

  describe("quoteString", () => {
    it("escapes control characters and separators", () => {
      expect(quoteString('a\nb\t"c\\\u0001\u007f\u2028', '"')).toBe(
        String.raw`"a\nb\t\"c\\\u0001\u007f\u2028"`
      );
    });

    it("escapes only the active quote", () => {
      expect(quoteString(`'"`, "'")).toBe(`'\\'"'`);
      expect(quoteString(`'"`, '"')).toBe(`"'\\""`);
    });

    it("keeps surrogate pairs and escapes lone surrogates", () => {
      expect(quoteString("\u{1F600}", '"')).toBe('"\u{1F600}"');
      expect(stringify(stringNode("x\uD800y"))).toBe(String.raw`"x\ud800y"`);
      expect(stringify(stringNode("\uDC00"))).toBe(String.raw`"\udc00"`);
    });
  });

  describe("options", () => {
    it("rejects invalid options with StringifyOptionsError", () => {
      expect(() => stringify(parse("1"), { indent: -1 })).toThrow(
        StringifyOptionsError
      );
      expect(() => stringify(parse("1"), { indent: "--" })).toThrow(
        /^Invalid stringify options: indent: /
      );
    });
  });
});
