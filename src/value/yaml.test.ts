import { describe, it, expect } from "vitest";
import { DeserializationError, UnrepresentableNumberError } from "../errors";
import { fromYaml, parseYaml, stringifyYaml } from "./yaml";
import {
  NULL,
  arrayValue,
  booleanValue,
  floatValue,
  integerValue,
  mapValue,
  stringValue,
  valueEquals,
} from "./value";

describe("parseYaml", () => {
  it("decodes scalars, sequences and mappings", () => {
    const value = parseYaml(
      [
        "title: Hello",
        "draft: true",
        "count: 42",
        "ratio: 0.25",
        "missing: ~",
        "tags:",
        "  - a",
        "  - b",
        "author:",
        "  name: Sam",
      ].join("\n"),
    );

    const expected = mapValue([
      ["title", stringValue("Hello")],
      ["draft", booleanValue(true)],
      ["count", integerValue(42)],
      ["ratio", floatValue(0.25)],
      ["missing", NULL],
      ["tags", arrayValue([stringValue("a"), stringValue("b")])],
      ["author", mapValue([["name", stringValue("Sam")]])],
    ]);

    expect(valueEquals(value, expected)).toBe(true);
  });

  it("prefers an integer when a float literal has an integral value", () => {
    expect(parseYaml("1.0")).toEqual(integerValue(1));
  });

  it("falls back to a float beyond the 64-bit integer range", () => {
    expect(parseYaml("9223372036854775808")).toEqual(
      floatValue(9223372036854775808),
    );
  });

  it("keeps non-finite floats", () => {
    expect(parseYaml(".inf")).toEqual(floatValue(Infinity));
  });

  it("fails on a number representable as neither integer nor float", () => {
    const literal = "1" + "0".repeat(400);

    expect(() => parseYaml(literal)).toThrow(UnrepresentableNumberError);
    expect(() => parseYaml(literal)).toThrow(
      `Unknown number format while parsing YAML: ${literal}`,
    );
  });

  it("drops mapping entries with non-string keys", () => {
    const value = parseYaml(["1: one", "true: yes", '"2": two', "name: x"].join("\n"));

    expect(
      valueEquals(
        value,
        mapValue([
          ["2", stringValue("two")],
          ["name", stringValue("x")],
        ]),
      ),
    ).toBe(true);
  });

  it("unwraps tagged values to their inner value", () => {
    expect(parseYaml("!custom hello")).toEqual(stringValue("hello"));
  });

  it("unwraps tagged scalars to their untagged type", () => {
    expect(parseYaml("!custom 42")).toEqual(integerValue(42));
    expect(parseYaml("!custom true")).toEqual(booleanValue(true));
    expect(parseYaml("!custom 0.5")).toEqual(floatValue(0.5));
    expect(parseYaml("!custom ~")).toEqual(NULL);
  });

  it("keeps a quoted tagged scalar as a string", () => {
    expect(parseYaml('!custom "42"')).toEqual(stringValue("42"));
  });

  it("unwraps tagged collections and keys", () => {
    const value = parseYaml(
      ["!custom tags: !list [a, !custom 1]", "meta: !custom {draft: false}"].join("\n"),
    );

    expect(
      valueEquals(
        value,
        mapValue([
          ["tags", arrayValue([stringValue("a"), integerValue(1)])],
          ["meta", mapValue([["draft", booleanValue(false)]])],
        ]),
      ),
    ).toBe(true);
  });

  it("follows aliases", () => {
    const value = parseYaml(["base: &b {x: 1}", "copy: *b"].join("\n"));

    expect(
      valueEquals(
        value,
        mapValue([
          ["base", mapValue([["x", integerValue(1)]])],
          ["copy", mapValue([["x", integerValue(1)]])],
        ]),
      ),
    ).toBe(true);
  });

  it("decodes empty text as null", () => {
    expect(parseYaml("")).toEqual(NULL);
  });

  it("raises a deserialization error with the decoder message", () => {
    expect(() => parseYaml("title: [unclosed")).toThrow(DeserializationError);
    expect(() => parseYaml("title: [unclosed")).toThrow(
      /^YAML deserialization failure: /,
    );
  });
});

describe("fromYaml", () => {
  it("converts a decoded tree and drops non-string keys", () => {
    const data = new Map<unknown, unknown>([
      ["count", 7n],
      ["items", [true, null, "x"]],
      [3n, "dropped"],
    ]);

    expect(
      valueEquals(
        fromYaml(data),
        mapValue([
          ["count", integerValue(7)],
          ["items", arrayValue([booleanValue(true), NULL, stringValue("x")])],
        ]),
      ),
    ).toBe(true);
  });
});

describe("stringifyYaml", () => {
  it("writes null as the ~ marker", () => {
    expect(stringifyYaml(mapValue([["a", NULL]]))).toBe("a: ~\n");
  });

  it("writes keys in lexicographic order", () => {
    const value = mapValue([
      ["b", integerValue(2)],
      ["a", integerValue(1)],
    ]);

    expect(stringifyYaml(value)).toBe("a: 1\nb: 2\n");
  });

  it("round-trips every variant", () => {
    const value = mapValue([
      ["title", stringValue("Round trip")],
      ["numeric", stringValue("123")],
      ["flag", booleanValue(false)],
      ["count", integerValue(-7)],
      ["big", integerValue(2n ** 62n)],
      ["ratio", floatValue(1.5)],
      ["none", NULL],
      [
        "nested",
        mapValue([["list", arrayValue([integerValue(1), stringValue("two"), NULL])]]),
      ],
    ]);

    const decoded = parseYaml(stringifyYaml(value));

    expect(valueEquals(decoded, value)).toBe(true);
  });
});
