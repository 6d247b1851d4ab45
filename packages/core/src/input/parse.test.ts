import { describe, expect, it } from "vitest";
import { ParseError } from "../errors.js";
import { parseKeyedValues, parseNumber, parseValues } from "./parse.js";

describe("parseValues", () => {
  it("reads whitespace and comma separated numbers, skipping comments", () => {
    const text = "# header\n1 2,3\n\n  4.5e1 ,-6\r\n";
    expect(parseValues(text)).toEqual({ values: [1, 2, 3, 45, -6], issues: [] });
  });

  it("collects tokens that are not numbers", () => {
    const result = parseValues("1 abc\n2\nx 3");
    expect(result.values).toEqual([1, 2, 3]);
    expect(result.issues).toEqual([
      { line: 1, token: "abc" },
      { line: 3, token: "x" }
    ]);
  });

  it("throws on the first bad token in strict mode", () => {
    expect(() => parseValues("1\n2 oops", { strict: true })).toThrow(ParseError);
    expect(() => parseValues("1\n2 oops", { strict: true })).toThrow('Line 2: not a number: "oops"');
  });
});

describe("parseNumber", () => {
  it("understands IEEE literals", () => {
    expect(parseNumber("nan")).toBeNaN();
    expect(parseNumber("-inf")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseNumber("Infinity")).toBe(Number.POSITIVE_INFINITY);
    expect(parseNumber("seven")).toBeNull();
  });
});

describe("parseKeyedValues", () => {
  it("reads key value pairs", () => {
    const result = parseKeyedValues("api 12\ndb,3.5\n# skip\nbroken\napi 1 2");
    expect(result.entries).toEqual([
      { key: "api", value: 12 },
      { key: "db", value: 3.5 }
    ]);
    expect(result.issues).toEqual([
      { line: 4, token: "broken" },
      { line: 5, token: "api 1 2" }
    ]);
  });
});
