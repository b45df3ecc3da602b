import { describe, test, expect } from "vitest";

import { tokenize } from "@tplcheck/compiler/parsing/expression-scanner.js";

const kinds = (source: string) => tokenize(source).map((t) => `${t.kind}:${t.text}`);

describe("expression scanner", () => {
  test("identifiers, keywords and operators", () => {
    expect(kinds("this.a !== null")).toEqual([
      "keyword:this",
      "operator:.",
      "identifier:a",
      "operator:!==",
      "keyword:null",
      "eof:",
    ]);
  });

  test("contextual words stay identifiers", () => {
    expect(kinds("let x of xs")).toEqual(["identifier:let", "identifier:x", "identifier:of", "identifier:xs", "eof:"]);
  });

  test("safe navigation vs conditional with a decimal", () => {
    expect(kinds("a?.b")).toEqual(["identifier:a", "operator:?.", "identifier:b", "eof:"]);
    expect(kinds("a ?.5 : 1")).toEqual(["identifier:a", "operator:?", "number:.5", "operator::", "number:1", "eof:"]);
  });

  test("strings are unescaped into value", () => {
    const [token] = tokenize(String.raw`'a\'b\n'`);
    expect(token?.kind).toBe("string");
    expect(token?.value).toBe("a'b\n");
    expect(token?.end).toBe(8);
  });

  test("numbers with exponents", () => {
    const [token] = tokenize("1.5e3");
    expect(token?.value).toBe(1500);
  });

  test("unterminated string stops scanning with an error token", () => {
    expect(kinds("'abc")).toEqual(["error:'abc", "eof:"]);
  });

  test("offsets are local to the source", () => {
    const tokens = tokenize("  foo");
    expect(tokens[0]).toMatchObject({ start: 2, end: 5 });
  });
});
