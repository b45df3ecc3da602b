import { describe, test, expect } from "vitest";

import { matchesSelector, parseSelector, SelectorParseError, type MatchTarget } from "@tplcheck/compiler/binding/selector.js";

function target(element: string, attrs: Record<string, string> = {}): MatchTarget {
  return { element, attrs: new Map(Object.entries(attrs)) };
}

describe("selectors", () => {
  test("parse compound selectors", () => {
    expect(parseSelector("button[mat-button].primary:not([disabled])")).toEqual([
      {
        element: "button",
        attrs: [{ name: "mat-button", value: null }],
        classNames: ["primary"],
        notSelectors: [{ element: null, attrs: [{ name: "disabled", value: null }], classNames: [], notSelectors: [] }],
      },
    ]);
  });

  test("comma separated alternatives", () => {
    const parsed = parseSelector("[ngModel], [formControl]");
    expect(parsed.map((s) => s.attrs[0]?.name)).toEqual(["ngModel", "formControl"]);
  });

  test("attribute values may be quoted", () => {
    expect(parseSelector(`input[type="text"]`)[0]?.attrs).toEqual([{ name: "type", value: "text" }]);
  });

  test("tag names match case-insensitively", () => {
    expect(matchesSelector("MY-COMP", target("my-comp"))).toBe(true);
    expect(matchesSelector("my-comp", target("other"))).toBe(false);
  });

  test("attribute presence and value", () => {
    expect(matchesSelector("[ngIf]", target("ng-template", { ngIf: "" }))).toBe(true);
    expect(matchesSelector("[ngIf]", target("ng-template", { ngif: "" }))).toBe(false);
    expect(matchesSelector("[type=text]", target("input", { type: "text" }))).toBe(true);
    expect(matchesSelector("[type=text]", target("input", { type: "checkbox" }))).toBe(false);
  });

  test("classes come from the class attribute", () => {
    expect(matchesSelector(".a.b", target("div", { class: "b  a c" }))).toBe(true);
    expect(matchesSelector(".a.b", target("div", { class: "a" }))).toBe(false);
  });

  test(":not excludes", () => {
    expect(matchesSelector("input:not([type=checkbox])", target("input", { type: "checkbox" }))).toBe(false);
    expect(matchesSelector("input:not([type=checkbox])", target("input", { type: "text" }))).toBe(true);
  });

  test("descendant combinators are rejected", () => {
    expect(() => parseSelector("div span")).toThrow(SelectorParseError);
  });
});
