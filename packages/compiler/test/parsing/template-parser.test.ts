import { describe, test, expect } from "vitest";

import { parseTemplate } from "@tplcheck/compiler/parsing/template-parser.js";
import type { TmplElement, TmplNode, TmplTemplate } from "@tplcheck/compiler/model/template.js";

function only(nodes: readonly TmplNode[]): TmplNode {
  expect(nodes).toHaveLength(1);
  const [node] = nodes;
  if (!node) throw new Error("no node");
  return node;
}

function element(node: TmplNode): TmplElement {
  if (node.$kind !== "Element") throw new Error(`expected Element, got ${node.$kind}`);
  return node;
}

function template(node: TmplNode): TmplTemplate {
  if (node.$kind !== "Template") throw new Error(`expected Template, got ${node.$kind}`);
  return node;
}

describe("template parser", () => {
  test("static attributes and property bindings", () => {
    const { nodes, diagnostics } = parseTemplate(`<div class="a" [title]="t"></div>`);
    expect(diagnostics).toEqual([]);
    const div = element(only(nodes));
    expect(div.name).toBe("div");
    expect(div.attributes).toMatchObject([{ name: "class", value: "a", valueSpan: { start: 12, end: 13 } }]);
    expect(div.inputs).toMatchObject([
      {
        name: "title",
        type: "property",
        keySpan: { start: 16, end: 21 },
        valueSpan: { start: 24, end: 25 },
        value: { $kind: "PropertyRead", name: "t", span: { start: 24, end: 25 } },
      },
    ]);
    expect(div.startSourceSpan).toEqual({ start: 0, end: 27 });
    expect(div.endSourceSpan).toEqual({ start: 27, end: 33 });
  });

  test("attribute names keep their case", () => {
    const div = element(only(parseTemplate(`<div [ngClass]="c"></div>`).nodes));
    expect(div.inputs[0]?.name).toBe("ngClass");
  });

  test("two-way binding yields an input and a Change event", () => {
    const input = element(only(parseTemplate(`<input [(value)]="name">`).nodes));
    expect(input.inputs).toMatchObject([{ name: "value", type: "twoWay", value: { name: "name" } }]);
    expect(input.outputs).toMatchObject([{ name: "valueChange", type: "twoWay", handler: { name: "name" } }]);
  });

  test("events parse as actions and keep their target", () => {
    const div = element(only(parseTemplate(`<div (window:resize)="onResize($event)"></div>`).nodes));
    expect(div.outputs).toMatchObject([
      { name: "resize", type: "regular", target: "window", handler: { $kind: "Call" } },
    ]);
  });

  test("animation callbacks carry their phase", () => {
    const div = element(only(parseTemplate(`<div (@fade.done)="end()"></div>`).nodes));
    expect(div.outputs).toMatchObject([{ name: "fade", type: "animation", phase: "done" }]);
  });

  test("references", () => {
    const div = element(only(parseTemplate(`<div #box #m="menu"></div>`).nodes));
    expect(div.references).toMatchObject([
      { name: "box", value: "" },
      { name: "m", value: "menu" },
    ]);
  });

  test("interpolated text and attributes", () => {
    const div = element(only(parseTemplate(`<div title="a{{b}}">x {{ y }}</div>`).nodes));
    expect(div.inputs).toMatchObject([{ name: "title", type: "property", value: { $kind: "Interpolation" } }]);
    expect(div.children).toMatchObject([
      { $kind: "BoundText", value: { strings: ["x ", ""], expressions: [{ name: "y" }] } },
    ]);
  });

  test("plain text stays text", () => {
    const div = element(only(parseTemplate(`<p>hello</p>`).nodes));
    expect(div.children).toMatchObject([{ $kind: "Text", value: "hello" }]);
  });

  test("inline template wraps its host element", () => {
    const tpl = template(only(parseTemplate(`<li *ngFor="let x of xs">{{x}}</li>`).nodes));
    expect(tpl.tagName).toBe("li");
    expect(tpl.templateAttrs).toMatchObject([
      { $kind: "TextAttribute", name: "ngFor", value: "" },
      { $kind: "BoundAttribute", name: "ngForOf", value: { name: "xs" } },
    ]);
    expect(tpl.variables).toMatchObject([{ name: "x", value: null, keySpan: { start: 16, end: 17 } }]);
    const li = element(only(tpl.children));
    expect(li.name).toBe("li");
    expect(li.children).toMatchObject([{ $kind: "BoundText" }]);
    expect(tpl.sourceSpan).toEqual(li.sourceSpan);
  });

  test("explicit ng-template with let- variables", () => {
    const tpl = template(only(parseTemplate(`<ng-template let-item let-i="index"><span></span></ng-template>`).nodes));
    expect(tpl.tagName).toBe("ng-template");
    expect(tpl.variables).toMatchObject([
      { name: "item", value: null },
      { name: "i", value: "index" },
    ]);
    expect(tpl.children).toMatchObject([{ $kind: "Element", name: "span" }]);
  });

  test("let- outside a template is a plain attribute", () => {
    const div = element(only(parseTemplate(`<div let-x="y"></div>`).nodes));
    expect(div.attributes).toMatchObject([{ name: "let-x", value: "y" }]);
  });

  test("ng-content", () => {
    const content = only(parseTemplate(`<ng-content select=".head"></ng-content>`).nodes);
    expect(content).toMatchObject({ $kind: "Content", selector: ".head" });
    expect(only(parseTemplate(`<ng-content></ng-content>`).nodes)).toMatchObject({ selector: "*" });
  });

  test("expression errors become diagnostics", () => {
    const { diagnostics } = parseTemplate(`<div [a]="b c"></div>`, { file: "app.html" });
    expect(diagnostics).toEqual([
      {
        code: "template/expr-parse-error",
        message: "Unexpected token 'c'",
        stage: "parse",
        severity: "error",
        span: { start: 12, end: 13, file: "app.html" },
        data: { recovery: true },
      },
    ]);
  });

  test("microsyntax errors name the directive", () => {
    const { diagnostics } = parseTemplate(`<li *ngFor="let"></li>`);
    expect(diagnostics).toMatchObject([
      {
        code: "template/microsyntax-error",
        message: "Invalid microsyntax for '*ngFor': Expected identifier after 'let'",
        data: { directive: "ngFor" },
      },
    ]);
  });
});
