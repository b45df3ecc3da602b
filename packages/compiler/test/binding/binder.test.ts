import { describe, test, expect } from "vitest";

import { bindTemplate, matchTargetOf } from "@tplcheck/compiler/binding/binder.js";
import { defineDirective, definePipe } from "@tplcheck/compiler/model/directive.js";
import type { AST, PropertyRead } from "@tplcheck/compiler/model/expr.js";
import type { TmplElement, TmplHostNode, TmplNode } from "@tplcheck/compiler/model/template.js";
import { parseTemplate } from "@tplcheck/compiler/parsing/template-parser.js";

function firstElement(nodes: readonly TmplNode[]): TmplElement {
  const node = nodes.find((n): n is TmplElement => n.$kind === "Element");
  if (!node) throw new Error("no element");
  return node;
}

function host(nodes: readonly TmplNode[]): TmplHostNode {
  const node = nodes.find((n): n is TmplHostNode => n.$kind === "Element" || n.$kind === "Template");
  if (!node) throw new Error("no host node");
  return node;
}

/** First PropertyRead named `name`, depth first. */
function findRead(ast: AST, name: string): PropertyRead | null {
  if (ast.$kind === "PropertyRead" && ast.name === name) return ast;
  const children: AST[] = [];
  switch (ast.$kind) {
    case "PropertyRead":
      children.push(ast.receiver);
      break;
    case "Interpolation":
      children.push(...ast.expressions);
      break;
    case "Call":
      children.push(ast.receiver, ...ast.args);
      break;
    default:
      break;
  }
  for (const child of children) {
    const found = findRead(child, name);
    if (found) return found;
  }
  return null;
}

const NgIf = defineDirective({ name: "NgIf", selector: "[ngIf]", inputs: ["ngIf"] });
const Tooltip = defineDirective({ name: "Tooltip", selector: "[tip]", inputs: ["tip"], outputs: ["shown"] });
const Panel = defineDirective({ name: "Panel", selector: "app-panel", isComponent: true, exportAs: ["panel"] });
const Form = defineDirective({ name: "Form", selector: "form", exportAs: ["ngForm"] });

describe("binder / directive matching", () => {
  test("inline templates match as ng-template with their microsyntax keys", () => {
    const { nodes } = parseTemplate(`<p *ngIf="show"></p>`);
    const tpl = host(nodes);
    expect(matchTargetOf(tpl)).toEqual({ element: "ng-template", attrs: new Map([["ngIf", ""]]) });
    const bound = bindTemplate(nodes, { directives: [NgIf] });
    expect(bound.getDirectivesOfNode(tpl)).toEqual([NgIf]);
  });

  test("bindings and events take part in matching", () => {
    const { nodes } = parseTemplate(`<span [tip]="t"></span>`);
    const bound = bindTemplate(nodes, { directives: [Tooltip, NgIf] });
    expect(bound.getDirectivesOfNode(host(nodes))).toEqual([Tooltip]);
    expect(bound.getUsedDirectives()).toEqual([Tooltip]);
  });

  test("components come first", () => {
    const Marker = defineDirective({ name: "Marker", selector: "[mark]" });
    const { nodes } = parseTemplate(`<app-panel mark></app-panel>`);
    const bound = bindTemplate(nodes, { directives: [Marker, Panel] });
    expect(bound.getDirectivesOfNode(host(nodes)).map((d) => d.name)).toEqual(["Panel", "Marker"]);
  });

  test("directives without a selector never match", () => {
    const Hidden = defineDirective({ name: "Hidden" });
    const { nodes } = parseTemplate(`<div></div>`);
    expect(bindTemplate(nodes, { directives: [Hidden] }).getDirectivesOfNode(host(nodes))).toEqual([]);
  });
});

describe("binder / references", () => {
  test("bare reference targets the component, else the element", () => {
    const { nodes } = parseTemplate(`<app-panel #p></app-panel><div #d></div>`);
    const bound = bindTemplate(nodes, { directives: [Panel] });
    const [panel, div] = nodes.filter((n): n is TmplElement => n.$kind === "Element");
    if (!panel || !div) throw new Error("missing elements");
    expect(bound.getReferenceTarget(panel.references[0] ?? fail())).toBe(Panel);
    expect(bound.getReferenceTarget(div.references[0] ?? fail())).toBe(div);
  });

  test("named reference needs a matching exportAs", () => {
    const { nodes } = parseTemplate(`<form #f="ngForm" #g="nope"></form>`);
    const bound = bindTemplate(nodes, { directives: [Form] });
    const form = firstElement(nodes);
    expect(bound.getReferenceTarget(form.references[0] ?? fail())).toBe(Form);
    expect(bound.getReferenceTarget(form.references[1] ?? fail())).toBeNull();
  });
});

describe("binder / expression targets", () => {
  test("template variables shadow component members", () => {
    const { nodes } = parseTemplate(`<ng-template let-item>{{item}} {{other}}</ng-template>`);
    const bound = bindTemplate(nodes);
    const tpl = host(nodes);
    if (tpl.$kind !== "Template") throw new Error("expected template");
    const text = tpl.children[0];
    if (text?.$kind !== "BoundText") throw new Error("expected bound text");
    const item = findRead(text.value, "item");
    const other = findRead(text.value, "other");
    expect(item && bound.getExpressionTarget(item)).toBe(tpl.variables[0]);
    expect(other && bound.getExpressionTarget(other)).toBeNull();
  });

  test("references are visible to siblings declared before them", () => {
    const { nodes } = parseTemplate(`<p>{{box.value}}</p><input #box>`);
    const bound = bindTemplate(nodes);
    const p = firstElement(nodes);
    const text = p.children[0];
    if (text?.$kind !== "BoundText") throw new Error("expected bound text");
    const read = findRead(text.value, "box");
    const input = nodes.find((n): n is TmplElement => n.$kind === "Element" && n.name === "input");
    expect(read && bound.getExpressionTarget(read)).toBe(input?.references[0]);
  });

  test("references inside a template stay inside", () => {
    const { nodes } = parseTemplate(`<ng-template><i #inner></i></ng-template>{{inner}}`);
    const bound = bindTemplate(nodes);
    const text = nodes.find((n) => n.$kind === "BoundText");
    if (text?.$kind !== "BoundText") throw new Error("expected bound text");
    const read = findRead(text.value, "inner");
    expect(read && bound.getExpressionTarget(read)).toBeNull();
  });

  test("`this.x` resolves like `x`", () => {
    const { nodes } = parseTemplate(`<ng-template let-x>{{this.x}}</ng-template>`);
    const bound = bindTemplate(nodes);
    const tpl = host(nodes);
    if (tpl.$kind !== "Template") throw new Error("expected template");
    const text = tpl.children[0];
    if (text?.$kind !== "BoundText") throw new Error("expected bound text");
    const read = findRead(text.value, "x");
    expect(read && bound.getExpressionTarget(read)).toBe(tpl.variables[0]);
  });
});

describe("binder / consumers and pipes", () => {
  test("inputs and outputs go to the directive that declares them", () => {
    const { nodes } = parseTemplate(`<span [tip]="t" [title]="u" (shown)="a()" (click)="b()"></span>`);
    const bound = bindTemplate(nodes, { directives: [Tooltip] });
    const span = firstElement(nodes);
    expect(span.inputs.map((i) => bound.getConsumerOfBinding(i))).toEqual([Tooltip, span]);
    expect(span.outputs.map((o) => bound.getConsumerOfBinding(o))).toEqual([Tooltip, span]);
  });

  test("pipes in use and lookup by name", () => {
    const date = definePipe({ name: "date", className: "DatePipe" });
    const { nodes } = parseTemplate(`{{ d | date }} {{ e | upper }}`);
    const bound = bindTemplate(nodes, { pipes: [date] });
    expect(bound.getUsedPipes()).toEqual(["date", "upper"]);
    expect(bound.getPipe("date")).toBe(date);
    expect(bound.getPipe("upper")).toBeNull();
  });
});

function fail(): never {
  throw new Error("missing value");
}
