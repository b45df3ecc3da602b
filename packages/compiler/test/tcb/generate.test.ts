/**
 * Type-check block generation: whole blocks for representative templates under each
 * preset, plus the out-of-band diagnostics recorded on the way.
 */
import { describe, test, expect } from "vitest";

import { bindTemplate } from "@tplcheck/compiler/binding/binder.js";
import { compileTypeCheckBlock } from "@tplcheck/compiler/facade.js";
import { defineDirective, type DirectiveMeta } from "@tplcheck/compiler/model/directive.js";
import { parseTemplate } from "@tplcheck/compiler/parsing/template-parser.js";
import { Environment } from "@tplcheck/compiler/tcb/environment.js";
import { generateTypeCheckBlock } from "@tplcheck/compiler/tcb/generate.js";
import { OutOfBandDiagnosticRecorder } from "@tplcheck/compiler/tcb/oob.js";
import { resolveTypeCheckingConfig, type TypeCheckingConfigInput } from "@tplcheck/compiler/typecheck/config.js";

function generate(html: string, directives: readonly DirectiveMeta[] = [], config: TypeCheckingConfigInput = {}) {
  return compileTypeCheckBlock(html, { component: "App", directives, config });
}

function lines(...body: string[]): string {
  return body.map((line) => `${line}\n`).join("");
}

const NgIf = defineDirective({
  name: "NgIf",
  selector: "[ngIf]",
  inputs: ["ngIf"],
  templateGuards: [{ inputName: "ngIf", type: "binding" }],
});

const NgFor = defineDirective({
  name: "NgFor",
  selector: "[ngFor][ngForOf]",
  inputs: ["ngForOf"],
  typeParameters: [{ name: "T" }],
  hasTemplateContextGuard: true,
});

const Tooltip = defineDirective({ name: "Tooltip", selector: "[tip]", inputs: ["tip"], outputs: ["shown"] });

const NgModel = defineDirective({
  name: "NgModel",
  selector: "[ngModel]",
  inputs: ["ngModel"],
  outputs: ["ngModelChange"],
});

// ============================================================================
// Templates and guards
// ============================================================================

describe("templates", () => {
  test("guards the body of an inline template and its listeners", () => {
    const { block, diagnostics } = generate(
      `<button *ngIf="user" (click)="handle($event)"></button>`,
      [NgIf],
      { preset: "strict" },
    );

    expect(diagnostics).toEqual([]);
    expect(block.name).toBe("_tcb_App");
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        "  var _t1 = null! as NgIf;",
        "  _t1.ngIf = this.user;",
        "  if (this.user) {",
        '    var _t2 = document.createElement("button");',
        '    _t2.addEventListener("click", ($event): any => {',
        "      if (this.user) {",
        "        this.handle($event);",
        "      }",
        "    });",
        "  }",
        "}",
      ),
    );
  });

  test("repeats the guards of every enclosing template in a listener, outermost first", () => {
    const { block } = generate(`<div *ngIf="a"><button *ngIf="b" (click)="go()"></button></div>`, [NgIf], {
      preset: "strict",
    });

    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        "  var _t1 = null! as NgIf;",
        "  _t1.ngIf = this.a;",
        "  if (this.a) {",
        "    var _t2 = null! as NgIf;",
        "    _t2.ngIf = this.b;",
        "    if (this.b) {",
        '      var _t3 = document.createElement("button");',
        '      _t3.addEventListener("click", ($event): any => {',
        "        if (this.a && this.b) {",
        "          this.go();",
        "        }",
        "      });",
        "    }",
        "  }",
        "}",
      ),
    );
  });

  test("narrows a generic directive's context with its context guard", () => {
    const { block } = generate(`<li *ngFor="let item of items">{{item.name}}</li>`, [NgFor], { preset: "strict" });

    expect(block.text).toBe(
      lines(
        'const _ctor1: <T = any>(init: Pick<NgFor<T>, "ngForOf">) => NgFor<T> = null!;',
        "function _tcb_App(this: App) {",
        '  var _t1 = _ctor1({"ngForOf": this.items});',
        "  _t1.ngForOf = this.items;",
        "  var _t2: any = null!;",
        "  if (NgFor.ngTemplateContextGuard(_t1, _t2)) {",
        "    var _t3 = _t2.$implicit;",
        '    "" + (_t3.name);',
        "  }",
        "}",
      ),
    );
  });

  test("reads template variables from an untyped context without directives", () => {
    const { block } = generate(`<ng-template let-a>{{a}}</ng-template>`, [], { preset: "strict" });

    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        "  var _t1: any = null!;",
        "  {",
        "    var _t2 = _t1.$implicit;",
        '    "" + (_t2);',
        "  }",
        "}",
      ),
    );
  });

  test("skips template bodies when they are not checked", () => {
    const { block } = generate(`<div *ngIf="x">{{y}}</div>`, [NgIf], { preset: "basic" });

    expect(block.text).toBe(
      lines("function _tcb_App(this: App) {", "  var _t1 = null! as NgIf;", "  _t1.ngIf = (this.x as any);", "}"),
    );
  });

  test("reports redeclared template variables and keeps the first", () => {
    const { block, diagnostics } = generate(`<p *tpl="let a; let a = b">{{a}}</p>`);

    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        "  var _t1: any = null!;",
        "  {",
        "    var _t2 = _t1.$implicit;",
        '    "" + (_t2);',
        "  }",
        "}",
      ),
    );
    expect(diagnostics).toEqual([
      {
        code: "tcb/duplicate-template-var",
        message: "Cannot redeclare variable 'a' as it was previously declared elsewhere for the same template.",
        stage: "tcb",
        severity: "error",
        span: { start: 16, end: 25 },
        related: [{ message: "'a' is first declared here.", span: { start: 9, end: 14 } }],
        data: { name: "a" },
      },
    ]);
  });

  test("suggests context guards when variables of a guarded directive stay untyped", () => {
    const { diagnostics } = generate(`<li *ngFor="let item of items">{{item}}</li>`, [NgFor], {
      preset: "full",
      enableTemplateTypeChecker: true,
    });

    expect(diagnostics.map((d) => [d.code, d.severity, d.message])).toEqual([
      [
        "tcb/suboptimal-type-inference",
        "info",
        "Template variables 'item' of 'NgFor' are typed 'any' because template context guards are disabled.",
      ],
    ]);
  });
});

// ============================================================================
// Inputs
// ============================================================================

describe("inputs", () => {
  test("asserts inputs non-null without strict null checks", () => {
    const { block } = generate(`<span [tip]="a"></span>`, [Tooltip]);
    expect(block.text).toBe(lines("function _tcb_App(this: App) {", "  var _t1 = null! as Tooltip;", "  _t1.tip = this.a!;", "}"));
  });

  test("leaves literal inputs unasserted", () => {
    const { block } = generate(`<span [tip]="[a]"></span>`, [Tooltip]);
    expect(block.text).toBe(lines("function _tcb_App(this: App) {", "  var _t1 = null! as Tooltip;", "  _t1.tip = [this.a];", "}"));
  });

  test("assigns unclaimed properties into the element with DOM binding checks", () => {
    const { block } = generate(`<label [for]="id"></label>`, [], { preset: "strict", checkTypeOfDomBindings: true });
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        '  var _t1 = document.createElement("label");',
        '  _t1["htmlFor"] = this.id;',
        "}",
      ),
    );
  });

  test("treats properties named like object members as plain DOM properties", () => {
    const { block } = generate(`<div [constructor]="x" [toString]="y"></div>`, [], {
      preset: "strict",
      checkTypeOfDomBindings: true,
    });
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        '  var _t1 = document.createElement("div");',
        '  _t1["constructor"] = this.x;',
        '  _t1["toString"] = this.y;',
        "}",
      ),
    );
  });

  test("checks unclaimed properties on their own otherwise", () => {
    const { block } = generate(`<input [value]="name">`, [], { preset: "strict" });
    expect(block.text).toBe(lines("function _tcb_App(this: App) {", "  this.name;", "}"));
  });

  test("infers a generic directive that refers to itself through a reference", () => {
    const Comp = defineDirective({
      name: "Comp",
      selector: "comp",
      exportAs: ["comp"],
      inputs: ["x"],
      typeParameters: [{ name: "T" }],
    });
    const { block } = generate(`<comp #c="comp" [x]="c.y"></comp>`, [Comp], {
      preset: "strict",
      enableTemplateTypeChecker: true,
    });

    expect(block.text).toBe(
      lines(
        'const _ctor1: <T = any>(init: Pick<Comp<T>, "x">) => Comp<T> = null!;',
        "function _tcb_App(this: App) {",
        '  var _t1 = document.createElement("comp");',
        "  var _t4 = _ctor1(null!);",
        "  var _t3 = _t4;",
        '  var _t2 = _ctor1({"x": _t3.y});',
        "  _t2.x = _t3.y;",
        "}",
      ),
    );
  });
});

// ============================================================================
// Outputs
// ============================================================================

describe("outputs", () => {
  test("keeps an object literal that starts a handler statement an expression", () => {
    const { block } = generate(`<button (click)="{a: 1}.a"></button>`, [], { preset: "strict" });
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        '  var _t1 = document.createElement("button");',
        '  _t1.addEventListener("click", ($event): any => {',
        '    ({"a": 1}).a;',
        "  });",
        "}",
      ),
    );
  });

  test("types listeners as any without event checks", () => {
    const { block } = generate(`<button (click)="handle($event)"></button>`);
    expect(block.text).toBe(
      lines("function _tcb_App(this: App) {", "  ($event: any): any => {", "    this.handle($event);", "  };", "}"),
    );
  });

  test("subscribes to directive outputs with output checks", () => {
    const { block } = generate(`<span (shown)="onShown($event)"></span>`, [Tooltip], { preset: "strict" });
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        "  var _t1 = null! as Tooltip;",
        '  _t1["shown"].subscribe(($event): any => {',
        "    this.onShown($event);",
        "  });",
        "}",
      ),
    );
  });

  test("writes two-way events back into the bound expression", () => {
    const { block, diagnostics } = generate(`<input [(ngModel)]="name">`, [NgModel], { preset: "strict" });

    expect(diagnostics).toEqual([]);
    expect(block.text).toBe(
      lines(
        'import * as _i0 from "@angular/core";',
        "function _tcb_App(this: App) {",
        "  var _t1 = null! as NgModel;",
        "  _t1.ngModel = _i0.ɵunwrapWritableSignal(this.name);",
        '  _t1["ngModelChange"].subscribe(($event): any => {',
        "    this.name = $event;",
        "  });",
        "}",
      ),
    );
  });

  test("reports a two-way binding whose halves reach different targets", () => {
    const ValueDir = defineDirective({ name: "ValueDir", selector: "[value]", inputs: ["value"] });
    const { block, diagnostics } = generate(`<input [(value)]="v">`, [ValueDir], { preset: "strict" });

    expect(block.text).toBe(
      lines(
        'import * as _i0 from "@angular/core";',
        "function _tcb_App(this: App) {",
        "  var _t1 = null! as ValueDir;",
        "  _t1.value = _i0.ɵunwrapWritableSignal(this.v);",
        "}",
      ),
    );
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
      [
        "tcb/split-two-way-binding",
        "The property and event halves of the two-way binding 'value' are not bound to the same target. " +
          "'value' is consumed by 'ValueDir', 'valueChange' by '<input>'.",
      ],
    ]);
  });
});

// ============================================================================
// References
// ============================================================================

describe("references", () => {
  test("element references are typed as the element with DOM reference checks", () => {
    const { block } = generate(`<input #box><p>{{box.value}}</p>`, [], { preset: "strict" });
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        '  var _t2 = document.createElement("input");',
        "  var _t1 = _t2;",
        '  "" + (_t1.value);',
        "}",
      ),
    );
  });

  test("element references are any otherwise", () => {
    const { block } = generate(`<input #box><p>{{box.value}}</p>`);
    expect(block.text).toBe(
      lines(
        "function _tcb_App(this: App) {",
        '  var _t2 = document.createElement("input");',
        "  var _t1 = (_t2 as any);",
        '  "" + (_t1.value);',
        "}",
      ),
    );
  });

  test("template references are typed as TemplateRef", () => {
    const { block } = generate(`<ng-template #tpl></ng-template>{{tpl}}`, [], { preset: "strict" });
    expect(block.text).toBe(
      lines(
        'import * as _i0 from "@angular/core";',
        "function _tcb_App(this: App) {",
        "  var _t2: any = null!;",
        "  var _t1 = (_t2 as any as _i0.TemplateRef<any>);",
        '  "" + (_t1);',
        "}",
      ),
    );
  });

  test("reports references to an unknown exportAs", () => {
    const { block, diagnostics } = generate(`<div #r="nope"></div>`, [], { preset: "strict" });
    expect(block.text).toBe("function _tcb_App(this: App) {}\n");
    expect(diagnostics).toEqual([
      {
        code: "tcb/missing-reference-target",
        message: "No directive found with exportAs 'nope'.",
        stage: "tcb",
        severity: "error",
        span: { start: 9, end: 13 },
        data: { name: "r", value: "nope" },
      },
    ]);
  });
});

// ============================================================================
// Components and deferred directives
// ============================================================================

describe("block function", () => {
  const List = { name: "List", typeParameters: [{ name: "T", bound: "object" }], ref: { name: "List" } };

  test("declares the component's type parameters with context generics", () => {
    const { block } = compileTypeCheckBlock("", { component: List, config: { preset: "strict" } });
    expect(block.text).toBe("function _tcb_List<T extends object>(this: List<T>) {}\n");
  });

  test("applies any for each type parameter otherwise", () => {
    const { block } = compileTypeCheckBlock("", { component: List });
    expect(block.text).toBe("function _tcb_List(this: List<any>) {}\n");
  });

  test("sanitizes the template id into the function name", () => {
    const { block } = compileTypeCheckBlock("", { component: "App", id: "app.html#0" });
    expect(block.name).toBe("_tcb_app_html_0");
  });

  test("reports deferred directives used outside a deferred block", () => {
    const Lazy = defineDirective({ name: "Lazy", selector: "lazy-cmp", isExplicitlyDeferred: true });
    const { diagnostics } = generate(`<lazy-cmp></lazy-cmp>`, [Lazy]);
    expect(diagnostics.map((d) => [d.code, d.message, d.span])).toEqual([
      [
        "tcb/deferred-directive-used-eagerly",
        "Element 'lazy-cmp' uses deferred directive 'Lazy' outside a deferred block.",
        { start: 0, end: 10 },
      ],
    ]);
  });

  test("blocks of one pass share the environment prelude and the recorder", () => {
    const config = resolveTypeCheckingConfig();
    const env = new Environment(config);
    const oob = new OutOfBandDiagnosticRecorder();
    const first = parseTemplate("{{a | nope}}");
    const second = parseTemplate("{{b | nope}}");

    generateTypeCheckBlock({
      id: "first",
      component: { name: "A", typeParameters: [], ref: { name: "A" } },
      boundTarget: bindTemplate(first.nodes, { directives: [], pipes: [] }),
      env,
      oob,
    });
    const block = generateTypeCheckBlock({
      id: "second",
      component: { name: "B", typeParameters: [], ref: { name: "B" } },
      boundTarget: bindTemplate(second.nodes, { directives: [], pipes: [] }),
      env,
      oob,
    });

    expect(oob.diagnostics.map((d) => d.code)).toEqual(["tcb/missing-pipe", "tcb/missing-pipe"]);
    expect(block.diagnostics).toBe(oob.diagnostics);
  });
});
