/**
 * Expression translation, observed through the statement a root-level interpolation
 * `{{ expr }}` produces in the generated block.
 */
import { describe, test, expect } from "vitest";

import { compileTypeCheckBlock } from "@tplcheck/compiler/facade.js";
import { definePipe, type PipeMeta } from "@tplcheck/compiler/model/directive.js";
import type { TypeCheckingConfigInput } from "@tplcheck/compiler/typecheck/config.js";

function compile(expr: string, config: TypeCheckingConfigInput = {}, pipes: readonly PipeMeta[] = []) {
  return compileTypeCheckBlock(`{{${expr}}}`, { component: "App", pipes, config });
}

/** The single statement of the block function, unindented. */
function translate(expr: string, config: TypeCheckingConfigInput = {}, pipes: readonly PipeMeta[] = []): string {
  const lines = compile(expr, config, pipes).block.text.split("\n");
  const fn = lines.findIndex((line) => line.startsWith("function "));
  return lines[fn + 1]?.trim() ?? "";
}

const DatePipe = definePipe({ name: "date", className: "DatePipe" });

// ============================================================================
// Reads and operators
// ============================================================================

describe("reads and operators", () => {
  test("unqualified names read from the component", () => {
    expect(translate("user.name")).toBe('"" + (this.user.name);');
  });

  test("explicit this is kept", () => {
    expect(translate("this.count")).toBe('"" + (this.count);');
  });

  test("conditionals and binaries are parenthesized", () => {
    expect(translate("a ? b : c + 1")).toBe('"" + ((this.a ? this.b : (this.c + 1)));');
  });

  test("negation and string literals", () => {
    expect(translate("!a")).toBe('"" + ((!this.a));');
    expect(translate("'x'")).toBe('"" + ("x");');
  });

  test("calls translate their arguments", () => {
    expect(translate("format(a, 2)")).toBe('"" + (this.format(this.a, 2));');
  });

  test("$any casts its argument", () => {
    expect(translate("$any(x).y")).toBe('"" + ((this.x as any).y);');
  });
});

// ============================================================================
// Safe navigation
// ============================================================================

describe("safe navigation", () => {
  test("strict form keeps the member type and adds undefined", () => {
    expect(translate("a?.b", { preset: "strict" })).toBe('"" + ((null as any ? (this.a)!.b : undefined));');
  });

  test("non-strict form asserts the receiver and casts the result", () => {
    expect(translate("a?.b")).toBe('"" + (((this.a)!.b as any));');
  });

  test("a receiver already typed any is cast instead of asserted", () => {
    expect(translate("f()?.b")).toBe('"" + (((this.f()) as any).b);');
  });
});

// ============================================================================
// Literals
// ============================================================================

describe("literals", () => {
  test("array literals keep their type with strict literal types", () => {
    expect(translate("[a, 1]")).toBe('"" + ([this.a, 1]);');
  });

  test("array literals are cast to any otherwise", () => {
    expect(translate("[a, 1]", { preset: "basic" })).toBe('"" + (([this.a, 1] as any));');
  });

  test("object literal keys are quoted", () => {
    expect(translate(" {k: a} ")).toBe('"" + (({"k": this.a}));');
  });

  test("object literals are cast to any otherwise", () => {
    expect(translate(" {k: a} ", { preset: "basic" })).toBe('"" + (({"k": this.a} as any));');
  });

  test("numbers keep the text they were written with", () => {
    expect(translate("12345678901234567890")).toBe('"" + (12345678901234567890);');
    expect(translate("1.50e3")).toBe('"" + (1.50e3);');
  });
});

// ============================================================================
// Pipes
// ============================================================================

describe("pipes", () => {
  test("checked pipes call transform on a typed instance", () => {
    const { block } = compile("d | date:'short'", {}, [DatePipe]);
    expect(block.text).toBe(
      'var _pipe1 = null! as DatePipe;\nfunction _tcb_App(this: App) {\n  "" + (_pipe1.transform(this.d, "short"));\n}\n',
    );
  });

  test("unchecked pipes cast the instance to any", () => {
    expect(translate("d | date", { preset: "basic" }, [DatePipe])).toBe('"" + ((_pipe1 as any).transform(this.d));');
  });

  test("one instance serves every use of a pipe", () => {
    const { block } = compileTypeCheckBlock("{{a | date}}{{b | date}}", { component: "App", pipes: [DatePipe] });
    expect(block.text).toBe(
      'var _pipe1 = null! as DatePipe;\nfunction _tcb_App(this: App) {\n  "" + (_pipe1.transform(this.a)) + (_pipe1.transform(this.b));\n}\n',
    );
  });

  test("an unknown pipe is reported and replaced by an any-typed value", () => {
    const { block, diagnostics } = compile("a | nope");
    expect(block.text).toBe('function _tcb_App(this: App) {\n  "" + ((null as any).transform(this.a));\n}\n');
    expect(diagnostics).toEqual([
      {
        code: "tcb/missing-pipe",
        message: "No pipe found with name 'nope'.",
        stage: "tcb",
        severity: "error",
        span: { start: 6, end: 10 },
        data: { name: "nope" },
      },
    ]);
  });
});
