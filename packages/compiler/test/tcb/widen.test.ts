import { describe, test, expect } from "vitest";

import { expression, text, toText } from "@tplcheck/compiler/tcb/code.js";
import { Environment } from "@tplcheck/compiler/tcb/environment.js";
import { unwrapWritableSignal, widenBinding } from "@tplcheck/compiler/tcb/widen.js";
import { resolveTypeCheckingConfig } from "@tplcheck/compiler/typecheck/config.js";

const plain = text("this.a.b");
const literal = expression((b) => b.append("{a: 1}"), { literal: "object" });

describe("widenBinding", () => {
  test("casts to any when input bindings are not checked", () => {
    const config = resolveTypeCheckingConfig({ checkTypeOfInputBindings: false, strictNullInputBindings: true });
    expect(toText(widenBinding(plain, config))).toBe("(this.a.b as any)");
    expect(toText(widenBinding(literal, config))).toBe("({a: 1} as any)");
  });

  test("asserts non-null without strict null input checks, except for literals", () => {
    const config = resolveTypeCheckingConfig({ checkTypeOfInputBindings: true, strictNullInputBindings: false });
    expect(toText(widenBinding(plain, config))).toBe("this.a.b!");
    expect(widenBinding(literal, config)).toBe(literal);
  });

  test("leaves the expression alone when both checks are on", () => {
    const config = resolveTypeCheckingConfig({ checkTypeOfInputBindings: true, strictNullInputBindings: true });
    expect(widenBinding(plain, config)).toBe(plain);
  });
});

describe("unwrapWritableSignal", () => {
  test("calls the runtime helper through the core namespace import", () => {
    const env = new Environment(resolveTypeCheckingConfig());
    expect(toText(unwrapWritableSignal(plain, env))).toBe("_i0.ɵunwrapWritableSignal(this.a.b)");
  });
});
