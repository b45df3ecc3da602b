import { describe, test, expect } from "vitest";

import { bindTemplate } from "@tplcheck/compiler/binding/binder.js";
import { createDiagnosticEmitter } from "@tplcheck/compiler/diagnostics/emitter.js";
import { typecheckDiagnostics } from "@tplcheck/compiler/diagnostics/catalog/typecheck.js";
import { parseTemplate } from "@tplcheck/compiler/parsing/template-parser.js";
import { buildDiagnostic, effectiveSeverity, hasErrors } from "@tplcheck/compiler/shared/diagnostics.js";
import { TcbErrorCode, TcbInternalError } from "@tplcheck/compiler/shared/errors.js";
import { Environment } from "@tplcheck/compiler/tcb/environment.js";
import { generateTypeCheckBlock } from "@tplcheck/compiler/tcb/generate.js";
import { resolveTypeCheckingConfig } from "@tplcheck/compiler/typecheck/config.js";

describe("diagnostic utilities", () => {
  test("buildDiagnostic normalizes spans and omits absent fields", () => {
    const diag = buildDiagnostic({ code: "E_TEST", message: "Boom", stage: "tcb", span: { start: 9, end: 2 } });
    expect(diag).toEqual({ code: "E_TEST", message: "Boom", stage: "tcb", span: { start: 2, end: 9 } });
  });

  test("buildDiagnostic keeps a null span", () => {
    const diag = buildDiagnostic({ code: "E_TEST", message: "Boom", stage: "parse" });
    expect(diag.span).toBeNull();
  });

  test("a diagnostic without severity counts as an error", () => {
    const plain = buildDiagnostic({ code: "E_A", message: "a", stage: "tcb" });
    const info = buildDiagnostic({ code: "E_B", message: "b", stage: "tcb", severity: "info" });

    expect(effectiveSeverity(plain)).toBe("error");
    expect(hasErrors([info])).toBe(false);
    expect(hasErrors([info, plain])).toBe(true);
  });
});

describe("createDiagnosticEmitter", () => {
  const emitter = createDiagnosticEmitter(typecheckDiagnostics, { stage: "tcb" });

  test("applies the catalog's default severity", () => {
    const diag = emitter.emit("tcb/suboptimal-type-inference", {
      message: "m",
      span: { start: 0, end: 1 },
      data: { directive: "NgFor", variables: ["x"] },
    });
    expect(diag.severity).toBe("info");
    expect(diag.stage).toBe("tcb");
  });

  test("an explicit severity wins", () => {
    const diag = emitter.emit("tcb/type-error", { message: "m", severity: "warning", data: { tsCode: 6133 } });
    expect(diag.severity).toBe("warning");
  });
});

describe("TcbInternalError", () => {
  test("is thrown when a node is resolved outside the scopes that declare it", () => {
    const template = parseTemplate("<input #box>{{box}}");
    const boundTarget = bindTemplate(template.nodes);
    const text = template.nodes[1];
    if (!text) throw new Error("expected a text node");

    let caught: unknown = null;
    try {
      generateTypeCheckBlock({
        id: "App",
        component: { name: "App", typeParameters: [], ref: { name: "App" } },
        boundTarget,
        nodes: [text],
        env: new Environment(resolveTypeCheckingConfig()),
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TcbInternalError);
    if (!(caught instanceof TcbInternalError)) return;
    expect(caught.code).toBe(TcbErrorCode.UNRESOLVED_NODE);
    expect(caught.message).toBe("Could not resolve reference '#box' in any scope");
  });
});
