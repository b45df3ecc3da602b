/* =======================================================================================
 * OUT-OF-BAND DIAGNOSTICS
 * ---------------------------------------------------------------------------------------
 * Template problems noticed while generating a block, before TypeScript ever sees it.
 * Each problem is recorded once per template id and source range, however often the
 * generator walks over it.
 * ======================================================================================= */

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { Pipe } from "../model/expr.js";
import type { TmplBoundAttribute, TmplBoundEvent, TmplElement, TmplReference, TmplVariable } from "../model/template.js";
import type { SourceSpan } from "../model/span.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { typecheckDiagnostics } from "../diagnostics/catalog/typecheck.js";
import { isDirectiveTarget, type BindingConsumer } from "../binding/bound-target.js";
import { debug } from "../shared/debug.js";

export class OutOfBandDiagnosticRecorder {
  private readonly emitter = createDiagnosticEmitter(typecheckDiagnostics, { stage: "tcb" });
  private readonly recorded: CompilerDiagnostic[] = [];
  private readonly seen = new Set<string>();

  get diagnostics(): readonly CompilerDiagnostic[] {
    return this.recorded;
  }

  missingPipe(templateId: string, ast: Pipe): void {
    if (!this.claim(templateId, "tcb/missing-pipe", ast.nameSpan)) return;
    this.push(
      this.emitter.emit("tcb/missing-pipe", {
        message: `No pipe found with name '${ast.name}'.`,
        span: ast.nameSpan,
        data: { name: ast.name },
      }),
    );
  }

  missingReferenceTarget(templateId: string, ref: TmplReference): void {
    const span = ref.valueSpan ?? ref.sourceSpan;
    if (!this.claim(templateId, "tcb/missing-reference-target", span)) return;
    this.push(
      this.emitter.emit("tcb/missing-reference-target", {
        message: `No directive found with exportAs '${ref.value}'.`,
        span,
        data: { name: ref.name, value: ref.value },
      }),
    );
  }

  duplicateTemplateVar(templateId: string, variable: TmplVariable, firstDecl: TmplVariable): void {
    if (!this.claim(templateId, "tcb/duplicate-template-var", variable.sourceSpan)) return;
    this.push(
      this.emitter.emit("tcb/duplicate-template-var", {
        message: `Cannot redeclare variable '${variable.name}' as it was previously declared elsewhere for the same template.`,
        span: variable.sourceSpan,
        related: [{ message: `'${firstDecl.name}' is first declared here.`, span: firstDecl.sourceSpan }],
        data: { name: variable.name },
      }),
    );
  }

  deferredComponentUsedEagerly(templateId: string, element: TmplElement, directive: string): void {
    if (!this.claim(templateId, "tcb/deferred-directive-used-eagerly", element.startSourceSpan)) return;
    this.push(
      this.emitter.emit("tcb/deferred-directive-used-eagerly", {
        message: `Element '${element.name}' uses deferred directive '${directive}' outside a deferred block.`,
        span: element.startSourceSpan,
        data: { directive },
      }),
    );
  }

  splitTwoWayBinding(
    templateId: string,
    input: TmplBoundAttribute,
    output: TmplBoundEvent,
    inputConsumer: BindingConsumer,
    outputConsumer: BindingConsumer,
  ): void {
    if (!this.claim(templateId, "tcb/split-two-way-binding", input.keySpan)) return;
    const outputName = consumerName(outputConsumer);
    this.push(
      this.emitter.emit("tcb/split-two-way-binding", {
        message:
          `The property and event halves of the two-way binding '${input.name}' are not bound to the same target. ` +
          `'${input.name}' is consumed by '${consumerName(inputConsumer)}', '${output.name}' by '${outputName}'.`,
        span: input.keySpan,
        related: [{ message: `'${output.name}' is bound here.`, span: output.keySpan }],
        data: {
          input: input.name,
          output: output.name,
          inputConsumer: consumerName(inputConsumer),
          outputConsumer: outputName,
        },
      }),
    );
  }

  suboptimalTypeInference(templateId: string, directive: string, variables: readonly TmplVariable[]): void {
    const first = variables[0];
    if (!first) return;
    if (!this.claim(templateId, "tcb/suboptimal-type-inference", first.sourceSpan)) return;
    const names = variables.map((v) => v.name);
    this.push(
      this.emitter.emit("tcb/suboptimal-type-inference", {
        message:
          `Template variables ${names.map((n) => `'${n}'`).join(", ")} of '${directive}' are typed 'any' ` +
          `because template context guards are disabled.`,
        span: first.sourceSpan,
        data: { directive, variables: names },
      }),
    );
  }

  private claim(templateId: string, code: string, span: SourceSpan): boolean {
    const key = `${templateId}|${code}|${span.start}:${span.end}`;
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    return true;
  }

  private push(diagnostic: CompilerDiagnostic): void {
    debug.tcb("oob.recorded", { code: diagnostic.code, message: diagnostic.message });
    this.recorded.push(diagnostic);
  }
}

function consumerName(consumer: BindingConsumer): string {
  if (isDirectiveTarget(consumer)) return consumer.name;
  return consumer.$kind === "Element" ? `<${consumer.name}>` : `<${consumer.tagName}>`;
}
