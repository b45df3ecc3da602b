/* =======================================================================================
 * TCB OPS
 * ---------------------------------------------------------------------------------------
 * A scope queues one op per piece of code it may emit. Ops run lazily: when something
 * needs the identifier an op declares, `Scope.resolve` runs it on demand; the rest run
 * in queue order during `Scope.render`. An op returns the identifier it declared, or
 * null when it only appends statements.
 *
 * Optional ops only declare things (an element variable, a directive instance) and are
 * skipped unless referenced or the full template type checker is enabled.
 *
 * An op that is re-entered while it runs is replaced by its circular fallback: the
 * directive constructor by a call with `null!` arguments, everything else by `null!`.
 * ======================================================================================= */

import type { DirectiveMeta, InputMeta } from "../model/directive.js";
import { inputOf, outputOf } from "../model/directive.js";
import { spanEquals } from "../model/span.js";
import type {
  TmplBoundAttribute,
  TmplBoundEvent,
  TmplElement,
  TmplHostNode,
  TmplReference,
  TmplTemplate,
  TmplTextAttribute,
  TmplVariable,
} from "../model/template.js";
import type { Interpolation } from "../model/expr.js";
import { isDirectiveTarget, type ReferenceTarget } from "../binding/bound-target.js";
import { assertUnreachable } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import {
  expression,
  expressionStatement,
  identifier,
  statement,
  text,
  type Expression,
  type Identifier,
} from "./code.js";
import type { Context } from "./context.js";
import { tcbCreateEventHandler, tcbExpression } from "./expression.js";
import { ATTR_TO_PROP, RuntimeSymbols } from "./runtime-symbols.js";
import type { Scope } from "./scope.js";
import { anyTypeArguments, quote, tsCastToAny, tsCreateVariable, tsDeclareVariable, tsPropertyAccess } from "./ts-util.js";
import { unwrapWritableSignal, widenBinding } from "./widen.js";

/* =======================================================================================
 * Op variants
 * ======================================================================================= */

export type TcbOp =
  | { kind: "element"; element: TmplElement }
  | { kind: "template-variable"; template: TmplTemplate; variable: TmplVariable }
  | { kind: "template-context" }
  | { kind: "template-body"; template: TmplTemplate }
  | { kind: "expression"; expression: Interpolation }
  | { kind: "non-generic-directive-type"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "generic-directive-type-any-params"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "directive-ctor"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "directive-ctor-circular-fallback"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "directive-inputs"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "directive-outputs"; node: TmplHostNode; dir: DirectiveMeta }
  | { kind: "unclaimed-inputs"; element: TmplElement; claimedInputs: ReadonlySet<string> }
  | { kind: "unclaimed-outputs"; element: TmplElement; claimedOutputs: ReadonlySet<string> }
  | { kind: "reference"; reference: TmplReference; host: TmplHostNode; target: ReferenceTarget }
  | { kind: "invalid-reference" };

export type TcbOpKind = TcbOp["kind"];

/** Stand-in for the value of an op that is still running. */
export const INFER_TYPE_FOR_CIRCULAR_OP_EXPR: Identifier = identifier("null!");

export function isOptionalOp(op: TcbOp): boolean {
  switch (op.kind) {
    case "element":
    case "template-context":
    case "non-generic-directive-type":
    case "generic-directive-type-any-params":
    case "directive-ctor":
    case "reference":
    case "invalid-reference":
      return true;
    default:
      return false;
  }
}

/** What a re-entered op yields instead: another op to run, or a ready identifier. */
export function circularFallback(op: TcbOp): TcbOp | Identifier {
  if (op.kind === "directive-ctor") return { kind: "directive-ctor-circular-fallback", node: op.node, dir: op.dir };
  return INFER_TYPE_FOR_CIRCULAR_OP_EXPR;
}

export function executeOp(op: TcbOp, ctx: Context, scope: Scope): Identifier | null {
  switch (op.kind) {
    case "element":
      return elementOp(op.element, ctx, scope);
    case "template-variable":
      return templateVariableOp(op.template, op.variable, ctx, scope);
    case "template-context":
      return templateContextOp(ctx, scope);
    case "template-body":
      return templateBodyOp(op.template, ctx, scope);
    case "expression":
      scope.addStatement(statement((b) => b.append(tcbExpression(op.expression, ctx, scope)).append(";")));
      return null;
    case "non-generic-directive-type":
    case "generic-directive-type-any-params":
      return directiveTypeOp(op.node, op.dir, ctx, scope);
    case "directive-ctor":
      return directiveCtorOp(op.node, op.dir, ctx, scope);
    case "directive-ctor-circular-fallback":
      return directiveCtorFallbackOp(op.dir, ctx, scope);
    case "directive-inputs":
      return directiveInputsOp(op.node, op.dir, ctx, scope);
    case "directive-outputs":
      return directiveOutputsOp(op.node, op.dir, ctx, scope);
    case "unclaimed-inputs":
      return unclaimedInputsOp(op.element, op.claimedInputs, ctx, scope);
    case "unclaimed-outputs":
      return unclaimedOutputsOp(op.element, op.claimedOutputs, ctx, scope);
    case "reference":
      return referenceOp(op.reference, op.host, op.target, ctx, scope);
    case "invalid-reference": {
      const id = ctx.allocateId();
      scope.addStatement(tsCreateVariable(id, "null as any"));
      return id;
    }
    default:
      return assertUnreachable(op, "tcb op");
  }
}

/* =======================================================================================
 * Elements, templates, text
 * ======================================================================================= */

/** `var _tN = document.createElement("tag");` */
function elementOp(element: TmplElement, ctx: Context, scope: Scope): Identifier {
  const id = ctx.allocateId(element.startSourceSpan);
  scope.addStatement(tsCreateVariable(id, `document.createElement(${quote(element.name)})`));
  return id;
}

/** `var _tN = ctx.name;` reading the variable from its template's context. */
function templateVariableOp(template: TmplTemplate, variable: TmplVariable, ctx: Context, scope: Scope): Identifier {
  const context = scope.resolve(template);
  const id = ctx.allocateId(variable.keySpan);
  const name = variable.value ?? "$implicit";
  scope.addStatement(tsCreateVariable(id, tsPropertyAccess(context, name, variable.valueSpan)));
  return id;
}

/** `var _tN: any = null!;` */
function templateContextOp(ctx: Context, scope: Scope): Identifier {
  const id = ctx.allocateId();
  scope.addStatement(statement((b) => b.append("var ").append(id).append(": any = null!;")));
  return id;
}

/**
 * Open a child scope for the template's children, guarded by the template guards of
 * the directives on it: `if (guard) { ... }`, or a bare block without guards.
 */
function templateBodyOp(template: TmplTemplate, ctx: Context, scope: Scope): null {
  const config = ctx.env.config;
  const directiveGuards: Expression[] = [];

  for (const dir of ctx.boundTarget.getDirectivesOfNode(template)) {
    const dirInstId = scope.resolve(template, dir);
    if (!dir.ref) continue;
    const dirId = ctx.env.reference(dir.ref);

    for (const guard of dir.templateGuards) {
      const boundInput = findGuardInput(template, guard.inputName);
      if (!boundInput) continue;
      const guardExpr = expression((b) => b.withIgnoreDiagnostics((inner) => inner.append(tcbExpression(boundInput.value, ctx, scope))));
      if (guard.type === "binding") {
        directiveGuards.push(guardExpr);
      } else {
        directiveGuards.push(
          expression((b) =>
            b
              .withSpan(boundInput.value.span, (call) => call.append(dirId).append(`.ngTemplateGuard_${guard.inputName}`))
              .append("(")
              .append(dirInstId)
              .append(", ")
              .append(guardExpr)
              .append(")"),
          ),
        );
      }
    }

    if (dir.hasTemplateContextGuard) {
      if (config.applyTemplateContextGuards) {
        const context = scope.resolve(template);
        directiveGuards.push(
          expression(
            (b) => b.append(dirId).append(".ngTemplateContextGuard(").append(dirInstId).append(", ").append(context).append(")"),
            { span: template.startSourceSpan },
          ),
        );
      } else if (template.variables.length > 0 && config.suggestionsForSuboptimalTypeInference) {
        ctx.oob.suboptimalTypeInference(ctx.id, dir.name, template.variables);
      }
    }
  }

  const guard =
    directiveGuards.length === 0
      ? null
      : expression((b) => b.appendJoined([...directiveGuards].reverse(), " && ", (g) => b.append(g)));

  const child = scope.childScope(template, guard);
  const statements = child.render();
  if (statements.length === 0) return null;

  scope.addStatement(
    statement((b) => {
      if (guard) b.append("if (").append(guard).append(") ");
      b.block((block) => {
        for (const stmt of statements) block.add(stmt);
      });
    }),
  );
  return null;
}

function findGuardInput(template: TmplTemplate, inputName: string): TmplBoundAttribute | null {
  const input = template.inputs.find((i) => i.name === inputName);
  if (input) return input;
  for (const attr of template.templateAttrs) {
    if (attr.$kind === "BoundAttribute" && attr.name === inputName) return attr;
  }
  return null;
}

/* =======================================================================================
 * Directives
 * ======================================================================================= */

/** `var _tN = null! as Dir<any, ...>;` */
function directiveTypeOp(node: TmplHostNode, dir: DirectiveMeta, ctx: Context, scope: Scope): Identifier {
  const id = ctx.allocateId(node.startSourceSpan, "directive");
  const ref = dir.ref;
  const type = ref
    ? expression((b) => b.append(ctx.env.reference(ref)).append(anyTypeArguments(dir.typeParameters.length)))
    : text("any");
  scope.addStatement(tsDeclareVariable(id, type));
  return id;
}

/**
 * `var _tN = _ctorK({"a": expr, "b": null as any});` letting TypeScript infer a generic
 * directive's type arguments from its bound inputs.
 */
function directiveCtorOp(node: TmplHostNode, dir: DirectiveMeta, ctx: Context, scope: Scope): Identifier {
  const config = ctx.env.config;
  const id = ctx.allocateId(node.startSourceSpan, "directive");
  const fields = new Map<string, Expression | null>();

  for (const attr of getBoundAttributes(dir, node)) {
    if (!config.checkTypeOfAttributes && attr.attribute.$kind === "TextAttribute") continue;
    for (const input of attr.inputs) {
      const field = input.classPropertyName;
      if (field === null || fields.has(field)) continue;
      let value = widenBinding(translateInput(attr.attribute, ctx, scope), config);
      if (input.isTwoWayBinding && config.allowSignalsInTwoWayBindings) value = unwrapWritableSignal(value, ctx.env);
      fields.set(field, value);
    }
  }
  for (const input of dir.inputs) {
    if (input.classPropertyName !== null && !fields.has(input.classPropertyName)) fields.set(input.classPropertyName, null);
  }

  const ctor = ctx.env.typeCtorFor(dir);
  const call = expression((b) =>
    b.withIgnoreDiagnostics((inner) => {
      inner.append(ctor).append("({");
      inner.appendJoined([...fields], ", ", ([field, value]) => {
        inner.append(`${quote(field)}: `).append(value ?? "null as any");
      });
      inner.append("})");
    }),
  );
  scope.addStatement(tsCreateVariable(id, call));
  return id;
}

/** `var _tN = _ctorK(null!);` for a constructor that refers back to itself. */
function directiveCtorFallbackOp(dir: DirectiveMeta, ctx: Context, scope: Scope): Identifier {
  const id = ctx.allocateId();
  const ctor = ctx.env.typeCtorFor(dir);
  scope.addStatement(tsCreateVariable(id, expression((b) => b.append(ctor).append("(null!)"))));
  return id;
}

/**
 * One statement per bound attribute assigning its value into every input it sets:
 * `dir.a = expr;`. Coerced inputs go through a temporary of the accepted type,
 * restricted fields through a temporary of the field type when access modifiers are
 * not honored, signal inputs through their write-type brand.
 */
function directiveInputsOp(node: TmplHostNode, dir: DirectiveMeta, ctx: Context, scope: Scope): null {
  const config = ctx.env.config;
  let dirId: Identifier | null = null;

  for (const attr of getBoundAttributes(dir, node)) {
    const expr = widenBinding(translateInput(attr.attribute, ctx, scope), config);
    let assignment: Expression = expr;

    for (const input of attr.inputs) {
      const field = input.classPropertyName;
      let target: Expression;

      if (field !== null && input.isCoerced && !input.isSignal) {
        const type = input.transformType ? ctx.env.referenceType(input.transformType) : coercedInputType(dir, field, ctx);
        const temp = ctx.allocateId();
        scope.addStatement(tsDeclareVariable(temp, type));
        target = expression((b) => b.append(temp, attr.attribute.keySpan));
      } else if (field === null) {
        continue;
      } else if (!config.honorAccessModifiersForInputBindings && input.isRestricted) {
        dirId ??= scope.resolve(node, dir);
        const instance = dirId;
        const temp = ctx.allocateId();
        scope.addStatement(
          tsDeclareVariable(temp, expression((b) => b.append("(typeof ").append(instance).append(`)[${quote(field)}]`))),
        );
        target = expression((b) => b.append(temp, attr.attribute.keySpan));
      } else {
        dirId ??= scope.resolve(node, dir);
        target = tsPropertyAccess(dirId, field, attr.attribute.keySpan);
      }

      if (input.isSignal) {
        const brand = ctx.env.referenceExternalSymbol(RuntimeSymbols.InputSignalBrandWriteType);
        const signalTarget = target;
        target = expression((b) => b.append(signalTarget).append("[").append(brand).append("]"));
      }
      if (input.isTwoWayBinding && config.allowSignalsInTwoWayBindings) {
        assignment = unwrapWritableSignal(assignment, ctx.env);
      }
      const assigned = assignment;
      const assignTarget = target;
      assignment = expression((b) => b.append(assignTarget).append(" = ").append(assigned));
    }

    if (!config.checkTypeOfAttributes && attr.attribute.$kind === "TextAttribute") {
      const unchecked = assignment;
      assignment = expression((b) => b.withIgnoreDiagnostics((inner) => inner.append(unchecked)));
    }
    scope.addStatement(expressionStatement(assignment));
  }
  return null;
}

/**
 * Subscribe to each output the directive declares: `dir["out"].subscribe(handler);`
 * with output checking, otherwise the field and an `any`-typed handler.
 */
function directiveOutputsOp(node: TmplHostNode, dir: DirectiveMeta, ctx: Context, scope: Scope): null {
  const config = ctx.env.config;
  let dirId: Identifier | null = null;

  for (const output of node.outputs) {
    const meta = output.type === "animation" ? null : outputOf(dir, output.name);
    if (!meta) continue;
    if (config.checkTypeOfOutputEvents && output.name.endsWith("Change")) {
      isSplitTwoWayBinding(output.name.slice(0, -"Change".length), output, node.inputs, ctx);
    }
    dirId ??= scope.resolve(node, dir);
    const instance = dirId;
    const field = expression((b) => b.append(instance).append(`[${quote(meta.classPropertyName)}]`, output.keySpan));

    if (config.checkTypeOfOutputEvents) {
      const handler = tcbCreateEventHandler(output, ctx, scope, "infer");
      scope.addStatement(statement((b) => b.append(field).append(".subscribe(").append(handler).append(");")));
    } else {
      scope.addStatement(expressionStatement(field));
      scope.addStatement(expressionStatement(tcbCreateEventHandler(output, ctx, scope, "any")));
    }
  }
  return null;
}

/* =======================================================================================
 * Bindings no directive claims
 * ======================================================================================= */

/**
 * Check bindings no directive consumes. With DOM binding checks a property binding is
 * assigned into the element (`el["prop"] = expr;`); otherwise the expression is only
 * checked on its own.
 */
function unclaimedInputsOp(
  element: TmplElement,
  claimedInputs: ReadonlySet<string>,
  ctx: Context,
  scope: Scope,
): null {
  const config = ctx.env.config;
  let elId: Identifier | null = null;

  for (const binding of element.inputs) {
    const isPropertyBinding = binding.type === "property" || binding.type === "twoWay";
    if (isPropertyBinding && claimedInputs.has(binding.name)) continue;
    const expr = widenBinding(tcbExpression(binding.value, ctx, scope), config);

    if (config.checkTypeOfDomBindings && isPropertyBinding) {
      if (binding.name !== "style" && binding.name !== "class") {
        elId ??= scope.resolve(element);
        const el = elId;
        const propertyName = ATTR_TO_PROP.get(binding.name) ?? binding.name;
        scope.addStatement(
          statement((b) =>
            b.append(el).append("[").append(quote(propertyName), binding.keySpan).append("] = ").append(expr).append(";"),
          ),
        );
      } else {
        scope.addStatement(expressionStatement(expr));
      }
    } else {
      scope.addStatement(expressionStatement(expr));
    }
  }
  return null;
}

/**
 * Event bindings no directive consumes: animation callbacks, DOM listeners through
 * `addEventListener` with DOM event checks, otherwise `any`-typed handlers.
 */
function unclaimedOutputsOp(
  element: TmplElement,
  claimedOutputs: ReadonlySet<string>,
  ctx: Context,
  scope: Scope,
): null {
  const config = ctx.env.config;
  let elId: Identifier | null = null;

  for (const output of element.outputs) {
    if (claimedOutputs.has(output.name)) continue;
    if (
      config.checkTypeOfOutputEvents &&
      output.name.endsWith("Change") &&
      isSplitTwoWayBinding(output.name.slice(0, -"Change".length), output, element.inputs, ctx)
    ) {
      continue;
    }

    if (output.type === "animation") {
      const eventType = config.checkTypeOfAnimationEvents
        ? ctx.env.referenceExternalType(RuntimeSymbols.AnimationEvent)
        : "any";
      scope.addStatement(expressionStatement(tcbCreateEventHandler(output, ctx, scope, eventType)));
    } else if (config.checkTypeOfDomEvents) {
      const handler = tcbCreateEventHandler(output, ctx, scope, "infer");
      elId ??= scope.resolve(element);
      const el = elId;
      scope.addStatement(
        statement((b) =>
          b
            .append(el)
            .append(".addEventListener(")
            .append(quote(output.name), output.keySpan)
            .append(", ")
            .append(handler)
            .append(");"),
        ),
      );
    } else {
      scope.addStatement(expressionStatement(tcbCreateEventHandler(output, ctx, scope, "any")));
    }
  }
  return null;
}

/**
 * A two-way binding whose `[x]` half is consumed by a directive while its `(xChange)`
 * half goes to the element or to a different directive. Reported once; the event half
 * is then left unchecked.
 */
function isSplitTwoWayBinding(
  inputName: string,
  output: TmplBoundEvent,
  inputs: readonly TmplBoundAttribute[],
  ctx: Context,
): boolean {
  const input = inputs.find((i) => i.name === inputName);
  if (!input || !spanEquals(input.sourceSpan, output.sourceSpan)) return false;

  const inputConsumer = ctx.boundTarget.getConsumerOfBinding(input);
  const outputConsumer = ctx.boundTarget.getConsumerOfBinding(output);
  if (!inputConsumer || !isDirectiveTarget(inputConsumer)) return false;
  if (!outputConsumer || (!isDirectiveTarget(outputConsumer) && outputConsumer.$kind === "Template")) return false;

  if (!isDirectiveTarget(outputConsumer) || outputConsumer !== inputConsumer) {
    ctx.oob.splitTwoWayBinding(ctx.id, input, output, inputConsumer, outputConsumer);
    debug.tcb("two-way.split", { input: input.name, output: output.name });
    return true;
  }
  return false;
}

/* =======================================================================================
 * References
 * ======================================================================================= */

/**
 * `var _tN = <target>;` with the reference typed `any` unless references of that kind
 * are checked, and a template reference typed as `TemplateRef<any>`.
 */
function referenceOp(
  reference: TmplReference,
  host: TmplHostNode,
  target: ReferenceTarget,
  ctx: Context,
  scope: Scope,
): Identifier {
  const config = ctx.env.config;
  const id = ctx.allocateId(reference.keySpan);
  const resolved = isDirectiveTarget(target) ? scope.resolve(host, target) : scope.resolve(target);
  const value = expression((b) => b.append(resolved, reference.valueSpan));

  let initializer: Expression;
  if (
    (!isDirectiveTarget(target) && target.$kind === "Element" && !config.checkTypeOfDomReferences) ||
    !config.checkTypeOfNonDomReferences
  ) {
    initializer = tsCastToAny(value);
  } else if (!isDirectiveTarget(target) && target.$kind === "Template") {
    const templateRef = ctx.env.referenceExternalType(RuntimeSymbols.TemplateRef);
    initializer = expression((b) => b.append("(").append(value).append(" as any as ").append(templateRef).append("<any>)"));
  } else {
    initializer = value;
  }
  scope.addStatement(tsCreateVariable(id, initializer));
  return id;
}

/* =======================================================================================
 * Bound attributes
 * ======================================================================================= */

export interface TcbDirectiveInput extends InputMeta {
  isTwoWayBinding: boolean;
}

export interface TcbBoundAttribute {
  attribute: TmplBoundAttribute | TmplTextAttribute;
  inputs: TcbDirectiveInput[];
}

/**
 * Attributes of `node` that set an input of `dir`: property and two-way bindings,
 * static attributes, and for an inline template its microsyntax bindings.
 */
export function getBoundAttributes(dir: DirectiveMeta, node: TmplHostNode): TcbBoundAttribute[] {
  const result: TcbBoundAttribute[] = [];
  const process = (attr: TmplBoundAttribute | TmplTextAttribute): void => {
    if (attr.$kind === "BoundAttribute" && attr.type !== "property" && attr.type !== "twoWay") return;
    const input = inputOf(dir, attr.name);
    if (!input) return;
    const isTwoWayBinding = attr.$kind === "BoundAttribute" && attr.type === "twoWay";
    result.push({ attribute: attr, inputs: [{ ...input, isTwoWayBinding }] });
  };
  node.inputs.forEach(process);
  node.attributes.forEach(process);
  if (node.$kind === "Template") node.templateAttrs.forEach(process);
  return result;
}

/** `typeof Dir.ngAcceptInputType_<field>` */
function coercedInputType(dir: DirectiveMeta, field: string, ctx: Context): Expression {
  const ref = dir.ref;
  if (!ref) return text("any");
  return expression((b) => b.append("typeof ").append(ctx.env.reference(ref)).append(`.ngAcceptInputType_${field}`));
}

/** Bound value of an attribute; a static attribute is its string literal. */
function translateInput(attr: TmplBoundAttribute | TmplTextAttribute, ctx: Context, scope: Scope): Expression {
  if (attr.$kind === "BoundAttribute") return tcbExpression(attr.value, ctx, scope);
  return text(quote(attr.value), attr.valueSpan ?? attr.sourceSpan);
}
