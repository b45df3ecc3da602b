/* =======================================================================================
 * SCOPE
 * ---------------------------------------------------------------------------------------
 * One scope per template body (plus the root). Building a scope only queues ops and
 * indexes which op declares each element, variable, reference, template context and
 * directive instance. `render()` runs the queue; `resolve()` runs the op behind a node
 * on demand, walking to parent scopes when the node is declared further out.
 *
 * Each op slot moves pending → executing → resolved. While executing, the slot holds
 * the op's circular fallback so a re-entrant lookup terminates.
 * ======================================================================================= */

import type { DirectiveMeta } from "../model/directive.js";
import type {
  TmplElement,
  TmplHostNode,
  TmplNode,
  TmplReference,
  TmplScopedNode,
  TmplTemplate,
  TmplVariable,
} from "../model/template.js";
import { TcbErrorCode, TcbInternalError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { expression, expressionStatement, type Expression, type Identifier, type Statement } from "./code.js";
import type { Context } from "./context.js";
import { circularFallback, executeOp, isOptionalOp, type TcbOp } from "./ops.js";

type OpSlot =
  | { state: "pending"; op: TcbOp }
  | { state: "executing"; fallback: TcbOp | Identifier }
  | { state: "resolved"; value: Identifier | null };

export class Scope {
  private readonly slots: OpSlot[] = [];
  private readonly elementOpMap = new Map<TmplElement, number>();
  /** Host node → directive → index of the op declaring its instance. */
  private readonly directiveOpMap = new Map<TmplHostNode, Map<DirectiveMeta, number>>();
  private readonly referenceOpMap = new Map<TmplReference, number>();
  private readonly templateCtxOpMap = new Map<TmplTemplate, number>();
  private readonly varMap = new Map<TmplVariable, number>();
  private readonly statements: Statement[] = [];

  private constructor(
    private readonly ctx: Context,
    private readonly parent: Scope | null,
    private readonly guard: Expression | null,
  ) {}

  /**
   * Scope for `children`. With a `template`, its variables are declared here (first
   * declaration of a name wins, later ones are reported).
   */
  static forNodes(
    ctx: Context,
    parent: Scope | null,
    template: TmplTemplate | null,
    children: readonly TmplNode[],
    guard: Expression | null,
  ): Scope {
    const scope = new Scope(ctx, parent, guard);
    if (template) {
      const firstDecls = new Map<string, TmplVariable>();
      for (const variable of template.variables) {
        const first = firstDecls.get(variable.name);
        if (first) {
          ctx.oob.duplicateTemplateVar(ctx.id, variable, first);
          continue;
        }
        firstDecls.set(variable.name, variable);
        scope.varMap.set(variable, scope.queue({ kind: "template-variable", template, variable }));
      }
    }
    for (const node of children) scope.appendNode(node);
    return scope;
  }

  /** Scope for the body of `template`, nested in this one. */
  childScope(template: TmplTemplate, guard: Expression | null): Scope {
    return Scope.forNodes(this.ctx, this, template, template.children, guard);
  }

  /**
   * Identifier declared for `node`: the element variable, the template context, the
   * variable or reference, or with `directive` that directive's instance on the node.
   */
  resolve(node: TmplScopedNode, directive?: DirectiveMeta): Identifier {
    const local = this.resolveLocal(node, directive);
    if (local) return local;
    if (this.parent) return this.parent.resolve(node, directive);
    throw new TcbInternalError(`Could not resolve ${describe(node)} in any scope`, TcbErrorCode.UNRESOLVED_NODE, {
      node: describe(node),
      directive: directive?.name,
    });
  }

  addStatement(stmt: Statement | Expression): void {
    this.statements.push(stmt.$kind === "Statement" ? stmt : expressionStatement(stmt));
  }

  /** Run every queued op; optional ones only when the full type checker is enabled. */
  render(): Statement[] {
    const skipOptional = !this.ctx.env.config.enableTemplateTypeChecker;
    for (let i = 0; i < this.slots.length; i++) this.executeOp(i, skipOptional);
    debug.scope("render", { ops: this.slots.length, statements: this.statements.length });
    return this.statements;
  }

  /** Guards of this scope and its ancestors joined by `&&`; null when unguarded. */
  guards(): Expression | null {
    const parentGuards = this.parent?.guards() ?? null;
    if (!this.guard) return parentGuards;
    if (!parentGuards) return this.guard;
    const own = this.guard;
    return expression((b) => b.append(parentGuards).append(" && ").append(own));
  }

  // ------------------------------------------------------------------------------------------
  // Lookup
  // ------------------------------------------------------------------------------------------

  private resolveLocal(node: TmplScopedNode, directive?: DirectiveMeta): Identifier | null {
    if (node.$kind === "Reference") {
      const index = this.referenceOpMap.get(node);
      return index === undefined ? null : this.resolveOp(index);
    }
    if (node.$kind === "Variable") {
      const index = this.varMap.get(node);
      return index === undefined ? null : this.resolveOp(index);
    }
    if (node.$kind === "Template" && !directive) {
      const index = this.templateCtxOpMap.get(node);
      if (index !== undefined) return this.resolveOp(index);
    }
    if (directive) {
      const index = this.directiveOpMap.get(node)?.get(directive);
      return index === undefined ? null : this.resolveOp(index);
    }
    if (node.$kind === "Element") {
      const index = this.elementOpMap.get(node);
      if (index !== undefined) return this.resolveOp(index);
    }
    return null;
  }

  private resolveOp(index: number): Identifier {
    const id = this.executeOp(index, false);
    if (!id) {
      throw new TcbInternalError(`Op #${index} declared no identifier`, TcbErrorCode.EMPTY_OP_RESULT, { index });
    }
    return id;
  }

  private executeOp(index: number, skipOptional: boolean): Identifier | null {
    const slot = this.slots[index];
    if (!slot) {
      throw new TcbInternalError(`No op at index ${index}`, TcbErrorCode.EMPTY_OP_RESULT, { index });
    }
    switch (slot.state) {
      case "resolved":
        return slot.value;
      case "executing": {
        if ("$kind" in slot.fallback) return slot.fallback;
        const fallbackOp = slot.fallback;
        debug.scope("op.circular", { index, fallback: fallbackOp.kind });
        // The fallback op runs once; later re-entries reuse its identifier.
        this.slots[index] = { state: "executing", fallback: circularFallback(fallbackOp) };
        const value = executeOp(fallbackOp, this.ctx, this);
        if (value) this.slots[index] = { state: "executing", fallback: value };
        return value;
      }
      case "pending": {
        if (skipOptional && isOptionalOp(slot.op)) return null;
        this.slots[index] = { state: "executing", fallback: circularFallback(slot.op) };
        const value = executeOp(slot.op, this.ctx, this);
        this.slots[index] = { state: "resolved", value };
        return value;
      }
    }
  }

  // ------------------------------------------------------------------------------------------
  // Building
  // ------------------------------------------------------------------------------------------

  private queue(op: TcbOp): number {
    return this.slots.push({ state: "pending", op }) - 1;
  }

  private appendNode(node: TmplNode): void {
    switch (node.$kind) {
      case "Element":
        this.elementOpMap.set(node, this.queue({ kind: "element", element: node }));
        this.appendContentProjectionCheck(node);
        this.appendDirectivesAndInputsOfNode(node);
        this.appendOutputsOfNode(node);
        for (const child of node.children) this.appendNode(child);
        this.checkAndAppendReferencesOfNode(node);
        return;
      case "Template":
        this.appendDirectivesAndInputsOfNode(node);
        this.appendOutputsOfNode(node);
        this.templateCtxOpMap.set(node, this.queue({ kind: "template-context" }));
        if (this.ctx.env.config.checkTemplateBodies) {
          this.queue({ kind: "template-body", template: node });
        }
        this.checkAndAppendReferencesOfNode(node);
        return;
      case "BoundText":
        this.queue({ kind: "expression", expression: node.value });
        return;
      case "Content":
        for (const child of node.children) this.appendNode(child);
        return;
      case "Text":
        return;
    }
  }

  private checkAndAppendReferencesOfNode(node: TmplHostNode): void {
    for (const ref of node.references) {
      const target = this.ctx.boundTarget.getReferenceTarget(ref);
      let index: number;
      if (!target) {
        this.ctx.oob.missingReferenceTarget(this.ctx.id, ref);
        index = this.queue({ kind: "invalid-reference" });
      } else {
        index = this.queue({ kind: "reference", reference: ref, host: node, target });
      }
      this.referenceOpMap.set(ref, index);
    }
  }

  private appendDirectivesAndInputsOfNode(node: TmplHostNode): void {
    const directives = this.ctx.boundTarget.getDirectivesOfNode(node);
    if (directives.length === 0) {
      if (node.$kind === "Element") {
        this.queue({ kind: "unclaimed-inputs", element: node, claimedInputs: new Set() });
      }
      return;
    }

    if (node.$kind === "Element") this.checkDeferredEagerness(node, directives);

    const config = this.ctx.env.config;
    const dirMap = new Map<DirectiveMeta, number>();
    for (const dir of directives) {
      let op: TcbOp;
      if (!dir.isGeneric) {
        op = { kind: "non-generic-directive-type", node, dir };
      } else if (!dir.requiresInlineTypeCtor || config.useInlineTypeConstructors) {
        op = { kind: "directive-ctor", node, dir };
      } else {
        op = { kind: "generic-directive-type-any-params", node, dir };
      }
      dirMap.set(dir, this.queue(op));
      this.queue({ kind: "directive-inputs", node, dir });
    }
    this.directiveOpMap.set(node, dirMap);

    if (node.$kind === "Element") {
      const claimedInputs = new Set<string>();
      for (const dir of directives) {
        for (const input of dir.inputs) claimedInputs.add(input.bindingPropertyName);
      }
      this.queue({ kind: "unclaimed-inputs", element: node, claimedInputs });
    }
  }

  private appendOutputsOfNode(node: TmplHostNode): void {
    const directives = this.ctx.boundTarget.getDirectivesOfNode(node);
    if (directives.length === 0) {
      if (node.$kind === "Element") {
        this.queue({ kind: "unclaimed-outputs", element: node, claimedOutputs: new Set() });
      }
      return;
    }
    for (const dir of directives) this.queue({ kind: "directive-outputs", node, dir });

    if (node.$kind === "Element") {
      const claimedOutputs = new Set<string>();
      for (const dir of directives) {
        for (const output of dir.outputs) claimedOutputs.add(output.bindingPropertyName);
      }
      this.queue({ kind: "unclaimed-outputs", element: node, claimedOutputs });
    }
  }

  private checkDeferredEagerness(element: TmplElement, directives: readonly DirectiveMeta[]): void {
    if (this.ctx.boundTarget.isDeferred(element)) return;
    for (const dir of directives) {
      if (this.ctx.env.isExplicitlyDeferred(dir)) {
        this.ctx.oob.deferredComponentUsedEagerly(this.ctx.id, element, dir.name);
      }
    }
  }

  /**
   * Control-flow blocks are not modelled, so nothing can keep children from being
   * projected; the check only records that it ran.
   */
  private appendContentProjectionCheck(element: TmplElement): void {
    if (this.ctx.env.config.controlFlowPreventingContentProjection === "suppress") return;
    const component = this.ctx.boundTarget.getDirectivesOfNode(element).find((d) => d.isComponent);
    const selectors = component?.ngContentSelectors;
    if (!component || !selectors) return;
    if (selectors.length > 1 || (selectors.length === 1 && selectors[0] !== "*")) {
      debug.scope("content-projection.checked", { element: element.name, component: component.name });
    }
  }
}

function describe(node: TmplScopedNode): string {
  switch (node.$kind) {
    case "Element":
      return `element <${node.name}>`;
    case "Template":
      return `template <${node.tagName}>`;
    case "Variable":
      return `variable '${node.name}'`;
    case "Reference":
      return `reference '#${node.name}'`;
  }
}
