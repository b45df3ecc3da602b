/* =======================================================================================
 * BIND (template → BoundTarget)
 * ---------------------------------------------------------------------------------------
 * - Match directives on elements and templates by selector
 * - Resolve `#ref` targets (component, exportAs, element, template)
 * - Map each unqualified read/write to the template variable or reference it names
 * - Record the consumer of every binding and the pipes in use
 *
 * Scopes: the root template and every Template node. A scope declares the template's
 * variables first, then the references of its descendants outside nested templates;
 * the first declaration of a name wins. References on a Template belong to the
 * enclosing scope. `this.name` resolves exactly like `name`.
 * ======================================================================================= */

import type { AST, PropertyRead, PropertyWrite } from "../model/expr.js";
import { forEachChild, isImplicitOrThis } from "../model/expr.js";
import type { DirectiveMeta, PipeMeta } from "../model/directive.js";
import { hasInput, hasOutput } from "../model/directive.js";
import type {
  TmplBinding,
  TmplBoundAttribute,
  TmplBoundEvent,
  TmplHostNode,
  TmplNode,
  TmplReference,
  TmplTemplate,
  TmplTextAttribute,
} from "../model/template.js";
import { debug } from "../shared/debug.js";
import { NOOP_TRACE, TraceAttributes, type CompileTrace } from "../shared/trace.js";
import type {
  BindingConsumer,
  BoundTarget,
  ExpressionTarget,
  ReferenceTarget,
} from "./bound-target.js";
import { NG_TEMPLATE } from "../parsing/template-parser.js";
import { matchesSelector, type MatchTarget } from "./selector.js";

export interface BindTemplateOptions {
  directives?: readonly DirectiveMeta[];
  pipes?: readonly PipeMeta[];
  trace?: CompileTrace;
}

export function bindTemplate(nodes: readonly TmplNode[], options: BindTemplateOptions = {}): BoundTarget {
  const trace = options.trace ?? NOOP_TRACE;
  return trace.span("bind.template", () => {
    const binder = new TemplateBinder(options.directives ?? [], options.pipes ?? []);
    binder.bindRoot(nodes);
    trace.setAttributes({
      [TraceAttributes.DIRECTIVE_MATCHES]: binder.usedDirectives.size,
      [TraceAttributes.NODE_COUNT]: nodes.length,
    });
    return binder.toBoundTarget(nodes);
  });
}

/** Attribute map used for selector matching. */
export function matchTargetOf(node: TmplHostNode): MatchTarget {
  const attrs = new Map<string, string>();
  if (node.$kind === "Template" && node.tagName !== NG_TEMPLATE) {
    for (const attr of node.templateAttrs) attrs.set(attr.name, "");
    return { element: NG_TEMPLATE, attrs };
  }
  for (const attr of node.attributes) attrs.set(attr.name, attr.value);
  for (const input of node.inputs) {
    if (input.type === "property" || input.type === "twoWay") attrs.set(input.name, "");
  }
  for (const output of node.outputs) attrs.set(output.name, "");
  return { element: node.$kind === "Element" ? node.name : NG_TEMPLATE, attrs };
}

class LexicalScope {
  readonly symbols = new Map<string, ExpressionTarget>();

  constructor(readonly parent: LexicalScope | null) {}

  declare(name: string, target: ExpressionTarget): void {
    if (!this.symbols.has(name)) this.symbols.set(name, target);
  }

  lookup(name: string): ExpressionTarget | null {
    return this.symbols.get(name) ?? this.parent?.lookup(name) ?? null;
  }
}

class TemplateBinder {
  readonly directivesByNode = new Map<TmplHostNode, DirectiveMeta[]>();
  readonly referenceTargets = new Map<TmplReference, ReferenceTarget | null>();
  readonly expressionTargets = new Map<PropertyRead | PropertyWrite, ExpressionTarget>();
  readonly consumers = new Map<TmplBinding, BindingConsumer>();
  readonly usedDirectives = new Set<DirectiveMeta>();
  readonly usedPipes = new Set<string>();
  private readonly pipesByName: ReadonlyMap<string, PipeMeta>;

  constructor(
    private readonly directives: readonly DirectiveMeta[],
    pipes: readonly PipeMeta[],
  ) {
    this.pipesByName = new Map(pipes.map((p) => [p.name, p]));
  }

  bindRoot(nodes: readonly TmplNode[]): void {
    for (const node of nodes) this.matchNode(node);
    const root = new LexicalScope(null);
    this.declareReferences(nodes, root);
    for (const node of nodes) this.visitNode(node, root);
  }

  toBoundTarget(nodes: readonly TmplNode[]): BoundTarget {
    const { directivesByNode, referenceTargets, expressionTargets, consumers, pipesByName } = this;
    const usedDirectives = [...this.usedDirectives];
    const usedPipes = [...this.usedPipes];
    return {
      nodes,
      getDirectivesOfNode: (node) => directivesByNode.get(node) ?? [],
      getReferenceTarget: (ref) => referenceTargets.get(ref) ?? null,
      getExpressionTarget: (ast) => expressionTargets.get(ast) ?? null,
      getConsumerOfBinding: (binding) => consumers.get(binding) ?? null,
      getPipe: (name) => pipesByName.get(name) ?? null,
      isDeferred: () => false,
      getUsedDirectives: () => usedDirectives,
      getUsedPipes: () => usedPipes,
    };
  }

  // ------------------------------------------------------------------------------------------
  // Directive matching, reference targets and binding consumers
  // ------------------------------------------------------------------------------------------

  private matchNode(node: TmplNode): void {
    if (node.$kind === "Element" || node.$kind === "Template") {
      const target = matchTargetOf(node);
      const matched = this.directives.filter((dir) => dir.selector !== null && matchesSelector(dir.selector, target));
      // Components first.
      matched.sort((a, b) => Number(b.isComponent) - Number(a.isComponent));
      this.directivesByNode.set(node, matched);
      for (const dir of matched) this.usedDirectives.add(dir);
      if (matched.length > 0) {
        debug.bind("directives.matched", { node: target.element, directives: matched.map((d) => d.name) });
      }
      this.resolveReferences(node, matched);
      this.recordConsumers(node, matched);
    }
    if ("children" in node) {
      for (const child of node.children) this.matchNode(child);
    }
  }

  private resolveReferences(node: TmplHostNode, matched: readonly DirectiveMeta[]): void {
    for (const ref of node.references) {
      let target: ReferenceTarget | null;
      if (ref.value.trim() === "") {
        target = matched.find((d) => d.isComponent) ?? node;
      } else {
        target = matched.find((d) => d.exportAs?.includes(ref.value.trim()) ?? false) ?? null;
      }
      if (!target) debug.bind("reference.unresolved", { name: ref.name, value: ref.value });
      this.referenceTargets.set(ref, target);
    }
  }

  private recordConsumers(node: TmplHostNode, matched: readonly DirectiveMeta[]): void {
    const inputs: (TmplBoundAttribute | TmplTextAttribute)[] = [...node.inputs, ...node.attributes];
    if (node.$kind === "Template") inputs.push(...node.templateAttrs);
    for (const input of inputs) {
      this.consumers.set(input, matched.find((d) => hasInput(d, input.name)) ?? node);
    }
    for (const output of node.outputs) {
      this.consumers.set(output, matched.find((d) => hasOutput(d, output.name)) ?? node);
    }
  }

  // ------------------------------------------------------------------------------------------
  // Lexical scopes
  // ------------------------------------------------------------------------------------------

  /** Declare references of `nodes` and their descendants, stopping at nested templates. */
  private declareReferences(nodes: readonly TmplNode[], scope: LexicalScope): void {
    for (const node of nodes) {
      if (node.$kind === "Element" || node.$kind === "Template") {
        for (const ref of node.references) scope.declare(ref.name, ref);
      }
      if (node.$kind === "Element" || node.$kind === "Content") {
        this.declareReferences(node.children, scope);
      }
    }
  }

  private visitNode(node: TmplNode, scope: LexicalScope): void {
    switch (node.$kind) {
      case "Element":
        this.visitBindings(node.inputs, node.outputs, scope);
        for (const child of node.children) this.visitNode(child, scope);
        return;
      case "Template":
        this.visitBindings([...node.inputs, ...node.templateAttrs], node.outputs, scope);
        this.visitTemplateBody(node, scope);
        return;
      case "BoundText":
        this.visitExpression(node.value, scope);
        return;
      case "Content":
        for (const child of node.children) this.visitNode(child, scope);
        return;
      case "Text":
        return;
    }
  }

  private visitTemplateBody(template: TmplTemplate, parent: LexicalScope): void {
    const scope = new LexicalScope(parent);
    for (const variable of template.variables) scope.declare(variable.name, variable);
    this.declareReferences(template.children, scope);
    for (const child of template.children) this.visitNode(child, scope);
  }

  private visitBindings(
    inputs: readonly (TmplBoundAttribute | TmplTextAttribute)[],
    outputs: readonly TmplBoundEvent[],
    scope: LexicalScope,
  ): void {
    for (const input of inputs) {
      if (input.$kind === "BoundAttribute") this.visitExpression(input.value, scope);
    }
    for (const output of outputs) this.visitExpression(output.handler, scope);
  }

  private visitExpression(ast: AST, scope: LexicalScope): void {
    if ((ast.$kind === "PropertyRead" || ast.$kind === "PropertyWrite") && isImplicitOrThis(ast.receiver)) {
      const target = scope.lookup(ast.name);
      if (target) this.expressionTargets.set(ast, target);
    } else if (ast.$kind === "Pipe") {
      this.usedPipes.add(ast.name);
    }
    forEachChild(ast, (child) => this.visitExpression(child, scope));
  }
}
