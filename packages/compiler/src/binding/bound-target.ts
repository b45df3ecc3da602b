import type { PropertyRead, PropertyWrite } from "../model/expr.js";
import type { DirectiveMeta, PipeMeta } from "../model/directive.js";
import type {
  TmplBinding,
  TmplHostNode,
  TmplNode,
  TmplReference,
  TmplVariable,
} from "../model/template.js";

/** What a `#ref` points at: a directive instance on its host, or the host node itself. */
export type ReferenceTarget = DirectiveMeta | TmplHostNode;

/** Template symbol an unqualified read resolves to. */
export type ExpressionTarget = TmplVariable | TmplReference;

/** Who receives a binding: the directive that declares it, or the node itself. */
export type BindingConsumer = DirectiveMeta | TmplHostNode;

/**
 * Result of binding a template against the available directives and pipes.
 * Every query is keyed on node identity.
 */
export interface BoundTarget {
  readonly nodes: readonly TmplNode[];
  getDirectivesOfNode(node: TmplHostNode): readonly DirectiveMeta[];
  getReferenceTarget(ref: TmplReference): ReferenceTarget | null;
  getExpressionTarget(ast: PropertyRead | PropertyWrite): ExpressionTarget | null;
  getConsumerOfBinding(binding: TmplBinding): BindingConsumer | null;
  getPipe(name: string): PipeMeta | null;
  /** Whether the node sits inside a deferred block; templates have none. */
  isDeferred(node: TmplHostNode): boolean;
  getUsedDirectives(): readonly DirectiveMeta[];
  getUsedPipes(): readonly string[];
}

export function isDirectiveTarget(target: ReferenceTarget | BindingConsumer): target is DirectiveMeta {
  return !("$kind" in target);
}
