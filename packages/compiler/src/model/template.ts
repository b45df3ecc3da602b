/* =======================================================================================
 * TEMPLATE AST
 * ---------------------------------------------------------------------------------------
 * Output of parsing/template-parser and input of the binder and the type-check block
 * generator. Nodes are compared by identity: the bound target and the scope indices
 * key their maps on node objects.
 * ======================================================================================= */

import type { AST, Interpolation } from "./expr.js";
import type { SourceSpan } from "./span.js";

export type BindingType = "property" | "attribute" | "class" | "style" | "animation" | "twoWay";

export type EventType = "regular" | "animation" | "twoWay";

export interface TmplTextAttribute {
  $kind: "TextAttribute";
  name: string;
  value: string;
  sourceSpan: SourceSpan;
  keySpan: SourceSpan;
  valueSpan: SourceSpan | null;
}

export interface TmplBoundAttribute {
  $kind: "BoundAttribute";
  name: string;
  type: BindingType;
  value: AST;
  /** Unit suffix of style bindings (`[style.width.px]`). */
  unit: string | null;
  sourceSpan: SourceSpan;
  keySpan: SourceSpan;
  valueSpan: SourceSpan | null;
}

export interface TmplBoundEvent {
  $kind: "BoundEvent";
  name: string;
  type: EventType;
  handler: AST;
  /** Global event target (`window:resize`). */
  target: string | null;
  /** Animation phase (`@fade.done`). */
  phase: string | null;
  sourceSpan: SourceSpan;
  handlerSpan: SourceSpan;
  keySpan: SourceSpan;
}

/** `let-name="value"` or a microsyntax `let` / `as` binding. */
export interface TmplVariable {
  $kind: "Variable";
  name: string;
  /** Context property; null reads `$implicit`. */
  value: string | null;
  sourceSpan: SourceSpan;
  keySpan: SourceSpan;
  valueSpan: SourceSpan | null;
}

/** `#name` / `#name="exportAs"` */
export interface TmplReference {
  $kind: "Reference";
  name: string;
  value: string;
  sourceSpan: SourceSpan;
  keySpan: SourceSpan;
  valueSpan: SourceSpan | null;
}

export interface TmplElement {
  $kind: "Element";
  name: string;
  attributes: TmplTextAttribute[];
  inputs: TmplBoundAttribute[];
  outputs: TmplBoundEvent[];
  references: TmplReference[];
  children: TmplNode[];
  sourceSpan: SourceSpan;
  startSourceSpan: SourceSpan;
  endSourceSpan: SourceSpan | null;
}

/** `<ng-template>` or the implicit template of a `*dir` attribute. */
export interface TmplTemplate {
  $kind: "Template";
  /** Host tag of an inline template, `ng-template` for an explicit one. */
  tagName: string;
  attributes: TmplTextAttribute[];
  inputs: TmplBoundAttribute[];
  outputs: TmplBoundEvent[];
  /** Bindings produced by a `*dir` microsyntax. */
  templateAttrs: (TmplBoundAttribute | TmplTextAttribute)[];
  references: TmplReference[];
  variables: TmplVariable[];
  children: TmplNode[];
  sourceSpan: SourceSpan;
  startSourceSpan: SourceSpan;
  endSourceSpan: SourceSpan | null;
}

export interface TmplBoundText {
  $kind: "BoundText";
  value: Interpolation;
  sourceSpan: SourceSpan;
}

export interface TmplText {
  $kind: "Text";
  value: string;
  sourceSpan: SourceSpan;
}

/** `<ng-content>`; children are fallback content. */
export interface TmplContent {
  $kind: "Content";
  selector: string;
  attributes: TmplTextAttribute[];
  children: TmplNode[];
  sourceSpan: SourceSpan;
}

export type TmplNode = TmplElement | TmplTemplate | TmplBoundText | TmplText | TmplContent;

export type TmplHostNode = TmplElement | TmplTemplate;

/** Anything `Scope.resolve` can be asked about. */
export type TmplScopedNode = TmplElement | TmplTemplate | TmplVariable | TmplReference;

export type TmplBinding = TmplBoundAttribute | TmplBoundEvent | TmplTextAttribute;

export function isHostNode(node: TmplNode): node is TmplHostNode {
  return node.$kind === "Element" || node.$kind === "Template";
}
