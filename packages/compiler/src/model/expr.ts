/* =======================================================================================
 * EXPRESSION AST
 * ---------------------------------------------------------------------------------------
 * Binding / action / interpolation expressions as produced by parsing/expression-parser.
 * Every node carries an absolute `span` into the template file; named accesses also
 * carry `nameSpan` so diagnostics on members land on the member name.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type BinaryOperator =
  | "&&" | "||" | "??"
  | "==" | "===" | "!=" | "!=="
  | "<" | ">" | "<=" | ">="
  | "+" | "-" | "*" | "/" | "%";

export type UnaryOperator = "-" | "+";

export type PrimitiveValue = null | undefined | number | boolean | string;

/** `name` with no receiver; the receiver is the component instance or a template symbol. */
export interface ImplicitReceiver {
  $kind: "ImplicitReceiver";
  span: SourceSpan;
}

/** Explicit `this` receiver. Resolves like an implicit one (see the binder). */
export interface ThisReceiver {
  $kind: "ThisReceiver";
  span: SourceSpan;
}

export interface PropertyRead {
  $kind: "PropertyRead";
  span: SourceSpan;
  receiver: AST;
  name: string;
  nameSpan: SourceSpan;
}

export interface SafePropertyRead {
  $kind: "SafePropertyRead";
  span: SourceSpan;
  receiver: AST;
  name: string;
  nameSpan: SourceSpan;
}

export interface KeyedRead {
  $kind: "KeyedRead";
  span: SourceSpan;
  receiver: AST;
  key: AST;
}

export interface SafeKeyedRead {
  $kind: "SafeKeyedRead";
  span: SourceSpan;
  receiver: AST;
  key: AST;
}

export interface PropertyWrite {
  $kind: "PropertyWrite";
  span: SourceSpan;
  receiver: AST;
  name: string;
  nameSpan: SourceSpan;
  value: AST;
}

export interface KeyedWrite {
  $kind: "KeyedWrite";
  span: SourceSpan;
  receiver: AST;
  key: AST;
  value: AST;
}

export interface Call {
  $kind: "Call";
  span: SourceSpan;
  receiver: AST;
  args: AST[];
  argumentSpan: SourceSpan;
}

export interface SafeCall {
  $kind: "SafeCall";
  span: SourceSpan;
  receiver: AST;
  args: AST[];
  argumentSpan: SourceSpan;
}

export interface LiteralPrimitive {
  $kind: "LiteralPrimitive";
  span: SourceSpan;
  value: PrimitiveValue;
  /** Numbers only: the literal as written. */
  raw?: string;
}

export interface LiteralArray {
  $kind: "LiteralArray";
  span: SourceSpan;
  expressions: AST[];
}

export interface LiteralMapKey {
  key: string;
  quoted: boolean;
}

export interface LiteralMap {
  $kind: "LiteralMap";
  span: SourceSpan;
  keys: LiteralMapKey[];
  values: AST[];
}

export interface Binary {
  $kind: "Binary";
  span: SourceSpan;
  operation: BinaryOperator;
  left: AST;
  right: AST;
}

export interface Unary {
  $kind: "Unary";
  span: SourceSpan;
  operator: UnaryOperator;
  expression: AST;
}

export interface PrefixNot {
  $kind: "PrefixNot";
  span: SourceSpan;
  expression: AST;
}

export interface TypeofExpression {
  $kind: "TypeofExpression";
  span: SourceSpan;
  expression: AST;
}

export interface NonNullAssert {
  $kind: "NonNullAssert";
  span: SourceSpan;
  expression: AST;
}

export interface Conditional {
  $kind: "Conditional";
  span: SourceSpan;
  condition: AST;
  trueExp: AST;
  falseExp: AST;
}

/** `exp | name:arg1:arg2` */
export interface Pipe {
  $kind: "Pipe";
  span: SourceSpan;
  exp: AST;
  name: string;
  nameSpan: SourceSpan;
  args: AST[];
}

/** `a(); b()` in event handlers. */
export interface Chain {
  $kind: "Chain";
  span: SourceSpan;
  expressions: AST[];
}

export interface Interpolation {
  $kind: "Interpolation";
  span: SourceSpan;
  strings: string[];
  expressions: AST[];
}

export interface EmptyExpr {
  $kind: "EmptyExpr";
  span: SourceSpan;
}

export interface BadExpression {
  $kind: "BadExpression";
  span: SourceSpan;
  /** Raw text of the segment that failed to parse. */
  text: string;
  message: string;
}

export type AST =
  | ImplicitReceiver
  | ThisReceiver
  | PropertyRead
  | SafePropertyRead
  | KeyedRead
  | SafeKeyedRead
  | PropertyWrite
  | KeyedWrite
  | Call
  | SafeCall
  | LiteralPrimitive
  | LiteralArray
  | LiteralMap
  | Binary
  | Unary
  | PrefixNot
  | TypeofExpression
  | NonNullAssert
  | Conditional
  | Pipe
  | Chain
  | Interpolation
  | EmptyExpr
  | BadExpression;

export type ExprKind = AST["$kind"];

/** Reads and writes whose target may be a template symbol rather than a component member. */
export type ScopedAccess = PropertyRead | PropertyWrite;

export function isImplicitOrThis(ast: AST): ast is ImplicitReceiver | ThisReceiver {
  return ast.$kind === "ImplicitReceiver" || ast.$kind === "ThisReceiver";
}

/** Visit every direct child of `ast`. */
export function forEachChild(ast: AST, fn: (child: AST) => void): void {
  switch (ast.$kind) {
    case "ImplicitReceiver":
    case "ThisReceiver":
    case "LiteralPrimitive":
    case "EmptyExpr":
    case "BadExpression":
      return;
    case "PropertyRead":
    case "SafePropertyRead":
      fn(ast.receiver);
      return;
    case "KeyedRead":
    case "SafeKeyedRead":
      fn(ast.receiver);
      fn(ast.key);
      return;
    case "PropertyWrite":
      fn(ast.receiver);
      fn(ast.value);
      return;
    case "KeyedWrite":
      fn(ast.receiver);
      fn(ast.key);
      fn(ast.value);
      return;
    case "Call":
    case "SafeCall":
      fn(ast.receiver);
      ast.args.forEach(fn);
      return;
    case "LiteralArray":
      ast.expressions.forEach(fn);
      return;
    case "LiteralMap":
      ast.values.forEach(fn);
      return;
    case "Binary":
      fn(ast.left);
      fn(ast.right);
      return;
    case "Unary":
    case "PrefixNot":
    case "TypeofExpression":
    case "NonNullAssert":
      fn(ast.expression);
      return;
    case "Conditional":
      fn(ast.condition);
      fn(ast.trueExp);
      fn(ast.falseExp);
      return;
    case "Pipe":
      fn(ast.exp);
      ast.args.forEach(fn);
      return;
    case "Chain":
    case "Interpolation":
      ast.expressions.forEach(fn);
      return;
  }
}
