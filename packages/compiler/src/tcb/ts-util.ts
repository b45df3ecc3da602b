import { expression, statement, type CodePart, type Expression, type Identifier, type Statement } from "./code.js";
import type { SourceSpan } from "../model/span.js";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Double-quoted string literal. */
export function quote(value: string): string {
  return JSON.stringify(value);
}

/** `var id = null! as type;` */
export function tsDeclareVariable(id: Identifier, type: CodePart): Statement {
  return statement((b) => b.append("var ").append(id, id.span).append(" = null! as ").append(type).append(";"));
}

/** `var id = initializer;` */
export function tsCreateVariable(id: Identifier, initializer: CodePart): Statement {
  return statement((b) => b.append("var ").append(id, id.span).append(" = ").append(initializer).append(";"));
}

/** `(expr as any)` */
export function tsCastToAny(expr: CodePart): Expression {
  return expression((b) => b.append("(").append(expr).append(" as any)"));
}

/** `receiver.name`, or `receiver["name"]` when the name is not an identifier. */
export function tsPropertyAccess(receiver: CodePart, name: string, nameSpan: SourceSpan | null = null): Expression {
  return expression((b) => {
    b.append(receiver);
    if (isValidIdentifier(name)) {
      b.append(".").append(name, nameSpan);
    } else {
      b.append("[").append(quote(name), nameSpan).append("]");
    }
  });
}

/** `<T extends bound, U>` for a declaration; empty without parameters. */
export function typeParameterList(params: readonly { name: string; bound?: string }[], withDefaults = false): string {
  if (params.length === 0) return "";
  const items = params.map((p) => {
    let text = p.name;
    if (p.bound) text += ` extends ${p.bound}`;
    if (withDefaults) text += " = any";
    return text;
  });
  return `<${items.join(", ")}>`;
}

/** `<T, U>` applying the parameters by name. */
export function typeArgumentList(params: readonly { name: string }[]): string {
  return params.length === 0 ? "" : `<${params.map((p) => p.name).join(", ")}>`;
}

/** `<any, any>` with one `any` per parameter. */
export function anyTypeArguments(count: number): string {
  return count === 0 ? "" : `<${Array.from({ length: count }, () => "any").join(", ")}>`;
}
