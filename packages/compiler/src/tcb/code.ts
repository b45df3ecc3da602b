/* =======================================================================================
 * SYNTHESIZED CODE TREE
 * ---------------------------------------------------------------------------------------
 * Type-check blocks are built as a tree, never as concatenated text. An `Expression`
 * with a `span` records where its text came from in the template; the printer turns
 * those into source-map entries. Identifiers only map when appended with a span.
 * ======================================================================================= */

import type { SourceSpan } from "../model/span.js";

/** Semantic tag of a synthesized identifier. */
export type IdentifierTag = "directive";

export interface Identifier {
  readonly $kind: "Identifier";
  readonly name: string;
  /** Template range the identifier stands for (element, variable key, ...). */
  readonly span: SourceSpan | null;
  readonly tag: IdentifierTag | null;
}

export interface Expression {
  readonly $kind: "Expression";
  readonly parts: readonly CodePart[];
  readonly span: SourceSpan | null;
  /** Type errors inside this range are not reported. */
  readonly ignoreDiagnostics: boolean;
  /** Set when the expression is an object or array literal (possibly cast). */
  readonly literal: "object" | "array" | null;
}

export interface Statement {
  readonly $kind: "Statement";
  readonly parts: readonly CodePart[];
}

/** `{ ... }` holding one statement per line. */
export interface Block {
  readonly $kind: "Block";
  readonly statements: readonly Statement[];
}

export type CodePart = string | Identifier | Expression | Block;

export interface ExpressionOptions {
  span?: SourceSpan | null;
  ignoreDiagnostics?: boolean;
  literal?: "object" | "array" | null;
}

export function identifier(name: string, span: SourceSpan | null = null, tag: IdentifierTag | null = null): Identifier {
  return { $kind: "Identifier", name, span, tag };
}

export class CodeBuilder {
  private readonly parts: CodePart[] = [];

  /** Append a fragment; with a span the fragment is wrapped so it maps back. */
  append(part: CodePart, span?: SourceSpan | null): this {
    if (span) {
      this.parts.push(makeExpression([part], { span }));
    } else {
      this.parts.push(part);
    }
    return this;
  }

  /** Append `items` separated by `separator`. */
  appendJoined<T>(items: readonly T[], separator: string, each: (item: T, b: this) => void): this {
    items.forEach((item, index) => {
      if (index > 0) this.parts.push(separator);
      each(item, this);
    });
    return this;
  }

  withSpan(span: SourceSpan | null, fn: (b: CodeBuilder) => void): this {
    this.parts.push(expression(fn, { span }));
    return this;
  }

  withIgnoreDiagnostics(fn: (b: CodeBuilder) => void): this {
    this.parts.push(expression(fn, { ignoreDiagnostics: true }));
    return this;
  }

  block(fn: (b: BlockBuilder) => void): this {
    const builder = new BlockBuilder();
    fn(builder);
    this.parts.push(builder.build());
    return this;
  }

  build(): CodePart[] {
    return this.parts;
  }
}

export class BlockBuilder {
  private readonly statements: Statement[] = [];

  add(stmt: Statement): this {
    this.statements.push(stmt);
    return this;
  }

  statement(fn: (b: CodeBuilder) => void): this {
    return this.add(statement(fn));
  }

  build(): Block {
    return { $kind: "Block", statements: this.statements };
  }
}

export function expression(fn: (b: CodeBuilder) => void, options: ExpressionOptions = {}): Expression {
  const builder = new CodeBuilder();
  fn(builder);
  return makeExpression(builder.build(), options);
}

/** Expression made of a single text fragment. */
export function text(value: string, span: SourceSpan | null = null): Expression {
  return makeExpression([value], { span });
}

export function statement(fn: (b: CodeBuilder) => void): Statement {
  const builder = new CodeBuilder();
  fn(builder);
  return { $kind: "Statement", parts: builder.build() };
}

/** `expr;` */
export function expressionStatement(expr: Expression): Statement {
  return { $kind: "Statement", parts: [expr, ";"] };
}

export function block(statements: readonly Statement[]): Block {
  return { $kind: "Block", statements };
}

function makeExpression(parts: readonly CodePart[], options: ExpressionOptions): Expression {
  return {
    $kind: "Expression",
    parts,
    span: options.span ?? null,
    ignoreDiagnostics: options.ignoreDiagnostics ?? false,
    literal: options.literal ?? null,
  };
}

/** Text of a fragment with no indentation or mapping; for tests and debug output. */
export function toText(part: CodePart | Statement): string {
  if (typeof part === "string") return part;
  switch (part.$kind) {
    case "Identifier":
      return part.name;
    case "Expression":
    case "Statement":
      return part.parts.map(toText).join("");
    case "Block":
      return `{ ${part.statements.map(toText).join(" ")} }`;
  }
}
