/* =======================================================================================
 * EXPRESSION TRANSLATION (template AST → TS code tree)
 * ---------------------------------------------------------------------------------------
 * Every translated node is wrapped in an `Expression` spanned with the node's template
 * range; member names additionally map to their `nameSpan`. Reads and writes the binder
 * resolved to a template symbol become the identifier `Scope.resolve` returns for it;
 * other unqualified names become `this.<name>`.
 *
 * Safe navigation (`a?.b`) has three forms:
 *   strictSafeNavigationTypes   (null as any ? (a)!.b : undefined)
 *   receiver typed `any` anyway ((a) as any).b
 *   otherwise                   ((a)!.b as any)
 *
 * Event handlers translate with the event translator, which additionally resolves
 * `$event` to the handler parameter.
 * ======================================================================================= */

import type {
  AST,
  Binary,
  Call,
  Conditional,
  Interpolation,
  KeyedRead,
  KeyedWrite,
  LiteralArray,
  LiteralMap,
  LiteralPrimitive,
  Pipe,
  PropertyRead,
  PropertyWrite,
  SafeCall,
  SafeKeyedRead,
  SafePropertyRead,
} from "../model/expr.js";
import { isImplicitOrThis } from "../model/expr.js";
import type { TmplBoundEvent } from "../model/template.js";
import {
  expression,
  expressionStatement,
  text,
  statement,
  type CodeBuilder,
  type Expression,
  type Statement,
} from "./code.js";
import type { Context } from "./context.js";
import type { Scope } from "./scope.js";
import { quote } from "./ts-util.js";

/** Identifier text of the event handler parameter. */
export const EVENT_PARAMETER = "$event";

export function tcbExpression(ast: AST, ctx: Context, scope: Scope): Expression {
  return new TcbExpressionTranslator(ctx, scope).translate(ast);
}

/* =======================================================================================
 * Translator
 * ======================================================================================= */

export class TcbExpressionTranslator {
  constructor(
    protected readonly ctx: Context,
    protected readonly scope: Scope,
  ) {}

  translate(ast: AST): Expression {
    switch (ast.$kind) {
      case "ImplicitReceiver":
      case "ThisReceiver":
        return text("this", ast.span);
      case "PropertyRead":
        return this.propertyRead(ast);
      case "SafePropertyRead":
        return this.safeAccess(ast, ast.receiver, (b) => b.append(".").append(ast.name, ast.nameSpan));
      case "KeyedRead":
        return this.keyedRead(ast);
      case "SafeKeyedRead":
        return this.safeKeyedRead(ast);
      case "PropertyWrite":
        return this.propertyWrite(ast);
      case "KeyedWrite":
        return this.keyedWrite(ast);
      case "Call":
        return this.call(ast);
      case "SafeCall":
        return this.safeCall(ast);
      case "LiteralPrimitive":
        return text(literalText(ast), ast.span);
      case "LiteralArray":
        return this.literalArray(ast);
      case "LiteralMap":
        return this.literalMap(ast);
      case "Binary":
        return this.binary(ast);
      case "Unary":
        return this.wrap(ast.span, (b) => b.append(`(${ast.operator}`).append(this.translate(ast.expression)).append(")"));
      case "PrefixNot":
        return this.wrap(ast.span, (b) => b.append("(!").append(this.translate(ast.expression)).append(")"));
      case "TypeofExpression":
        return this.wrap(ast.span, (b) => b.append("(typeof ").append(this.translate(ast.expression)).append(")"));
      case "NonNullAssert":
        return this.wrap(ast.span, (b) => b.append("(").append(this.translate(ast.expression)).append(")!"));
      case "Conditional":
        return this.conditional(ast);
      case "Pipe":
        return this.pipe(ast);
      case "Chain":
        return this.wrap(ast.span, (b) =>
          b.append("(").appendJoined(ast.expressions, ", ", (e) => b.append(this.translate(e))).append(")"),
        );
      case "Interpolation":
        return this.interpolation(ast);
      case "EmptyExpr":
      case "BadExpression":
        return text("undefined", ast.span);
    }
  }

  /**
   * Identifier for a read or write the binder resolved to a template variable or
   * reference; null when the name belongs to the component.
   */
  protected resolveTarget(ast: PropertyRead | PropertyWrite): Expression | null {
    const target = this.ctx.boundTarget.getExpressionTarget(ast);
    if (!target) return null;
    const id = this.scope.resolve(target);
    return expression((b) => b.append(id, ast.span));
  }

  protected wrap(span: AST["span"], fn: (b: CodeBuilder) => void, literal: "object" | "array" | null = null): Expression {
    return expression(fn, { span, literal });
  }

  // ------------------------------------------------------------------------------------------
  // Accesses
  // ------------------------------------------------------------------------------------------

  private propertyRead(ast: PropertyRead): Expression {
    if (isImplicitOrThis(ast.receiver)) {
      const target = this.resolveTarget(ast);
      if (target) return target;
      return this.wrap(ast.span, (b) => b.append("this.").append(ast.name, ast.nameSpan));
    }
    const receiver = this.translate(ast.receiver);
    return this.wrap(ast.span, (b) => b.append(receiver).append(".").append(ast.name, ast.nameSpan));
  }

  private keyedRead(ast: KeyedRead): Expression {
    const receiver = this.translate(ast.receiver);
    const key = this.translate(ast.key);
    return this.wrap(ast.span, (b) => b.append(receiver).append("[").append(key).append("]"));
  }

  private safeKeyedRead(ast: SafeKeyedRead): Expression {
    const key = this.translate(ast.key);
    return this.safeAccess(ast, ast.receiver, (b) => b.append("[").append(key).append("]"));
  }

  private propertyWrite(ast: PropertyWrite): Expression {
    const value = this.translate(ast.value);
    if (isImplicitOrThis(ast.receiver)) {
      const target = this.resolveTarget(ast);
      return this.wrap(ast.span, (b) => {
        b.append("(");
        if (target) {
          b.append(target);
        } else {
          b.append("this.").append(ast.name, ast.nameSpan);
        }
        b.append(" = ").append(value).append(")");
      });
    }
    const receiver = this.translate(ast.receiver);
    return this.wrap(ast.span, (b) =>
      b.append("(").append(receiver).append(".").append(ast.name, ast.nameSpan).append(" = ").append(value).append(")"),
    );
  }

  private keyedWrite(ast: KeyedWrite): Expression {
    const receiver = this.translate(ast.receiver);
    const key = this.translate(ast.key);
    const value = this.translate(ast.value);
    return this.wrap(ast.span, (b) =>
      b.append("(").append(receiver).append("[").append(key).append("] = ").append(value).append(")"),
    );
  }

  /** `tail` appends the member, index or call applied to the receiver. */
  private safeAccess(
    ast: SafePropertyRead | SafeKeyedRead | SafeCall,
    receiverAst: AST,
    tail: (b: CodeBuilder) => void,
  ): Expression {
    const receiver = this.translate(receiverAst);
    const config = this.ctx.env.config;
    return this.wrap(ast.span, (b) => {
      if (config.strictSafeNavigationTypes) {
        b.append("(null as any ? (").append(receiver).append(")!");
        tail(b);
        b.append(" : undefined)");
      } else if (receiverInfersAny(receiverAst)) {
        b.append("((").append(receiver).append(") as any)");
        tail(b);
      } else {
        b.append("((").append(receiver).append(")!");
        tail(b);
        b.append(" as any)");
      }
    });
  }

  // ------------------------------------------------------------------------------------------
  // Calls and pipes
  // ------------------------------------------------------------------------------------------

  private call(ast: Call): Expression {
    const receiver = ast.receiver;
    const [onlyArg] = ast.args;
    if (
      receiver.$kind === "PropertyRead" &&
      receiver.receiver.$kind === "ImplicitReceiver" &&
      receiver.name === "$any" &&
      ast.args.length === 1 &&
      onlyArg &&
      this.ctx.boundTarget.getExpressionTarget(receiver) === null
    ) {
      const arg = this.translate(onlyArg);
      return this.wrap(ast.span, (b) => b.append("(").append(arg).append(" as any)"));
    }
    const callee = this.translate(receiver);
    const args = ast.args.map((a) => this.translate(a));
    return this.wrap(ast.span, (b) =>
      b.append(callee).append("(").appendJoined(args, ", ", (a) => b.append(a)).append(")"),
    );
  }

  private safeCall(ast: SafeCall): Expression {
    const args = ast.args.map((a) => this.translate(a));
    return this.safeAccess(ast, ast.receiver, (b) =>
      b.append("(").appendJoined(args, ", ", (a) => b.append(a)).append(")"),
    );
  }

  /**
   * `pipeInst.transform(exp, ...args)`. Without pipe checking the instance is cast to
   * `any`; an unknown pipe is reported and replaced by `(null as any)`.
   */
  private pipe(ast: Pipe): Expression {
    const meta = this.ctx.getPipeByName(ast.name);
    let instance: Expression;
    if (meta) {
      instance = this.ctx.env.pipeInst(meta);
    } else {
      this.ctx.oob.missingPipe(this.ctx.id, ast);
      instance = text("(null as any)");
    }
    const checked = this.ctx.env.config.checkTypeOfPipes;
    const args = [ast.exp, ...ast.args].map((a) => this.translate(a));
    return this.wrap(ast.span, (b) => {
      if (!checked) b.append("(");
      b.append(instance);
      if (!checked) b.append(" as any)");
      b.append(".").append("transform", ast.nameSpan);
      b.append("(").appendJoined(args, ", ", (a) => b.append(a)).append(")");
    });
  }

  // ------------------------------------------------------------------------------------------
  // Operators and literals
  // ------------------------------------------------------------------------------------------

  private binary(ast: Binary): Expression {
    const left = this.translate(ast.left);
    const right = this.translate(ast.right);
    return this.wrap(ast.span, (b) => b.append("(").append(left).append(` ${ast.operation} `).append(right).append(")"));
  }

  private conditional(ast: Conditional): Expression {
    const condition = this.translate(ast.condition);
    const whenTrue = this.translate(ast.trueExp);
    const whenFalse = this.translate(ast.falseExp);
    return this.wrap(ast.span, (b) =>
      b.append("(").append(condition).append(" ? ").append(whenTrue).append(" : ").append(whenFalse).append(")"),
    );
  }

  private literalArray(ast: LiteralArray): Expression {
    const items = ast.expressions.map((e) => this.translate(e));
    const strict = this.ctx.env.config.strictLiteralTypes;
    return this.wrap(
      ast.span,
      (b) => {
        if (!strict) b.append("(");
        b.append("[").appendJoined(items, ", ", (i) => b.append(i)).append("]");
        if (!strict) b.append(" as any)");
      },
      "array",
    );
  }

  private literalMap(ast: LiteralMap): Expression {
    const values = ast.values.map((v) => this.translate(v));
    const entries = ast.keys.map((key, index) => ({ key: key.key, value: values[index] }));
    const strict = this.ctx.env.config.strictLiteralTypes;
    return this.wrap(
      ast.span,
      (b) => {
        // Always parenthesized: a statement starting with `{` opens a block.
        b.append("(");
        b.append("{").appendJoined(entries, ", ", (entry) => {
          b.append(`${quote(entry.key)}: `).append(entry.value ?? "undefined");
        });
        b.append("}");
        b.append(strict ? ")" : " as any)");
      },
      "object",
    );
  }

  /** `"" + (a) + (b)` */
  private interpolation(ast: Interpolation): Expression {
    const parts = ast.expressions.map((e) => this.translate(e));
    return this.wrap(ast.span, (b) => {
      b.append('""');
      for (const part of parts) b.append(" + (").append(part).append(")");
    });
  }
}

/* =======================================================================================
 * Event handlers
 * ======================================================================================= */

class TcbEventHandlerTranslator extends TcbExpressionTranslator {
  protected override resolveTarget(ast: PropertyRead | PropertyWrite): Expression | null {
    if (ast.$kind === "PropertyRead" && ast.receiver.$kind === "ImplicitReceiver" && ast.name === EVENT_PARAMETER) {
      return text(EVENT_PARAMETER, ast.span);
    }
    return super.resolveTarget(ast);
  }
}

/**
 * How `$event` is typed: `infer` leaves it to the call site (`subscribe`,
 * `addEventListener`), `any` annotates it, an expression annotates it with that type.
 */
export type EventParamType = "infer" | "any" | Expression;

/**
 * `($event): any => { <guards> handler; }`. A two-way event assigns `$event` to the
 * bound expression; a chain becomes one statement per expression.
 */
export function tcbCreateEventHandler(
  event: TmplBoundEvent,
  ctx: Context,
  scope: Scope,
  paramType: EventParamType,
): Expression {
  const translator = new TcbEventHandlerTranslator(ctx, scope);
  const handlers = event.handler.$kind === "Chain" ? event.handler.expressions : [event.handler];
  const body: Statement[] = handlers.map((handler) => {
    const translated = translator.translate(handler);
    if (event.type !== "twoWay") return expressionStatement(translated);
    return statement((b) => b.append(translated).append(` = ${EVENT_PARAMETER};`));
  });
  const guards = scope.guards();

  return expression((b) => {
    b.append(`(${EVENT_PARAMETER}`);
    if (paramType === "any") {
      b.append(": any");
    } else if (paramType !== "infer") {
      b.append(": ").append(paramType);
    }
    b.append("): any => ");
    b.block((block) => {
      if (guards) {
        block.statement((s) =>
          s.append("if (").append(guards).append(") ").block((inner) => {
            for (const stmt of body) inner.add(stmt);
          }),
        );
      } else {
        for (const stmt of body) block.add(stmt);
      }
    });
  });
}

/* =======================================================================================
 * Helpers
 * ======================================================================================= */

function literalText(ast: LiteralPrimitive): string {
  const value = ast.value;
  if (value === undefined) return "undefined";
  if (typeof value === "string") return quote(value);
  if (typeof value === "number" && ast.raw !== undefined) return ast.raw;
  return String(value);
}

/**
 * Receivers whose inferred type is already `any` under the non-strict safe-navigation
 * form, so the member access is cast instead of asserted.
 */
function receiverInfersAny(ast: AST): boolean {
  switch (ast.$kind) {
    case "Call":
    case "LiteralArray":
    case "LiteralMap":
    case "Pipe":
      return true;
    case "Unary":
    case "PrefixNot":
    case "TypeofExpression":
    case "NonNullAssert":
      return receiverInfersAny(ast.expression);
    case "Binary":
      return receiverInfersAny(ast.left) || receiverInfersAny(ast.right);
    case "Conditional":
      return receiverInfersAny(ast.condition) || receiverInfersAny(ast.trueExp) || receiverInfersAny(ast.falseExp);
    case "Interpolation":
      return ast.expressions.some(receiverInfersAny);
    default:
      return false;
  }
}
