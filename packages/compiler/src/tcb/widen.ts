import type { TypeCheckingConfig } from "../typecheck/config.js";
import { expression, type Expression } from "./code.js";
import type { Environment } from "./environment.js";
import { RuntimeSymbols } from "./runtime-symbols.js";
import { tsCastToAny } from "./ts-util.js";

/**
 * Loosen a bound input expression to what the configuration checks:
 * `any` without input checking, a non-null assertion without null checking.
 * Literals are never asserted.
 */
export function widenBinding(expr: Expression, config: TypeCheckingConfig): Expression {
  if (!config.checkTypeOfInputBindings) return tsCastToAny(expr);
  if (!config.strictNullInputBindings) {
    if (expr.literal !== null) return expr;
    return expression((b) => b.append(expr).append("!"));
  }
  return expr;
}

/** `unwrapWritableSignal(expr)`, letting a two-way binding accept a writable signal. */
export function unwrapWritableSignal(expr: Expression, env: Environment): Expression {
  const fn = env.referenceExternalSymbol(RuntimeSymbols.UnwrapWritableSignal);
  return expression((b) => b.append(fn).append("(").append(expr).append(")"));
}
