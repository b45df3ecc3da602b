import { Scanner, type Token } from "./expression-scanner.js";
import type {
  AST,
  BadExpression,
  BinaryOperator,
  Interpolation,
  LiteralMapKey,
  PrimitiveValue,
} from "../model/expr.js";
import { spanFromBounds, type SourceSpan } from "../model/span.js";

/** Where the parsed text sits in the template file. */
export interface ExpressionParseContext {
  /** Absolute offset of the first character of the expression text. */
  readonly offset: number;
  readonly file?: string | null;
}

export interface ExpressionParseError {
  message: string;
  span: SourceSpan;
}

export interface ParsedExpression<T extends AST = AST> {
  ast: T;
  errors: ExpressionParseError[];
}

/**
 * `binding`: property bindings and interpolations (pipes allowed, no assignment).
 * `action`: event handlers (`;` chains and assignments allowed, no pipes).
 */
export type ParseMode = "binding" | "action";

export type TemplateBinding =
  | {
      kind: "expression";
      /** Full input name, e.g. `ngForOf`. */
      key: string;
      keySpan: SourceSpan;
      value: AST | null;
      span: SourceSpan;
    }
  | {
      kind: "variable";
      key: string;
      keySpan: SourceSpan;
      /** Context property; null reads `$implicit`. */
      value: string | null;
      valueSpan: SourceSpan | null;
      span: SourceSpan;
    };

export interface TemplateBindingParseResult {
  bindings: TemplateBinding[];
  errors: ExpressionParseError[];
}

type SpanBearing = { span: SourceSpan };

interface BinaryOpInfo {
  operator: BinaryOperator;
  precedence: number;
}

const BINARY_OPERATORS: Record<string, BinaryOpInfo> = {
  "||": { operator: "||", precedence: 1 },
  "&&": { operator: "&&", precedence: 2 },
  "??": { operator: "??", precedence: 3 },
  "==": { operator: "==", precedence: 4 },
  "===": { operator: "===", precedence: 4 },
  "!=": { operator: "!=", precedence: 4 },
  "!==": { operator: "!==", precedence: 4 },
  "<": { operator: "<", precedence: 5 },
  ">": { operator: ">", precedence: 5 },
  "<=": { operator: "<=", precedence: 5 },
  ">=": { operator: ">=", precedence: 5 },
  "+": { operator: "+", precedence: 6 },
  "-": { operator: "-", precedence: 6 },
  "*": { operator: "*", precedence: 7 },
  "/": { operator: "/", precedence: 7 },
  "%": { operator: "%", precedence: 7 },
};

/**
 * Recursive-descent parser for template expressions.
 *
 * The first failure is kept and returned as the root (a BadExpression spanning the
 * offending token); parsing stops there.
 */
export class CoreParser {
  private readonly scanner: Scanner;
  private readonly offset: number;
  private readonly file: string | null;
  /** End offset of the last consumed token. */
  private lastTokenEnd = 0;
  private failure: BadExpression | null = null;

  constructor(
    private readonly source: string,
    context: ExpressionParseContext,
    private readonly mode: ParseMode,
  ) {
    this.scanner = new Scanner(source);
    this.offset = context.offset;
    this.file = context.file ?? null;
  }

  get error(): ExpressionParseError | null {
    return this.failure ? { message: this.failure.message, span: this.failure.span } : null;
  }

  // ------------------------------------------------------------------------------------------
  // Entry points
  // ------------------------------------------------------------------------------------------

  parseBinding(): AST {
    if (this.peek().kind === "eof") {
      return this.fail("Empty expression", this.peek());
    }
    const ast = this.parsePipe();
    this.expectEnd();
    return this.failure ?? ast;
  }

  parseAction(): AST {
    if (this.peek().kind === "eof") {
      return this.fail("Empty expression", this.peek());
    }
    const start = this.peek().start;
    const expressions: AST[] = [];
    while (this.peek().kind !== "eof" && !this.failure) {
      expressions.push(this.parsePipe());
      if (this.optionalOperator(";")) {
        while (this.optionalOperator(";")) {
          // skip empty statements
        }
      } else if (this.peek().kind !== "eof") {
        this.fail(`Unexpected token '${this.peek().text}'`, this.peek());
      }
    }
    if (this.failure) return this.failure;
    const [only] = expressions;
    if (expressions.length === 1 && only) return only;
    return { $kind: "Chain", span: this.span(start, this.lastTokenEnd), expressions };
  }

  /** Microsyntax of `*dir="..."`. `templateKey` is the directive name after `*`. */
  parseTemplateBindings(templateKey: { name: string; span: SourceSpan }): TemplateBinding[] {
    const bindings: TemplateBinding[] = [];
    bindings.push(...this.parseDirectiveKeywordBindings(templateKey));
    while (this.peek().kind !== "eof" && !this.failure) {
      const letBinding = this.parseLetBinding();
      if (letBinding) {
        bindings.push(letBinding);
      } else {
        const keyToken = this.peek();
        if (keyToken.kind !== "identifier" && keyToken.kind !== "keyword") {
          this.fail(`Unexpected token '${keyToken.text}', expected a binding key`, keyToken);
          break;
        }
        this.next();
        const key = { name: keyToken.text, span: this.spanOf(keyToken) };
        const asBinding = this.parseAsBinding(key);
        if (asBinding) {
          bindings.push(asBinding);
        } else {
          const fullKey = { name: templateKey.name + capitalize(key.name), span: key.span };
          bindings.push(...this.parseDirectiveKeywordBindings(fullKey));
        }
      }
      this.consumeStatementTerminator();
    }
    return bindings;
  }

  // ------------------------------------------------------------------------------------------
  // Microsyntax pieces
  // ------------------------------------------------------------------------------------------

  private parseDirectiveKeywordBindings(key: { name: string; span: SourceSpan }): TemplateBinding[] {
    const bindings: TemplateBinding[] = [];
    this.optionalOperator(":");
    let value: AST | null = null;
    const next = this.peek();
    if (next.kind !== "eof" && !isWord(next, "as") && !isWord(next, "let") && !isOperator(next, ";") && !isOperator(next, ",")) {
      value = this.parsePipe();
    }
    const end = value ? value.span.end : key.span.end;
    bindings.push({ kind: "expression", key: key.name, keySpan: key.span, value, span: { ...key.span, end } });
    const asBinding = this.parseAsBinding(key);
    if (asBinding) bindings.push(asBinding);
    this.consumeStatementTerminator();
    return bindings;
  }

  /** `let name` / `let name = contextKey` */
  private parseLetBinding(): TemplateBinding | null {
    const letToken = this.peek();
    if (!isWord(letToken, "let")) return null;
    this.next();
    const nameToken = this.expectIdentifier("after 'let'");
    if (!nameToken) return null;
    let value: string | null = null;
    let valueSpan: SourceSpan | null = null;
    if (this.optionalOperator("=")) {
      const valueToken = this.expectIdentifier("after '='");
      if (!valueToken) return null;
      value = valueToken.text;
      valueSpan = this.spanOf(valueToken);
    }
    return {
      kind: "variable",
      key: nameToken.text,
      keySpan: this.spanOf(nameToken),
      value,
      valueSpan,
      span: this.span(letToken.start, this.lastTokenEnd),
    };
  }

  /** `<value> as alias`: `alias` reads the context property `value`. */
  private parseAsBinding(value: { name: string; span: SourceSpan }): TemplateBinding | null {
    if (!isWord(this.peek(), "as")) return null;
    this.next();
    const aliasToken = this.expectIdentifier("after 'as'");
    if (!aliasToken) return null;
    const keySpan = this.spanOf(aliasToken);
    return {
      kind: "variable",
      key: aliasToken.text,
      keySpan,
      value: value.name,
      valueSpan: value.span,
      span: { ...value.span, end: keySpan.end },
    };
  }

  private consumeStatementTerminator(): void {
    if (!this.optionalOperator(";")) this.optionalOperator(",");
  }

  // ------------------------------------------------------------------------------------------
  // Precedence pipeline
  // ------------------------------------------------------------------------------------------

  // Pipe ::= Expression ( "|" name ( ":" Expression )* )*
  private parsePipe(): AST {
    let result = this.parseExpression();
    while (!this.failure && isOperator(this.peek(), "|")) {
      const bar = this.next();
      if (this.mode === "action") {
        return this.fail("Cannot have a pipe in an action expression", bar);
      }
      const nameToken = this.expectIdentifier("after '|'");
      if (!nameToken) return this.failure ?? result;
      const args: AST[] = [];
      while (this.optionalOperator(":")) {
        args.push(this.parseExpression());
      }
      result = {
        $kind: "Pipe",
        span: this.spanFrom(result, this.lastTokenEnd),
        exp: result,
        name: nameToken.text,
        nameSpan: this.spanOf(nameToken),
        args,
      };
    }
    return result;
  }

  // Expression ::= Conditional ( "=" Expression )?
  private parseExpression(): AST {
    const left = this.parseConditional();
    const eq = this.peek();
    if (!isOperator(eq, "=")) return left;
    if (this.mode === "binding") {
      return this.fail("Bindings cannot contain assignments", eq);
    }
    this.next();
    const value = this.parseConditional();
    const span = this.spanFrom(left, value);
    switch (left.$kind) {
      case "PropertyRead":
        return { $kind: "PropertyWrite", span, receiver: left.receiver, name: left.name, nameSpan: left.nameSpan, value };
      case "KeyedRead":
        return { $kind: "KeyedWrite", span, receiver: left.receiver, key: left.key, value };
      default:
        return this.fail("Invalid assignment target", eq);
    }
  }

  // Conditional ::= Binary ( "?" Pipe ":" Pipe )?
  private parseConditional(): AST {
    const condition = this.parseBinary(1);
    if (!isOperator(this.peek(), "?")) return condition;
    this.next();
    const trueExp = this.parsePipe();
    const colon = this.peek();
    if (!isOperator(colon, ":")) {
      return this.fail("Conditional expression requires all 3 expressions", colon);
    }
    this.next();
    const falseExp = this.parsePipe();
    return { $kind: "Conditional", span: this.spanFrom(condition, falseExp), condition, trueExp, falseExp };
  }

  private parseBinary(minPrecedence: number): AST {
    let left = this.parsePrefix();
    while (!this.failure) {
      const look = this.peek();
      const info = look.kind === "operator" ? BINARY_OPERATORS[look.text] : undefined;
      if (!info || info.precedence < minPrecedence) break;
      this.next();
      const right = this.parseBinary(info.precedence + 1);
      left = { $kind: "Binary", span: this.spanFrom(left, right), operation: info.operator, left, right };
    }
    return left;
  }

  // Prefix ::= ("+" | "-" | "!" | "typeof") Prefix | CallChain
  private parsePrefix(): AST {
    const t = this.peek();
    if (isOperator(t, "+") || isOperator(t, "-")) {
      this.next();
      const expression = this.parsePrefix();
      return { $kind: "Unary", span: this.spanFrom(t.start, expression), operator: t.text === "+" ? "+" : "-", expression };
    }
    if (isOperator(t, "!")) {
      this.next();
      const expression = this.parsePrefix();
      return { $kind: "PrefixNot", span: this.spanFrom(t.start, expression), expression };
    }
    if (t.kind === "keyword" && t.text === "typeof") {
      this.next();
      const expression = this.parsePrefix();
      return { $kind: "TypeofExpression", span: this.spanFrom(t.start, expression), expression };
    }
    return this.parseCallChain();
  }

  private parseCallChain(): AST {
    let result = this.parsePrimary();
    const start = result.span.start - this.offset;
    while (!this.failure) {
      const t = this.peek();
      if (isOperator(t, ".")) {
        this.next();
        result = this.parseAccess(result, start, false);
      } else if (isOperator(t, "?.")) {
        this.next();
        if (this.optionalOperator("(")) {
          const args = this.parseCallArguments();
          const argEnd = this.expectOperator(")");
          result = { $kind: "SafeCall", span: this.span(start, this.lastTokenEnd), receiver: result, args, argumentSpan: this.span(t.end, argEnd) };
        } else if (this.optionalOperator("[")) {
          const key = this.parsePipe();
          this.expectOperator("]");
          result = { $kind: "SafeKeyedRead", span: this.span(start, this.lastTokenEnd), receiver: result, key };
        } else {
          result = this.parseAccess(result, start, true);
        }
      } else if (isOperator(t, "[")) {
        this.next();
        const key = this.parsePipe();
        this.expectOperator("]");
        result = { $kind: "KeyedRead", span: this.span(start, this.lastTokenEnd), receiver: result, key };
      } else if (isOperator(t, "(")) {
        this.next();
        const args = this.parseCallArguments();
        const argEnd = this.expectOperator(")");
        result = { $kind: "Call", span: this.span(start, this.lastTokenEnd), receiver: result, args, argumentSpan: this.span(t.end, argEnd) };
      } else if (isOperator(t, "!")) {
        this.next();
        result = { $kind: "NonNullAssert", span: this.span(start, this.lastTokenEnd), expression: result };
      } else {
        break;
      }
    }
    return result;
  }

  private parseAccess(receiver: AST, start: number, safe: boolean): AST {
    const nameToken = this.peek();
    if (nameToken.kind !== "identifier" && nameToken.kind !== "keyword") {
      return this.fail(`Expected identifier for property access`, nameToken);
    }
    this.next();
    const span = this.span(start, nameToken.end);
    const nameSpan = this.spanOf(nameToken);
    return safe
      ? { $kind: "SafePropertyRead", span, receiver, name: nameToken.text, nameSpan }
      : { $kind: "PropertyRead", span, receiver, name: nameToken.text, nameSpan };
  }

  private parseCallArguments(): AST[] {
    const args: AST[] = [];
    if (isOperator(this.peek(), ")")) return args;
    do {
      args.push(this.parsePipe());
    } while (!this.failure && this.optionalOperator(","));
    return args;
  }

  private parsePrimary(): AST {
    const t = this.peek();
    switch (t.kind) {
      case "keyword":
        this.next();
        return this.parseKeyword(t);
      case "number":
        this.next();
        return this.literal(t, typeof t.value === "number" ? t.value : Number(t.text), t.text);
      case "string":
        this.next();
        return this.literal(t, typeof t.value === "string" ? t.value : "");
      case "identifier": {
        this.next();
        const receiver: AST = { $kind: "ImplicitReceiver", span: this.span(t.start, t.start) };
        const nameSpan = this.spanOf(t);
        return { $kind: "PropertyRead", span: nameSpan, receiver, name: t.text, nameSpan };
      }
      case "operator":
        if (t.text === "(") {
          this.next();
          const inner = this.parsePipe();
          this.expectOperator(")");
          return inner;
        }
        if (t.text === "[") {
          this.next();
          const expressions: AST[] = [];
          if (!isOperator(this.peek(), "]")) {
            do {
              expressions.push(this.parsePipe());
            } while (!this.failure && this.optionalOperator(","));
          }
          this.expectOperator("]");
          return { $kind: "LiteralArray", span: this.span(t.start, this.lastTokenEnd), expressions };
        }
        if (t.text === "{") {
          this.next();
          return this.parseLiteralMap(t);
        }
        return this.fail(`Unexpected token '${t.text}'`, t);
      case "error":
        return this.fail(typeof t.value === "string" ? t.value : `Unexpected character '${t.text}'`, t);
      case "eof":
        return this.fail("Unexpected end of expression", t);
    }
  }

  private parseKeyword(t: Token): AST {
    switch (t.text) {
      case "this":
        return { $kind: "ThisReceiver", span: this.spanOf(t) };
      case "null":
        return this.literal(t, null);
      case "undefined":
        return this.literal(t, undefined);
      case "true":
        return this.literal(t, true);
      case "false":
        return this.literal(t, false);
      default:
        return this.fail(`Unexpected keyword '${t.text}'`, t);
    }
  }

  private parseLiteralMap(open: Token): AST {
    const keys: LiteralMapKey[] = [];
    const values: AST[] = [];
    if (!isOperator(this.peek(), "}")) {
      do {
        const keyToken = this.peek();
        const quoted = keyToken.kind === "string";
        if (!quoted && keyToken.kind !== "identifier" && keyToken.kind !== "keyword") {
          return this.fail(`Unexpected token '${keyToken.text}', expected a key`, keyToken);
        }
        this.next();
        const key = quoted && typeof keyToken.value === "string" ? keyToken.value : keyToken.text;
        keys.push({ key, quoted });
        if (this.optionalOperator(":")) {
          values.push(this.parsePipe());
        } else {
          const nameSpan = this.spanOf(keyToken);
          values.push({
            $kind: "PropertyRead",
            span: nameSpan,
            receiver: { $kind: "ImplicitReceiver", span: this.span(keyToken.start, keyToken.start) },
            name: key,
            nameSpan,
          });
        }
      } while (!this.failure && this.optionalOperator(","));
    }
    this.expectOperator("}");
    return { $kind: "LiteralMap", span: this.span(open.start, this.lastTokenEnd), keys, values };
  }

  // ------------------------------------------------------------------------------------------
  // Token helpers
  // ------------------------------------------------------------------------------------------

  private literal(t: Token, value: PrimitiveValue, raw?: string): AST {
    const span = this.spanOf(t);
    return raw === undefined ? { $kind: "LiteralPrimitive", span, value } : { $kind: "LiteralPrimitive", span, value, raw };
  }

  private peek(): Token {
    return this.scanner.peek();
  }

  private next(): Token {
    const t = this.scanner.next();
    if (t.kind !== "eof") this.lastTokenEnd = t.end;
    return t;
  }

  private optionalOperator(op: string): boolean {
    if (!isOperator(this.peek(), op)) return false;
    this.next();
    return true;
  }

  /** Returns the local start offset of the expected token. */
  private expectOperator(op: string): number {
    const t = this.peek();
    if (!isOperator(t, op)) {
      this.fail(`Missing expected ${op}`, t);
      return t.start;
    }
    this.next();
    return t.start;
  }

  private expectIdentifier(where: string): Token | null {
    const t = this.peek();
    if (t.kind !== "identifier" && t.kind !== "keyword") {
      this.fail(`Expected identifier ${where}`, t);
      return null;
    }
    return this.next();
  }

  private expectEnd(): void {
    const t = this.peek();
    if (t.kind !== "eof" && !this.failure) {
      this.fail(`Unexpected token '${t.text}'`, t);
    }
  }

  private span(start: number, end: number): SourceSpan {
    return spanFromBounds(this.offset + start, this.offset + end, this.file);
  }

  private spanOf(t: Token): SourceSpan {
    return this.span(t.start, t.end);
  }

  /** `start` is local when a number; `end` is local when a number. */
  private spanFrom(start: SpanBearing | number, end: SpanBearing | number): SourceSpan {
    const s = typeof start === "number" ? start : start.span.start - this.offset;
    const e = typeof end === "number" ? end : end.span.end - this.offset;
    return this.span(s, e);
  }

  private fail(message: string, token: Token): BadExpression {
    const span = this.span(token.start, Math.max(token.end, token.start));
    const bad: BadExpression = {
      $kind: "BadExpression",
      span,
      text: this.source.slice(token.start, token.end),
      message,
    };
    if (!this.failure) this.failure = bad;
    this.scanner.exhaust();
    return bad;
  }
}

function isOperator(t: Token, op: string): boolean {
  return t.kind === "operator" && t.text === op;
}

function isWord(t: Token, word: string): boolean {
  return t.kind === "identifier" && t.text === word;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/* =======================================================================================
 * Facade
 * ======================================================================================= */

export interface InterpolationSplit {
  strings: string[];
  /** Local [start, end) of each `{{ }}` body, braces excluded. */
  expressions: { start: number; end: number; text: string }[];
}

/** Split `a {{ b }} c` into text and expression pieces; null when there is no `{{`. */
export function splitInterpolation(text: string): InterpolationSplit | null {
  const strings: string[] = [];
  const expressions: InterpolationSplit["expressions"] = [];
  let pos = 0;
  let current = "";
  while (pos < text.length) {
    const open = text.indexOf("{{", pos);
    if (open === -1) break;
    const close = text.indexOf("}}", open + 2);
    if (close === -1) break;
    current += text.slice(pos, open);
    strings.push(current);
    current = "";
    expressions.push({ start: open + 2, end: close, text: text.slice(open + 2, close) });
    pos = close + 2;
  }
  if (expressions.length === 0) return null;
  current += text.slice(pos);
  strings.push(current);
  return { strings, expressions };
}

export class ExpressionParser {
  parseBinding(text: string, context: ExpressionParseContext): ParsedExpression {
    const parser = new CoreParser(text, context, "binding");
    const ast = parser.parseBinding();
    return { ast, errors: collect(parser.error) };
  }

  parseAction(text: string, context: ExpressionParseContext): ParsedExpression {
    const parser = new CoreParser(text, context, "action");
    const ast = parser.parseAction();
    return { ast, errors: collect(parser.error) };
  }

  parseInterpolation(text: string, context: ExpressionParseContext): ParsedExpression<Interpolation> | null {
    const split = splitInterpolation(text);
    if (!split) return null;
    const errors: ExpressionParseError[] = [];
    const expressions = split.expressions.map((piece) => {
      const pieceContext = { offset: context.offset + piece.start, file: context.file ?? null };
      if (piece.text.trim() === "") {
        const span = spanFromBounds(pieceContext.offset, pieceContext.offset + piece.text.length, context.file);
        const message = "Blank expressions are not allowed in interpolated strings";
        errors.push({ message, span });
        const bad: AST = { $kind: "BadExpression", span, text: piece.text, message };
        return bad;
      }
      const parsed = this.parseBinding(piece.text, pieceContext);
      errors.push(...parsed.errors);
      return parsed.ast;
    });
    const span = spanFromBounds(context.offset, context.offset + text.length, context.file);
    return { ast: { $kind: "Interpolation", span, strings: split.strings, expressions }, errors };
  }

  parseTemplateBindings(
    templateKey: { name: string; span: SourceSpan },
    text: string,
    context: ExpressionParseContext,
  ): TemplateBindingParseResult {
    const parser = new CoreParser(text, context, "binding");
    const bindings = parser.parseTemplateBindings(templateKey);
    return { bindings, errors: collect(parser.error) };
  }
}

function collect(error: ExpressionParseError | null): ExpressionParseError[] {
  return error ? [error] : [];
}
