// Compiler package public API
//
// Template parsing, directive binding, type-check block generation and the
// TypeScript-backed checker. Import from here rather than deep paths.

// === Facade ===
export { compileTypeCheckBlock, typeCheckTemplate } from "./facade.js";
export type {
  CompileTypeCheckBlockOptions,
  TypeCheckBlockCompilation,
  TypeCheckTemplateOptions,
  TemplateTypeCheckResult,
} from "./facade.js";

// === Model ===
export type * from "./model/expr.js";
export { forEachChild, isImplicitOrThis } from "./model/expr.js";
export type * from "./model/template.js";
export { isHostNode } from "./model/template.js";
export type * from "./model/directive.js";
export { defineDirective, definePipe, hasInput, hasOutput, inputOf, outputOf } from "./model/directive.js";
export type * from "./model/span.js";
export {
  coverSpans,
  normalizeSpan,
  normalizeSpanMaybe,
  offsetSpan,
  spanContains,
  spanContainsOffset,
  spanEquals,
  spanFromBounds,
  spanLength,
  spanText,
} from "./model/span.js";
export type { CompilerDiagnostic, DiagnosticRelated } from "./model/diagnostics.js";

// === Parsing ===
export { ExpressionParser, CoreParser, splitInterpolation } from "./parsing/expression-parser.js";
export type {
  ExpressionParseContext,
  ExpressionParseError,
  ParsedExpression,
  ParseMode,
  TemplateBinding,
  TemplateBindingParseResult,
  InterpolationSplit,
} from "./parsing/expression-parser.js";
export { Scanner, tokenize } from "./parsing/expression-scanner.js";
export type { Token, TokenKind } from "./parsing/expression-scanner.js";
export { AttrSyntax, parseAttributeName } from "./parsing/attribute-parser.js";
export type { AttrCommand } from "./parsing/attribute-parser.js";
export { parseTemplate, NG_TEMPLATE, NG_CONTENT } from "./parsing/template-parser.js";
export type { ParseTemplateOptions, ParsedTemplate } from "./parsing/template-parser.js";

// === Binding ===
export { bindTemplate, matchTargetOf } from "./binding/binder.js";
export type { BindTemplateOptions } from "./binding/binder.js";
export { isDirectiveTarget } from "./binding/bound-target.js";
export type { BoundTarget, BindingConsumer, ExpressionTarget, ReferenceTarget } from "./binding/bound-target.js";
export { parseSelector, matchesSelector, SelectorParseError } from "./binding/selector.js";
export type { SimpleSelector, MatchTarget } from "./binding/selector.js";

// === Type-check blocks ===
export { generateTypeCheckBlock } from "./tcb/generate.js";
export type { GenerateTypeCheckBlockOptions, TypeCheckBlock } from "./tcb/generate.js";
export { Environment } from "./tcb/environment.js";
export { Context } from "./tcb/context.js";
export { Scope } from "./tcb/scope.js";
export { OutOfBandDiagnosticRecorder } from "./tcb/oob.js";
export { executeOp, isOptionalOp, circularFallback, getBoundAttributes, INFER_TYPE_FOR_CIRCULAR_OP_EXPR } from "./tcb/ops.js";
export type { TcbOp, TcbOpKind, TcbBoundAttribute, TcbDirectiveInput } from "./tcb/ops.js";
export { tcbExpression, tcbCreateEventHandler, TcbExpressionTranslator, EVENT_PARAMETER } from "./tcb/expression.js";
export type { EventParamType } from "./tcb/expression.js";
export { widenBinding, unwrapWritableSignal } from "./tcb/widen.js";
export {
  identifier,
  expression,
  text,
  statement,
  expressionStatement,
  block,
  toText,
  CodeBuilder,
  BlockBuilder,
} from "./tcb/code.js";
export type { Identifier, IdentifierTag, Expression, Statement, Block, CodePart, ExpressionOptions } from "./tcb/code.js";
export { printStatements } from "./tcb/printer.js";
export type { PrintResult, SourceMapping } from "./tcb/printer.js";
export { TcbSourceMap } from "./tcb/source-map.js";
export { CORE_MODULE, ANIMATIONS_MODULE, RuntimeSymbols, ATTR_TO_PROP } from "./tcb/runtime-symbols.js";
export type { ExternalSymbol } from "./tcb/runtime-symbols.js";

// === Type checking ===
export {
  resolveTypeCheckingConfig,
  TYPE_CHECKING_PRESETS,
  DEFAULT_PRESET,
} from "./typecheck/config.js";
export type {
  TypeCheckingConfig,
  TypeCheckingConfigInput,
  TypeCheckingPreset,
  ControlFlowPreventingContentProjectionKind,
} from "./typecheck/config.js";
export { TemplateTypeChecker, DEFAULT_COMPILER_OPTIONS } from "./typecheck/ts-host.js";
export type { TemplateTypeCheckerOptions } from "./typecheck/ts-host.js";

// === Diagnostics ===
export * from "./diagnostics/index.js";

// === Shared infrastructure ===
export * from "./shared/index.js";
