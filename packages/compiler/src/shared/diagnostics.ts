import { normalizeSpanMaybe, type SourceSpan } from "../model/span.js";

// Re-export foundation types from model
export type {
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  CompilerDiagnostic,
} from "../model/diagnostics.js";

import type { DiagnosticSeverity, DiagnosticStage, DiagnosticRelated, CompilerDiagnostic } from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  span?: SourceSpan | null | undefined;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder that normalizes spans. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): CompilerDiagnostic<TCode, TData> {
  const span = normalizeSpanMaybe(input.span);
  const diag: CompilerDiagnostic<TCode, TData> = {
    code: input.code,
    message: input.message,
    stage: input.stage,
    ...(input.severity ? { severity: input.severity } : {}),
    span,
    ...(input.related ? { related: input.related } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
  return diag;
}

/** Severity after catalog defaults; diagnostics without one are errors. */
export function effectiveSeverity(diag: CompilerDiagnostic): DiagnosticSeverity {
  return diag.severity ?? "error";
}

export function hasErrors(diags: readonly CompilerDiagnostic[]): boolean {
  return diags.some((d) => effectiveSeverity(d) === "error");
}
