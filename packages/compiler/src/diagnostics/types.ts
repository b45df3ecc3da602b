/** UI severity is a presentation signal that can be tuned by policy without changing code. */
export type DiagnosticSeverity = "error" | "warning" | "info";
/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // Type-check output cannot be trusted.
  | "degraded" // Output continues but some checks are weakened or skipped.
  | "informational"; // No behavioral impact; context only.
/** Actionability communicates how safe automation is (autofix vs guidance vs human). */
export type DiagnosticActionability = "autofix" | "guided" | "manual" | "none";
/** Stage tags where the diagnostic was produced to support routing and suppression. */
export type DiagnosticStage = import("../model/diagnostics.js").DiagnosticStage;
/** Confidence expresses how trustworthy the diagnostic is, separate from severity. */
export type DiagnosticConfidence =
  | "exact" // Deterministic: precise location and cause are known.
  | "high" // Strong evidence, minor uncertainty remains.
  | "partial"; // Some evidence, notable gaps or ambiguity.
/** Some diagnostics require a span, others can be template-scoped. */
export type DiagnosticSpanRequirement =
  | "span" // Must point to a source location to be actionable.
  | "template" // Applies to the template as a whole.
  | "either";
/** Status tracks lifecycle (canonical vs migration cases). */
export type DiagnosticStatus =
  | "canonical" // Stable, preferred code for new usage.
  | "proposed" // Not finalized; may change or be removed.
  | "deprecated"; // Superseded by another code, do not emit.
/** Category is the primary axis for policy and reporting. */
export type DiagnosticCategory =
  | "expression"
  | "template-syntax"
  | "resource-resolution"
  | "type-check"
  | "suggestion";

export type DiagnosticDataBase = {
  /** Indicates results are from recovery paths and may be non-authoritative. */
  recovery?: boolean;
  /** Per-instance confidence can override catalog defaults. */
  confidence?: DiagnosticConfidence;
};

/** Required/optional data fields are validated to catch emitter mistakes. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity, policy, and presentation metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  /** Category drives policy defaults and grouping. */
  readonly category: DiagnosticCategory;
  /** Status controls migration paths and exposure. */
  readonly status: DiagnosticStatus;
  /** Baseline severity before config overrides. */
  readonly defaultSeverity: DiagnosticSeverity;
  /** Impact captures real consequence for suppress/route decisions. */
  readonly impact: DiagnosticImpact;
  /** Actionability signals safe automation level. */
  readonly actionability: DiagnosticActionability;
  /** Enforces whether a source span is mandatory for rendering. */
  readonly span: DiagnosticSpanRequirement;
  /** Stage is the canonical origin for code classification. */
  readonly stages: readonly DiagnosticStage[];
  /** Default confidence communicates trust without per-instance overrides. */
  readonly defaultConfidence?: DiagnosticConfidence;
  /** Human-readable explanation for docs and tooling. */
  readonly description?: string;
  /** Declarative data contract for emitters and validators. */
  readonly data?: DiagnosticDataRequirement;
  /** Phantom slot carrying the data type; never set. */
  readonly __data?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

/** Fallback data shape when exact fields are unknown at compile time. */
export type DiagnosticDataRecord = DiagnosticDataBase & Record<string, unknown>;
/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataRecord>>;
/** Code key type used for emitter typing and normalization. */
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;
/** Maps code -> data shape for strongly-typed emission. */
export type DiagnosticDataByCode<Catalog extends DiagnosticsCatalog> = {
  [K in keyof Catalog]: Catalog[K] extends DiagnosticSpec<infer D> ? D : never;
};
/** Selects the data contract for a specific diagnostic code. */
export type DiagnosticDataFor<Catalog extends DiagnosticsCatalog, Code extends keyof Catalog> =
  Catalog[Code] extends DiagnosticSpec<infer D> ? D : never;
