export { defineDiagnostic } from "./types.js";
export type {
  DiagnosticActionability,
  DiagnosticCategory,
  DiagnosticConfidence,
  DiagnosticDataBase,
  DiagnosticDataRecord,
  DiagnosticDataRequirement,
  DiagnosticImpact,
  DiagnosticsCatalog,
  DiagnosticSpanRequirement,
  DiagnosticStage,
  DiagnosticStatus,
  DiagnosticSpec,
} from "./types.js";
export type { DiagnosticSeverity } from "../model/diagnostics.js";
export * from "./emitter.js";
export * from "./catalog/index.js";
