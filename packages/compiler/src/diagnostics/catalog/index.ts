import type { DiagnosticDataByCode as CatalogDataByCode, DiagnosticsCatalog } from "../types.js";
import { templateDiagnostics } from "./template.js";
import { typecheckDiagnostics } from "./typecheck.js";

export const diagnosticsCatalog = {
  ...templateDiagnostics,
  ...typecheckDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type DiagnosticsCatalogType = typeof diagnosticsCatalog;
export type DiagnosticCodeOf = keyof DiagnosticsCatalogType & string;
export type DiagnosticDataByCode = CatalogDataByCode<DiagnosticsCatalogType>;

export { templateDiagnostics, typecheckDiagnostics };
export type * from "./template.js";
export type * from "./typecheck.js";
