import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type ExprParseErrorData = DiagnosticDataBase & {
  recovery: boolean;
};

export type MicrosyntaxErrorData = DiagnosticDataBase & {
  directive: string;
};

export const templateDiagnostics = {
  "template/expr-parse-error": defineDiagnostic<ExprParseErrorData>({
    category: "expression",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["parse"],
    defaultConfidence: "exact",
    description: "Expression parsing failed; the binding is checked as `undefined`.",
    data: {
      required: ["recovery"],
    },
  }),
  "template/microsyntax-error": defineDiagnostic<MicrosyntaxErrorData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["parse"],
    defaultConfidence: "exact",
    description: "A structural directive shorthand (`*dir=\"...\"`) could not be parsed.",
    data: {
      required: ["directive"],
    },
  }),
} as const;
