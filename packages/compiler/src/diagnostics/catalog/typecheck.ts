import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type MissingPipeData = DiagnosticDataBase & {
  name: string;
};

export type MissingReferenceTargetData = DiagnosticDataBase & {
  name: string;
  value: string;
};

export type DuplicateTemplateVarData = DiagnosticDataBase & {
  name: string;
};

export type DeferredDirectiveData = DiagnosticDataBase & {
  directive: string;
};

export type SplitTwoWayBindingData = DiagnosticDataBase & {
  input: string;
  output: string;
  inputConsumer: string;
  outputConsumer: string;
};

export type SuboptimalTypeInferenceData = DiagnosticDataBase & {
  directive: string;
  variables: readonly string[];
};

export type TcbTypeErrorData = DiagnosticDataBase & {
  /** TypeScript diagnostic code (e.g. 2339). */
  tsCode: number;
};

export const typecheckDiagnostics = {
  "tcb/missing-pipe": defineDiagnostic<MissingPipeData>({
    category: "resource-resolution",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "guided",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "exact",
    description: "A pipe used in an expression is not registered; its result is typed `any`.",
    data: { required: ["name"] },
  }),
  "tcb/missing-reference-target": defineDiagnostic<MissingReferenceTargetData>({
    category: "resource-resolution",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "guided",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "exact",
    description: "No directive on the host exports the name a template reference asks for.",
    data: { required: ["name", "value"] },
  }),
  "tcb/duplicate-template-var": defineDiagnostic<DuplicateTemplateVarData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "exact",
    description: "A template declares the same variable twice; the first declaration wins.",
    data: { required: ["name"] },
  }),
  "tcb/deferred-directive-used-eagerly": defineDiagnostic<DeferredDirectiveData>({
    category: "resource-resolution",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    actionability: "manual",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "exact",
    description: "A directive declared as deferred matches an element outside a deferred block.",
    data: { required: ["directive"] },
  }),
  "tcb/split-two-way-binding": defineDiagnostic<SplitTwoWayBindingData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "exact",
    description: "The input and output halves of a two-way binding are consumed by different targets.",
    data: { required: ["input", "output", "inputConsumer", "outputConsumer"] },
  }),
  "tcb/suboptimal-type-inference": defineDiagnostic<SuboptimalTypeInferenceData>({
    category: "suggestion",
    status: "canonical",
    defaultSeverity: "info",
    impact: "informational",
    actionability: "guided",
    span: "span",
    stages: ["tcb"],
    defaultConfidence: "high",
    description: "Template context guards are disabled, so template variables are typed `any`.",
    data: { required: ["directive", "variables"] },
  }),
  "tcb/type-error": defineDiagnostic<TcbTypeErrorData>({
    category: "type-check",
    status: "canonical",
    defaultSeverity: "error",
    impact: "degraded",
    actionability: "manual",
    span: "span",
    stages: ["typecheck"],
    defaultConfidence: "exact",
    description: "TypeScript reported an error inside the type-check block.",
    data: { required: ["tsCode"] },
  }),
} as const;
