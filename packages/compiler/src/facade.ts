/* =======================================================================================
 * FACADE
 * ---------------------------------------------------------------------------------------
 * parse → bind → generate, and optionally type-check the result against the component
 * source. Each stage can also be driven on its own (see index.ts).
 * ======================================================================================= */

import { bindTemplate } from "./binding/binder.js";
import type { BoundTarget } from "./binding/bound-target.js";
import type { CompilerDiagnostic } from "./model/diagnostics.js";
import type { ComponentMeta, DirectiveMeta, PipeMeta } from "./model/directive.js";
import type { ExpressionParser } from "./parsing/expression-parser.js";
import { parseTemplate, type ParsedTemplate } from "./parsing/template-parser.js";
import { hasErrors } from "./shared/diagnostics.js";
import type { Logger } from "./shared/logger.js";
import { NOOP_TRACE, TraceAttributes, type CompileTrace } from "./shared/trace.js";
import { Environment } from "./tcb/environment.js";
import { generateTypeCheckBlock, type TypeCheckBlock } from "./tcb/generate.js";
import { OutOfBandDiagnosticRecorder } from "./tcb/oob.js";
import { resolveTypeCheckingConfig, type TypeCheckingConfig, type TypeCheckingConfigInput } from "./typecheck/config.js";
import { TemplateTypeChecker } from "./typecheck/ts-host.js";
import type ts from "typescript";

export interface CompileTypeCheckBlockOptions {
  /** Component class; a bare name is a class declared in the component source. */
  component: ComponentMeta | string;
  directives?: readonly DirectiveMeta[];
  pipes?: readonly PipeMeta[];
  config?: TypeCheckingConfigInput;
  /** Template file name attached to spans. */
  file?: string;
  /** Template id; the component name by default. */
  id?: string;
  expressionParser?: ExpressionParser;
  trace?: CompileTrace;
}

export interface TypeCheckBlockCompilation {
  template: ParsedTemplate;
  boundTarget: BoundTarget;
  config: TypeCheckingConfig;
  block: TypeCheckBlock;
  /** Parse diagnostics followed by those recorded while generating. */
  diagnostics: CompilerDiagnostic[];
}

/** Parse, bind and generate the type-check block of one template. */
export function compileTypeCheckBlock(html: string, options: CompileTypeCheckBlockOptions): TypeCheckBlockCompilation {
  const trace = options.trace ?? NOOP_TRACE;
  return trace.span("compile.tcb", () => {
    const component = typeof options.component === "string" ? componentOf(options.component) : options.component;
    const config = resolveTypeCheckingConfig(options.config);
    const template = parseTemplate(html, {
      file: options.file ?? null,
      ...(options.expressionParser ? { expressionParser: options.expressionParser } : {}),
      trace,
    });
    const boundTarget = bindTemplate(template.nodes, {
      directives: options.directives ?? [],
      pipes: options.pipes ?? [],
      trace,
    });
    const block = generateTypeCheckBlock({
      id: options.id ?? component.name,
      component,
      boundTarget,
      env: new Environment(config),
      oob: new OutOfBandDiagnosticRecorder(),
      trace,
    });
    const diagnostics = [...template.diagnostics, ...block.diagnostics];
    trace.setAttributes({
      [TraceAttributes.DIAG_COUNT]: diagnostics.length,
      [TraceAttributes.DIAG_ERROR_COUNT]: diagnostics.filter((d) => (d.severity ?? "error") === "error").length,
    });
    return { template, boundTarget, config, block, diagnostics };
  });
}

export interface TypeCheckTemplateOptions extends CompileTypeCheckBlockOptions {
  /** Component source file; its classes are visible to the block. */
  componentSource: string;
  componentFileName: string;
  compilerOptions?: ts.CompilerOptions;
  logger?: Logger;
}

export interface TemplateTypeCheckResult extends TypeCheckBlockCompilation {
  checker: TemplateTypeChecker;
  /** Every diagnostic: parse, generation, then TypeScript's mapped back to the template. */
  diagnostics: CompilerDiagnostic[];
  hasErrors: boolean;
}

/** Generate the block and type-check it with TypeScript. */
export function typeCheckTemplate(html: string, options: TypeCheckTemplateOptions): TemplateTypeCheckResult {
  const trace = options.trace ?? NOOP_TRACE;
  const compilation = compileTypeCheckBlock(html, options);
  const checker = new TemplateTypeChecker({
    fileName: options.componentFileName,
    componentSource: options.componentSource,
    block: compilation.block,
    ...(options.compilerOptions ? { compilerOptions: options.compilerOptions } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
    trace,
  });
  const diagnostics = [...compilation.diagnostics, ...checker.getDiagnostics()];
  return { ...compilation, checker, diagnostics, hasErrors: hasErrors(diagnostics) };
}

function componentOf(name: string): ComponentMeta {
  return { name, typeParameters: [], ref: { name } };
}
