/* =======================================================================================
 * TEMPLATE TYPE CHECKER (type-check block → TypeScript diagnostics)
 * ---------------------------------------------------------------------------------------
 * Appends a generated block to the component's source in an in-memory shim file,
 * type-checks it with the TypeScript compiler API and maps every diagnostic inside the
 * block back to the template through the block's source map. Diagnostics in ranges
 * marked to be ignored, or with no mapping, are dropped.
 * ======================================================================================= */

import path from "node:path";
import ts from "typescript";
import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { SourceSpan, TextSpan } from "../model/span.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { typecheckDiagnostics } from "../diagnostics/catalog/typecheck.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../shared/logger.js";
import { NOOP_TRACE, TraceAttributes, type CompileTrace } from "../shared/trace.js";
import type { TypeCheckBlock } from "../tcb/generate.js";

export interface TemplateTypeCheckerOptions {
  /** Path of the component source file; the shim is created beside it. */
  fileName: string;
  /** Component source the block's `this` type and directive classes come from. */
  componentSource: string;
  block: TypeCheckBlock;
  compilerOptions?: ts.CompilerOptions;
  logger?: Logger;
  trace?: CompileTrace;
}

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2020,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  lib: ["lib.es2020.d.ts", "lib.dom.d.ts"],
  types: [],
  strict: true,
  noEmit: true,
  skipLibCheck: true,
};

const BLOCK_SEPARATOR = "\n\n";

export class TemplateTypeChecker {
  readonly shimFileName: string;
  /** Offset of the block inside the shim file. */
  readonly blockOffset: number;
  private readonly shimText: string;
  private readonly logger: Logger;
  private readonly trace: CompileTrace;
  private program: ts.Program | null = null;

  constructor(private readonly options: TemplateTypeCheckerOptions) {
    this.shimFileName = path.resolve(options.fileName.replace(/\.tsx?$/, "")) + ".tcb.ts";
    this.blockOffset = options.componentSource.length + BLOCK_SEPARATOR.length;
    this.shimText = options.componentSource + BLOCK_SEPARATOR + options.block.text;
    this.logger = options.logger ?? nullLogger;
    this.trace = options.trace ?? NOOP_TRACE;
  }

  /** Full text handed to TypeScript. */
  get shimSource(): string {
    return this.shimText;
  }

  getDiagnostics(): CompilerDiagnostic[] {
    return this.trace.span("typecheck.diagnostics", () => {
      const program = this.getProgram();
      const sf = program.getSourceFile(this.shimFileName);
      if (!sf) throw new Error(`Shim file '${this.shimFileName}' is missing from the program`);

      const emitter = createDiagnosticEmitter(typecheckDiagnostics, { stage: "typecheck" });
      const result: CompilerDiagnostic[] = [];
      const raw = [...program.getSyntacticDiagnostics(sf), ...program.getSemanticDiagnostics(sf)];
      for (const diag of raw) {
        if (diag.start === undefined) continue;
        const local = diag.start - this.blockOffset;
        const message = ts.flattenDiagnosticMessageText(diag.messageText, "\n");
        if (local < 0) {
          this.logger.warn(`component source: TS${diag.code} ${message}`);
          continue;
        }
        if (this.options.block.sourceMap.isIgnored(local)) continue;
        const span = this.toTemplateSpan(diag.start, diag.length ?? 0);
        if (!span) {
          debug.typecheck("diagnostic.unmapped", { code: diag.code, start: local, message });
          continue;
        }
        result.push(
          emitter.emit("tcb/type-error", {
            message,
            span,
            severity: diag.category === ts.DiagnosticCategory.Warning ? "warning" : "error",
            data: { tsCode: diag.code },
          }),
        );
      }
      this.trace.setAttributes({
        [TraceAttributes.FILE_PATH]: this.shimFileName,
        [TraceAttributes.DIAG_COUNT]: result.length,
        [TraceAttributes.DIAG_ERROR_COUNT]: result.filter((d) => d.severity !== "warning").length,
      });
      return result;
    });
  }

  /** Template range for a range of the shim file; null outside the block or unmapped. */
  toTemplateSpan(start: number, length: number): SourceSpan | null {
    const local = start - this.blockOffset;
    if (local < 0) return null;
    return this.options.block.sourceMap.toSourceSpan({ start: local, end: local + length });
  }

  /**
   * Type TypeScript infers for the expression generated from a template range, or null
   * when nothing in the block maps to it exactly.
   */
  getTypeAtSpan(span: TextSpan): string | null {
    const generated = this.options.block.sourceMap.toGeneratedSpans(span);
    if (generated.length === 0) return null;
    const widest = generated.reduce((a, b) => (b.end - b.start > a.end - a.start ? b : a));
    const program = this.getProgram();
    const sf = program.getSourceFile(this.shimFileName);
    if (!sf) return null;
    const node = findNode(sf, widest.start + this.blockOffset, widest.end + this.blockOffset);
    if (!node) return null;
    const checker = program.getTypeChecker();
    return checker.typeToString(checker.getTypeAtLocation(node));
  }

  private getProgram(): ts.Program {
    if (this.program) return this.program;
    const compilerOptions = { ...DEFAULT_COMPILER_OPTIONS, ...this.options.compilerOptions };
    const baseHost = ts.createCompilerHost(compilerOptions);
    const shimFileName = this.shimFileName;
    const shimText = this.shimText;
    const isShim = (fileName: string): boolean => path.resolve(fileName) === shimFileName;

    const host: ts.CompilerHost = {
      ...baseHost,
      fileExists: (fileName) => isShim(fileName) || baseHost.fileExists(fileName),
      readFile: (fileName) => (isShim(fileName) ? shimText : baseHost.readFile(fileName)),
      getSourceFile: (fileName, languageVersion, onError, shouldCreateNewSourceFile) => {
        if (isShim(fileName)) return ts.createSourceFile(fileName, shimText, languageVersion, true);
        return baseHost.getSourceFile(fileName, languageVersion, onError, shouldCreateNewSourceFile);
      },
    };
    this.program = this.trace.span("typecheck.program", () => ts.createProgram([shimFileName], compilerOptions, host));
    debug.typecheck("program.created", { shim: shimFileName, length: shimText.length });
    return this.program;
  }
}

/** Outermost node spanning exactly [start, end). */
function findNode(root: ts.Node, start: number, end: number): ts.Node | null {
  let found: ts.Node | null = null;
  const visit = (node: ts.Node): void => {
    if (found) return;
    const nodeStart = node.getStart();
    if (nodeStart === start && node.getEnd() === end) {
      found = node;
      return;
    }
    if (nodeStart <= start && end <= node.getEnd()) ts.forEachChild(node, visit);
  };
  ts.forEachChild(root, visit);
  return found;
}
