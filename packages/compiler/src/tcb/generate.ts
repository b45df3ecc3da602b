/* =======================================================================================
 * GENERATE (BoundTarget → type-check block)
 * ---------------------------------------------------------------------------------------
 * Wraps the statements of the root scope in
 *
 *   function _tcb_<id><T...>(this: Component<T...>) { ... }
 *
 * preceded by the environment's prelude (imports, type constructors, pipe instances),
 * and prints the result with its source map.
 * ======================================================================================= */

import type { BoundTarget } from "../binding/bound-target.js";
import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { ComponentMeta } from "../model/directive.js";
import type { TmplNode } from "../model/template.js";
import { debug } from "../shared/debug.js";
import { NOOP_TRACE, TraceAttributes, type CompileTrace } from "../shared/trace.js";
import { statement, type Statement } from "./code.js";
import { Context } from "./context.js";
import type { Environment } from "./environment.js";
import { OutOfBandDiagnosticRecorder } from "./oob.js";
import { printStatements } from "./printer.js";
import { Scope } from "./scope.js";
import { TcbSourceMap } from "./source-map.js";
import { anyTypeArguments, typeArgumentList, typeParameterList } from "./ts-util.js";

export interface GenerateTypeCheckBlockOptions {
  /** Template id; names the block function and keys out-of-band diagnostics. */
  id: string;
  component: ComponentMeta;
  boundTarget: BoundTarget;
  /** Root nodes; those of the bound target by default. */
  nodes?: readonly TmplNode[];
  env: Environment;
  /** Shared across blocks of one pass; a fresh recorder by default. */
  oob?: OutOfBandDiagnosticRecorder;
  trace?: CompileTrace;
}

export interface TypeCheckBlock {
  /** Name of the generated function. */
  name: string;
  /** Prelude statements followed by the function. */
  statements: readonly Statement[];
  /** Printed code; offsets in `sourceMap` are relative to its start. */
  text: string;
  sourceMap: TcbSourceMap;
  /** Out-of-band diagnostics recorded while generating. */
  diagnostics: readonly CompilerDiagnostic[];
}

export function generateTypeCheckBlock(options: GenerateTypeCheckBlockOptions): TypeCheckBlock {
  const trace = options.trace ?? NOOP_TRACE;
  return trace.span("tcb.generate", () => {
    const { id, component, boundTarget, env } = options;
    const oob = options.oob ?? new OutOfBandDiagnosticRecorder();
    const ctx = new Context(env, oob, id, boundTarget);

    const scope = Scope.forNodes(ctx, null, null, options.nodes ?? boundTarget.nodes, null);
    const body = scope.render();

    const name = `_tcb_${id.replace(/[^\w$]/g, "_")}`;
    const thisType = env.reference(component.ref);
    const params = component.typeParameters;
    const useGenerics = env.config.useContextGenericType && params.length > 0;
    const typeParams = useGenerics ? typeParameterList(params) : "";
    const typeArgs = useGenerics ? typeArgumentList(params) : anyTypeArguments(params.length);

    const fn = statement((b) =>
      b
        .append(`function ${name}${typeParams}(this: `)
        .append(thisType)
        .append(`${typeArgs}) `)
        .block((block) => {
          for (const stmt of body) block.add(stmt);
        }),
    );
    // Ops add type constructors and pipes to the prelude as they run.
    const statements = [...env.getPreludeStatements(), fn];
    const printed = printStatements(statements);
    const sourceMap = new TcbSourceMap(printed.mappings, printed.ignored);

    trace.setAttributes({
      [TraceAttributes.TEMPLATE]: id,
      [TraceAttributes.STATEMENT_COUNT]: body.length,
      [TraceAttributes.MAPPING_COUNT]: printed.mappings.length,
      [TraceAttributes.TEXT_LENGTH]: printed.text.length,
    });
    debug.tcb("generated", { id, statements: body.length, mappings: printed.mappings.length });

    return { name, statements, text: printed.text, sourceMap, diagnostics: oob.diagnostics };
  });
}
