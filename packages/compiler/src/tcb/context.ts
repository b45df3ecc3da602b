import type { BoundTarget } from "../binding/bound-target.js";
import type { PipeMeta } from "../model/directive.js";
import type { SourceSpan } from "../model/span.js";
import { identifier, type Identifier, type IdentifierTag } from "./code.js";
import type { Environment } from "./environment.js";
import type { OutOfBandDiagnosticRecorder } from "./oob.js";

/** State of one block: id counter, the bound template, where diagnostics go. */
export class Context {
  private nextId = 1;

  constructor(
    readonly env: Environment,
    readonly oob: OutOfBandDiagnosticRecorder,
    readonly id: string,
    readonly boundTarget: BoundTarget,
  ) {}

  /** Fresh `_t<n>` identifier, numbered from 1 in allocation order. */
  allocateId(span: SourceSpan | null = null, tag: IdentifierTag | null = null): Identifier {
    return identifier(`_t${this.nextId++}`, span, tag);
  }

  getPipeByName(name: string): PipeMeta | null {
    return this.boundTarget.getPipe(name);
  }
}
