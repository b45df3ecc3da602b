/* =======================================================================================
 * TEMPLATE PARSER
 * ---------------------------------------------------------------------------------------
 * HTML (parse5, with source locations) → template AST.
 *
 * parse5 lowercases attribute names and decodes entities, so names and expression
 * text are re-read from the original source using the attribute locations. Spans are
 * absolute offsets into `html`.
 * ======================================================================================= */

import { parseFragment } from "parse5";
import type { DefaultTreeAdapterMap, Token } from "parse5";

import type { AST, Interpolation } from "../model/expr.js";
import type {
  TmplBoundAttribute,
  TmplBoundEvent,
  TmplElement,
  TmplNode,
  TmplReference,
  TmplTemplate,
  TmplTextAttribute,
  TmplVariable,
} from "../model/template.js";
import { spanFromBounds, type SourceSpan } from "../model/span.js";
import type { CompilerDiagnostic } from "../model/diagnostics.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { templateDiagnostics } from "../diagnostics/catalog/template.js";
import { debug } from "../shared/debug.js";
import { NOOP_TRACE, TraceAttributes, type CompileTrace } from "../shared/trace.js";
import { ExpressionParser, type ExpressionParseError } from "./expression-parser.js";
import { parseAttributeName } from "./attribute-parser.js";

type P5Node = DefaultTreeAdapterMap["childNode"];
type P5Element = DefaultTreeAdapterMap["element"];
type P5Text = DefaultTreeAdapterMap["textNode"];
type P5ParentNode = DefaultTreeAdapterMap["parentNode"];

export interface ParseTemplateOptions {
  /** Template file name attached to every span. */
  file?: string | null;
  expressionParser?: ExpressionParser;
  trace?: CompileTrace;
}

export interface ParsedTemplate {
  nodes: TmplNode[];
  diagnostics: CompilerDiagnostic[];
  source: string;
  file: string | null;
}

export const NG_TEMPLATE = "ng-template";
export const NG_CONTENT = "ng-content";

/** Raw pieces of one attribute as written in the source. */
interface RawAttribute {
  name: string;
  value: string;
  /** Decoded value as parse5 reports it. */
  decodedValue: string;
  sourceSpan: SourceSpan;
  nameStart: number;
  valueSpan: SourceSpan | null;
}

interface PartitionedAttributes {
  attributes: TmplTextAttribute[];
  inputs: TmplBoundAttribute[];
  outputs: TmplBoundEvent[];
  references: TmplReference[];
  variables: TmplVariable[];
  templateAttr: RawAttribute | null;
  templateKey: { name: string; span: SourceSpan } | null;
}

const emitter = createDiagnosticEmitter(templateDiagnostics, { stage: "parse" });

export function parseTemplate(html: string, options: ParseTemplateOptions = {}): ParsedTemplate {
  const trace = options.trace ?? NOOP_TRACE;
  return trace.span("template.parse", () => {
    const builder = new TemplateBuilder(html, options.file ?? null, options.expressionParser ?? new ExpressionParser());
    const fragment = parseFragment(html, { sourceCodeLocationInfo: true });
    const nodes = builder.visitChildren(fragment);
    trace.setAttributes({
      [TraceAttributes.NODE_COUNT]: nodes.length,
      [TraceAttributes.DIAG_COUNT]: builder.diagnostics.length,
    });
    debug.parse("template.done", { nodes: nodes.length, diagnostics: builder.diagnostics.length });
    return { nodes, diagnostics: builder.diagnostics, source: html, file: options.file ?? null };
  });
}

class TemplateBuilder {
  readonly diagnostics: CompilerDiagnostic[] = [];

  constructor(
    private readonly html: string,
    private readonly file: string | null,
    private readonly parser: ExpressionParser,
  ) {}

  visitChildren(parent: P5ParentNode): TmplNode[] {
    const out: TmplNode[] = [];
    const children = "content" in parent && parent.nodeName === "template" ? parent.content.childNodes : parent.childNodes;
    for (const child of children) {
      const node = this.visitNode(child);
      if (node) out.push(node);
    }
    return out;
  }

  private visitNode(node: P5Node): TmplNode | null {
    if ("tagName" in node) return this.visitElement(node);
    if ("value" in node && node.nodeName === "#text") return this.visitText(node);
    return null;
  }

  private visitText(node: P5Text): TmplNode | null {
    const loc = node.sourceCodeLocation;
    if (!loc) return null;
    // Offsets reference the original text; node.value has \r\n normalized.
    const raw = this.html.slice(loc.startOffset, loc.endOffset);
    const sourceSpan = this.span(loc.startOffset, loc.endOffset);
    const parsed = this.parser.parseInterpolation(raw, { offset: loc.startOffset, file: this.file });
    if (!parsed) return { $kind: "Text", value: node.value, sourceSpan };
    this.reportExprErrors(parsed.errors);
    return { $kind: "BoundText", value: parsed.ast, sourceSpan };
  }

  private visitElement(el: P5Element): TmplNode | null {
    const loc = el.sourceCodeLocation;
    if (!loc) return null;
    const name = this.tagName(el, loc);
    const sourceSpan = this.span(loc.startOffset, loc.endOffset);
    const startSourceSpan = loc.startTag ? this.span(loc.startTag.startOffset, loc.startTag.endOffset) : sourceSpan;
    const endSourceSpan = loc.endTag ? this.span(loc.endTag.startOffset, loc.endTag.endOffset) : null;
    const isTemplate = name === NG_TEMPLATE;
    const attrs = this.partition(el, loc, isTemplate);
    const children = this.visitChildren(el);

    if (name === NG_CONTENT) {
      const select = attrs.attributes.find((a) => a.name === "select");
      return { $kind: "Content", selector: select?.value || "*", attributes: attrs.attributes, children, sourceSpan };
    }

    let parsed: TmplElement | TmplTemplate;
    if (isTemplate) {
      parsed = {
        $kind: "Template",
        tagName: NG_TEMPLATE,
        attributes: attrs.attributes,
        inputs: attrs.inputs,
        outputs: attrs.outputs,
        templateAttrs: [],
        references: attrs.references,
        variables: attrs.variables,
        children,
        sourceSpan,
        startSourceSpan,
        endSourceSpan,
      };
    } else {
      parsed = {
        $kind: "Element",
        name,
        attributes: attrs.attributes,
        inputs: attrs.inputs,
        outputs: attrs.outputs,
        references: attrs.references,
        children,
        sourceSpan,
        startSourceSpan,
        endSourceSpan,
      };
    }

    if (!attrs.templateAttr || !attrs.templateKey) return parsed;
    return this.wrapInlineTemplate(parsed, name, attrs.templateAttr, attrs.templateKey);
  }

  /** `<li *ngFor="let x of xs">` → Template(ngForOf, let-x) around the `<li>`. */
  private wrapInlineTemplate(
    inner: TmplElement | TmplTemplate,
    tagName: string,
    attr: RawAttribute,
    key: { name: string; span: SourceSpan },
  ): TmplTemplate {
    const valueOffset = attr.valueSpan ? attr.valueSpan.start : attr.sourceSpan.end;
    const result = this.parser.parseTemplateBindings(key, attr.value, { offset: valueOffset, file: this.file });
    for (const error of result.errors) {
      this.diagnostics.push(
        emitter.emit("template/microsyntax-error", {
          message: `Invalid microsyntax for '*${key.name}': ${error.message}`,
          span: error.span,
          data: { directive: key.name },
        }),
      );
    }
    const templateAttrs: (TmplBoundAttribute | TmplTextAttribute)[] = [];
    const variables: TmplVariable[] = [];
    for (const binding of result.bindings) {
      if (binding.kind === "variable") {
        variables.push({
          $kind: "Variable",
          name: binding.key,
          value: binding.value,
          sourceSpan: binding.span,
          keySpan: binding.keySpan,
          valueSpan: binding.valueSpan,
        });
      } else if (binding.value) {
        templateAttrs.push({
          $kind: "BoundAttribute",
          name: binding.key,
          type: "property",
          value: binding.value,
          unit: null,
          sourceSpan: binding.span,
          keySpan: binding.keySpan,
          valueSpan: binding.value.span,
        });
      } else {
        templateAttrs.push({
          $kind: "TextAttribute",
          name: binding.key,
          value: "",
          sourceSpan: binding.span,
          keySpan: binding.keySpan,
          valueSpan: null,
        });
      }
    }
    return {
      $kind: "Template",
      tagName,
      attributes: [],
      inputs: [],
      outputs: [],
      templateAttrs,
      references: [],
      variables,
      children: [inner],
      sourceSpan: inner.sourceSpan,
      startSourceSpan: inner.startSourceSpan,
      endSourceSpan: inner.endSourceSpan,
    };
  }

  private partition(el: P5Element, loc: Token.ElementLocation, isTemplate: boolean): PartitionedAttributes {
    const out: PartitionedAttributes = {
      attributes: [],
      inputs: [],
      outputs: [],
      references: [],
      variables: [],
      templateAttr: null,
      templateKey: null,
    };
    for (const p5attr of el.attrs) {
      const attrLoc = loc.attrs?.[p5attr.name];
      if (!attrLoc) continue;
      const raw = this.readAttribute(attrLoc.startOffset, attrLoc.endOffset, p5attr.value);
      const syntax = parseAttributeName(raw.name);
      const keySpan = this.span(raw.nameStart + syntax.targetOffset, raw.nameStart + syntax.targetOffset + syntax.target.length);

      switch (syntax.command) {
        case "property": {
          const type = syntax.bindingType ?? "property";
          const value: AST =
            type === "animation" && syntax.targetOffset === 1
              ? { $kind: "LiteralPrimitive", span: raw.valueSpan ?? keySpan, value: raw.decodedValue }
              : this.parseBinding(raw);
          out.inputs.push({
            $kind: "BoundAttribute",
            name: syntax.target,
            type,
            value,
            unit: syntax.parts.unit ?? null,
            sourceSpan: raw.sourceSpan,
            keySpan,
            valueSpan: raw.valueSpan,
          });
          break;
        }
        case "twoWay": {
          const value = this.parseBinding(raw);
          out.inputs.push({
            $kind: "BoundAttribute",
            name: syntax.target,
            type: "twoWay",
            value,
            unit: null,
            sourceSpan: raw.sourceSpan,
            keySpan,
            valueSpan: raw.valueSpan,
          });
          out.outputs.push({
            $kind: "BoundEvent",
            name: `${syntax.target}Change`,
            type: "twoWay",
            handler: value,
            target: null,
            phase: null,
            sourceSpan: raw.sourceSpan,
            handlerSpan: raw.valueSpan ?? raw.sourceSpan,
            keySpan,
          });
          break;
        }
        case "event": {
          const parsed = this.parser.parseAction(raw.value, { offset: this.valueOffset(raw), file: this.file });
          this.reportExprErrors(parsed.errors);
          out.outputs.push({
            $kind: "BoundEvent",
            name: syntax.target,
            type: syntax.isAnimation ? "animation" : "regular",
            handler: parsed.ast,
            target: syntax.parts.eventTarget ?? null,
            phase: syntax.parts.phase ?? null,
            sourceSpan: raw.sourceSpan,
            handlerSpan: raw.valueSpan ?? raw.sourceSpan,
            keySpan,
          });
          break;
        }
        case "reference":
          out.references.push({
            $kind: "Reference",
            name: syntax.target,
            value: raw.decodedValue,
            sourceSpan: raw.sourceSpan,
            keySpan,
            valueSpan: raw.valueSpan,
          });
          break;
        case "variable":
          if (isTemplate) {
            out.variables.push({
              $kind: "Variable",
              name: syntax.target,
              value: raw.decodedValue || null,
              sourceSpan: raw.sourceSpan,
              keySpan,
              valueSpan: raw.valueSpan,
            });
          } else {
            debug.parse("attr.variable-outside-template", { name: raw.name });
            out.attributes.push(this.textAttribute(raw));
          }
          break;
        case "template":
          if (out.templateAttr) {
            debug.parse("attr.extra-template", { name: raw.name });
            out.attributes.push(this.textAttribute(raw));
          } else {
            out.templateAttr = raw;
            out.templateKey = { name: syntax.target, span: keySpan };
          }
          break;
        case "text": {
          const interpolation = raw.value.includes("{{") ? this.parseAttrInterpolation(raw) : null;
          if (interpolation) {
            out.inputs.push({
              $kind: "BoundAttribute",
              name: raw.name,
              type: "property",
              value: interpolation,
              unit: null,
              sourceSpan: raw.sourceSpan,
              keySpan,
              valueSpan: raw.valueSpan,
            });
          } else {
            out.attributes.push(this.textAttribute(raw));
          }
          break;
        }
      }
    }
    return out;
  }

  private parseBinding(raw: RawAttribute): AST {
    const parsed = this.parser.parseBinding(raw.value, { offset: this.valueOffset(raw), file: this.file });
    this.reportExprErrors(parsed.errors);
    return parsed.ast;
  }

  private parseAttrInterpolation(raw: RawAttribute): Interpolation | null {
    const parsed = this.parser.parseInterpolation(raw.value, { offset: this.valueOffset(raw), file: this.file });
    if (!parsed) return null;
    this.reportExprErrors(parsed.errors);
    return parsed.ast;
  }

  private textAttribute(raw: RawAttribute): TmplTextAttribute {
    return {
      $kind: "TextAttribute",
      name: raw.name,
      value: raw.decodedValue,
      sourceSpan: raw.sourceSpan,
      keySpan: this.span(raw.nameStart, raw.nameStart + raw.name.length),
      valueSpan: raw.valueSpan,
    };
  }

  private valueOffset(raw: RawAttribute): number {
    return raw.valueSpan ? raw.valueSpan.start : raw.sourceSpan.end;
  }

  /** Split `name="value"` as written, keeping the original name case. */
  private readAttribute(start: number, end: number, decodedValue: string): RawAttribute {
    const text = this.html.slice(start, end);
    let i = 0;
    while (i < text.length && !/[\s=]/.test(text.charAt(i))) i++;
    const name = text.slice(0, i);
    const sourceSpan = this.span(start, end);
    const eq = text.indexOf("=", i);
    if (eq === -1) {
      return { name, value: "", decodedValue, sourceSpan, nameStart: start, valueSpan: null };
    }
    let valueStart = eq + 1;
    while (valueStart < text.length && /\s/.test(text.charAt(valueStart))) valueStart++;
    let valueEnd = text.length;
    const quote = text.charAt(valueStart);
    if (quote === '"' || quote === "'") {
      valueStart++;
      if (text.charAt(valueEnd - 1) === quote && valueEnd - 1 >= valueStart) valueEnd--;
    }
    return {
      name,
      value: text.slice(valueStart, valueEnd),
      decodedValue,
      sourceSpan,
      nameStart: start,
      valueSpan: this.span(start + valueStart, start + valueEnd),
    };
  }

  private tagName(el: P5Element, loc: Token.ElementLocation): string {
    const startTag = loc.startTag;
    if (!startTag) return el.tagName;
    const match = /^<\s*([^\s/>]+)/.exec(this.html.slice(startTag.startOffset, startTag.endOffset));
    return match?.[1] ?? el.tagName;
  }

  private reportExprErrors(errors: readonly ExpressionParseError[]): void {
    for (const error of errors) {
      this.diagnostics.push(
        emitter.emit("template/expr-parse-error", {
          message: error.message,
          span: error.span,
          data: { recovery: true },
        }),
      );
    }
  }

  private span(start: number, end: number): SourceSpan {
    return spanFromBounds(start, end, this.file);
  }
}
