import type { SourceSpan, TextSpan } from "../model/span.js";
import type { Block, CodePart, Statement } from "./code.js";

export interface SourceMapping {
  /** Range in the printed text. */
  generated: TextSpan;
  /** Template range that produced it. */
  source: SourceSpan;
}

export interface PrintResult {
  text: string;
  /** Innermost mappings first; one entry per generated range. */
  mappings: SourceMapping[];
  /** Ranges whose type errors are not reported. */
  ignored: TextSpan[];
}

const INDENT = "  ";

/** Print top-level statements, one per line, blocks indented by two spaces. */
export function printStatements(statements: readonly Statement[]): PrintResult {
  const printer = new Printer();
  for (const stmt of statements) {
    printer.statement(stmt, 0);
    printer.write("\n");
  }
  return printer.result();
}

class Printer {
  private out = "";
  private readonly mappings: SourceMapping[] = [];
  private readonly seen = new Set<string>();
  private readonly ignored: TextSpan[] = [];

  write(text: string): void {
    this.out += text;
  }

  statement(stmt: Statement, level: number): void {
    for (const part of stmt.parts) this.part(part, level);
  }

  result(): PrintResult {
    return { text: this.out, mappings: this.mappings, ignored: this.ignored };
  }

  private part(part: CodePart, level: number): void {
    if (typeof part === "string") {
      this.write(part);
      return;
    }
    switch (part.$kind) {
      case "Identifier":
        this.write(part.name);
        return;
      case "Block":
        this.block(part, level);
        return;
      case "Expression": {
        const start = this.out.length;
        for (const child of part.parts) this.part(child, level);
        const end = this.out.length;
        if (part.ignoreDiagnostics) this.ignored.push({ start, end });
        if (part.span) this.map({ start, end }, part.span);
        return;
      }
    }
  }

  private block(block: Block, level: number): void {
    if (block.statements.length === 0) {
      this.write("{}");
      return;
    }
    this.write("{\n");
    const pad = INDENT.repeat(level + 1);
    for (const stmt of block.statements) {
      this.write(pad);
      this.statement(stmt, level + 1);
      this.write("\n");
    }
    this.write(`${INDENT.repeat(level)}}`);
  }

  /** Children print first, so the first mapping for a range is the innermost. */
  private map(generated: TextSpan, source: SourceSpan): void {
    const key = `${generated.start}:${generated.end}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.mappings.push({ generated, source });
  }
}
