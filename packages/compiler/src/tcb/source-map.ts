import { spanContains, spanContainsOffset, spanEquals, spanLength, type SourceSpan, type TextSpan } from "../model/span.js";
import type { SourceMapping } from "./printer.js";

/**
 * Maps ranges of a printed type-check block back to template ranges and forward.
 * Offsets are relative to the start of the block text.
 */
export class TcbSourceMap {
  readonly entries: readonly SourceMapping[];

  constructor(
    mappings: readonly SourceMapping[],
    private readonly ignored: readonly TextSpan[] = [],
  ) {
    this.entries = [...mappings].sort(
      (a, b) => a.generated.start - b.generated.start || spanLength(a.generated) - spanLength(b.generated),
    );
  }

  /**
   * Template range for a generated range: the innermost mapping containing it.
   * When the mapping's generated and source texts have the same length (a name
   * copied verbatim), the offsets inside it are projected.
   */
  toSourceSpan(generated: TextSpan): SourceSpan | null {
    let best: SourceMapping | null = null;
    for (const entry of this.entries) {
      if (entry.generated.start > generated.start) break;
      if (!spanContains(entry.generated, generated)) continue;
      if (!best || spanLength(entry.generated) < spanLength(best.generated)) best = entry;
    }
    if (!best) return null;
    if (spanEquals(best.generated, generated)) return best.source;
    if (spanLength(best.generated) === spanLength(best.source)) {
      const delta = best.source.start - best.generated.start;
      return { ...best.source, start: generated.start + delta, end: generated.end + delta };
    }
    return best.source;
  }

  /** Generated ranges whose mapping points exactly at `source`. */
  toGeneratedSpans(source: TextSpan): TextSpan[] {
    return this.entries.filter((e) => spanEquals(e.source, source)).map((e) => e.generated);
  }

  isIgnored(offset: number): boolean {
    return this.ignored.some((span) => spanContainsOffset(span, offset));
  }
}
