/* =======================================================================================
 * SPANS
 * ---------------------------------------------------------------------------------------
 * Half-open [start, end) offset ranges. `SourceSpan` points into a template file,
 * `TextSpan` into generated text (a type-check block or the shim file holding it).
 * ======================================================================================= */

export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

export interface SourceSpan extends TextSpan {
  /** Template file the span belongs to, when known. */
  readonly file?: string;
}

export function spanLength(span: TextSpan): number {
  return span.end - span.start;
}

export function spanFromBounds(start: number, end: number, file?: string | null): SourceSpan {
  return file ? { start, end, file } : { start, end };
}

/** Rebase a local span by `delta`, keeping its file tag. */
export function offsetSpan<T extends TextSpan>(span: T, delta: number): T {
  return { ...span, start: span.start + delta, end: span.end + delta };
}

/** Swap reversed bounds and clamp negatives. */
export function normalizeSpan<T extends TextSpan>(span: T): T {
  let start = Math.max(0, span.start);
  let end = Math.max(0, span.end);
  if (end < start) [start, end] = [end, start];
  if (start === span.start && end === span.end) return span;
  return { ...span, start, end };
}

export function normalizeSpanMaybe<T extends TextSpan>(span: T | null | undefined): T | null {
  return span ? normalizeSpan(span) : null;
}

export function spanContains(outer: TextSpan, inner: TextSpan): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function spanContainsOffset(span: TextSpan, offset: number): boolean {
  return span.start <= offset && offset < span.end;
}

export function spanEquals(a: TextSpan | null | undefined, b: TextSpan | null | undefined): boolean {
  if (!a || !b) return a === b;
  return a.start === b.start && a.end === b.end;
}

/** Smallest span covering both inputs. */
export function coverSpans<T extends TextSpan>(a: T, b: TextSpan): T {
  return { ...a, start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

export function spanText(source: string, span: TextSpan): string {
  return source.slice(span.start, span.end);
}
