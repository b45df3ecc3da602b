/* =======================================================================================
 * CSS SELECTORS (directive matching)
 * ---------------------------------------------------------------------------------------
 * The subset directives use: `tag`, `[attr]`, `[attr=value]`, `.class`, `:not(...)`,
 * and comma-separated alternatives. Tag names match case-insensitively, attribute
 * names and values exactly.
 * ======================================================================================= */

export interface SimpleSelector {
  element: string | null;
  /** `[name]` has `value: null`. */
  attrs: { name: string; value: string | null }[];
  classNames: string[];
  notSelectors: SimpleSelector[];
}

/** What a template node exposes to selector matching. */
export interface MatchTarget {
  element: string;
  /** Attribute name → value; bindings contribute an empty value. */
  attrs: ReadonlyMap<string, string>;
}

export class SelectorParseError extends Error {
  constructor(message: string, public readonly selector: string) {
    super(message);
    this.name = "SelectorParseError";
  }
}

const cache = new Map<string, SimpleSelector[]>();

/** Parse a selector list; results are cached per source text. */
export function parseSelector(selector: string): SimpleSelector[] {
  const cached = cache.get(selector);
  if (cached) return cached;
  const parsed = splitTopLevel(selector, ",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parseSimple(part, selector));
  cache.set(selector, parsed);
  return parsed;
}

function parseSimple(text: string, full: string): SimpleSelector {
  const result: SimpleSelector = { element: null, attrs: [], classNames: [], notSelectors: [] };
  let pos = 0;
  const readName = (): string => {
    const start = pos;
    while (pos < text.length && /[\w\-$:@*]/.test(text.charAt(pos)) && !text.startsWith(":not(", pos)) pos++;
    return text.slice(start, pos);
  };

  while (pos < text.length) {
    const ch = text.charAt(pos);
    if (ch === ".") {
      pos++;
      const name = readName();
      if (!name) throw new SelectorParseError(`Expected a class name in '${full}'`, full);
      result.classNames.push(name);
    } else if (ch === "[") {
      const close = text.indexOf("]", pos);
      if (close === -1) throw new SelectorParseError(`Unterminated attribute selector in '${full}'`, full);
      const body = text.slice(pos + 1, close);
      const eq = body.indexOf("=");
      if (eq === -1) {
        result.attrs.push({ name: body.trim(), value: null });
      } else {
        result.attrs.push({ name: body.slice(0, eq).trim(), value: unquote(body.slice(eq + 1).trim()) });
      }
      pos = close + 1;
    } else if (text.startsWith(":not(", pos)) {
      const open = pos + ":not(".length;
      const close = findClosingParen(text, open);
      if (close === -1) throw new SelectorParseError(`Unterminated :not() in '${full}'`, full);
      result.notSelectors.push(parseSimple(text.slice(open, close).trim(), full));
      pos = close + 1;
    } else if (/\s/.test(ch)) {
      throw new SelectorParseError(`Nested selectors are not supported in '${full}'`, full);
    } else {
      const name = readName();
      if (!name) throw new SelectorParseError(`Unexpected '${ch}' in '${full}'`, full);
      result.element = name === "*" ? null : name.toLowerCase();
    }
  }
  return result;
}

export function matchesSelector(selector: string, target: MatchTarget): boolean {
  return parseSelector(selector).some((simple) => matchesSimple(simple, target));
}

function matchesSimple(selector: SimpleSelector, target: MatchTarget): boolean {
  if (selector.element !== null && selector.element !== target.element.toLowerCase()) return false;
  for (const attr of selector.attrs) {
    const value = target.attrs.get(attr.name);
    if (value === undefined) return false;
    if (attr.value !== null && attr.value !== value) return false;
  }
  if (selector.classNames.length > 0) {
    const classes = new Set((target.attrs.get("class") ?? "").split(/\s+/).filter(Boolean));
    if (!selector.classNames.every((c) => classes.has(c))) return false;
  }
  return !selector.notSelectors.some((not) => matchesSimple(not, target));
}

function unquote(value: string): string {
  const first = value.charAt(0);
  if ((first === '"' || first === "'") && value.endsWith(first) && value.length >= 2) {
    return value.slice(1, -1);
  }
  return value;
}

function findClosingParen(text: string, from: number): number {
  let depth = 1;
  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "(") depth++;
    else if (ch === ")" && --depth === 0) return i;
  }
  return -1;
}

function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "(" || ch === "[") depth++;
    else if (ch === ")" || ch === "]") depth--;
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts;
}
