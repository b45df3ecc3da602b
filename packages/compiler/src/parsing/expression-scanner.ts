/* =======================================================================================
 * EXPRESSION SCANNER
 * ---------------------------------------------------------------------------------------
 * Splits a binding expression into tokens with local [start, end) offsets.
 * Contextual words (`let`, `as`, `of`) stay identifiers; the parser decides.
 * ======================================================================================= */

export type TokenKind =
  | "identifier"
  | "keyword"
  | "number"
  | "string"
  | "operator"
  | "eof"
  | "error";

export interface Token {
  readonly kind: TokenKind;
  /** Raw source text; for strings the unescaped value lives in `value`. */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly value: string | number | null;
}

const KEYWORDS = new Set(["this", "null", "undefined", "true", "false", "typeof"]);

/** Longest first, so `!==` wins over `!=` and `!`. */
const OPERATORS = [
  "===", "!==",
  "==", "!=", "<=", ">=", "&&", "||", "??", "?.",
  "+", "-", "*", "/", "%", "<", ">", "!", "=", "?", ":", ".", ",", ";", "|",
  "(", ")", "[", "]", "{", "}",
];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
};

export class Scanner {
  private readonly tokens: Token[];
  private index = 0;

  constructor(private readonly source: string) {
    this.tokens = tokenize(source);
  }

  peek(ahead = 0): Token {
    return this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)] ?? eofToken(this.source.length);
  }

  next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return token;
  }

  /** Jump to the end so every later peek sees EOF. */
  exhaust(): void {
    this.index = this.tokens.length - 1;
  }
}

export function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_$]/.test(ch);
}

export function isIdentifierPart(ch: string): boolean {
  return /[A-Za-z0-9_$]/.test(ch);
}

function eofToken(at: number): Token {
  return { kind: "eof", text: "", start: at, end: at, value: null };
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  const length = source.length;

  while (pos < length) {
    const ch = source.charAt(pos);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const start = pos;

    if (isIdentifierStart(ch)) {
      while (pos < length && isIdentifierPart(source.charAt(pos))) pos++;
      const text = source.slice(start, pos);
      tokens.push({ kind: KEYWORDS.has(text) ? "keyword" : "identifier", text, start, end: pos, value: text });
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(source.charAt(pos + 1)))) {
      pos = scanNumber(source, pos);
      const text = source.slice(start, pos);
      tokens.push({ kind: "number", text, start, end: pos, value: Number(text) });
      continue;
    }

    if (ch === "'" || ch === '"') {
      const scanned = scanString(source, pos, ch);
      if (scanned.error) {
        tokens.push({ kind: "error", text: source.slice(start, scanned.end), start, end: scanned.end, value: scanned.error });
        break;
      }
      tokens.push({ kind: "string", text: source.slice(start, scanned.end), start, end: scanned.end, value: scanned.value });
      pos = scanned.end;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, pos));
    // `?.` followed by a digit is a conditional with a decimal (`a ?.5 : 1`).
    if (op && !(op === "?." && /[0-9]/.test(source.charAt(pos + 2)))) {
      pos += op.length;
      tokens.push({ kind: "operator", text: op, start, end: pos, value: null });
      continue;
    }
    if (op === "?.") {
      pos += 1;
      tokens.push({ kind: "operator", text: "?", start, end: pos, value: null });
      continue;
    }

    tokens.push({ kind: "error", text: ch, start, end: pos + 1, value: `Unexpected character '${ch}'` });
    break;
  }

  tokens.push(eofToken(length));
  return tokens;
}

function scanNumber(source: string, pos: number): number {
  while (/[0-9]/.test(source.charAt(pos))) pos++;
  if (source.charAt(pos) === "." && /[0-9]/.test(source.charAt(pos + 1))) {
    pos++;
    while (/[0-9]/.test(source.charAt(pos))) pos++;
  }
  if (/[eE]/.test(source.charAt(pos))) {
    const sign = /[+-]/.test(source.charAt(pos + 1)) ? 1 : 0;
    if (/[0-9]/.test(source.charAt(pos + 1 + sign))) {
      pos += 1 + sign;
      while (/[0-9]/.test(source.charAt(pos))) pos++;
    }
  }
  return pos;
}

function scanString(source: string, pos: number, quote: string): { end: number; value: string; error: string | null } {
  let value = "";
  pos++;
  while (pos < source.length) {
    const ch = source.charAt(pos);
    if (ch === quote) {
      return { end: pos + 1, value, error: null };
    }
    if (ch === "\\") {
      const esc = source.charAt(pos + 1);
      if (esc === "u") {
        const hex = source.slice(pos + 2, pos + 6);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          return { end: pos + 2, value, error: `Invalid unicode escape [\\u${hex}]` };
        }
        value += String.fromCharCode(parseInt(hex, 16));
        pos += 6;
        continue;
      }
      value += ESCAPES[esc] ?? esc;
      pos += 2;
      continue;
    }
    value += ch;
    pos++;
  }
  return { end: pos, value, error: "Unterminated quote" };
}
