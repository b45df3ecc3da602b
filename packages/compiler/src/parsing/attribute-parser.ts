import type { BindingType } from "../model/template.js";

export type AttrCommand =
  | "property"
  | "twoWay"
  | "event"
  | "reference"
  | "variable"
  | "template"
  | "text";

/** Result of parsing an attribute name. */
export class AttrSyntax {
  constructor(
    public readonly rawName: string,
    /** e.g. `value` for `[value]`, `click` for `(click)`, `fade` for `(@fade.done)`. */
    public readonly target: string,
    public readonly command: AttrCommand,
    /** Offset of `target` inside `rawName`; 0 for plain attributes. */
    public readonly targetOffset: number,
    public readonly bindingType: BindingType | null = null,
    /** Style unit, event phase (animations) or global event target. */
    public readonly parts: { unit?: string; phase?: string; eventTarget?: string } = {},
  ) {}

  get isAnimation(): boolean {
    return this.bindingType === "animation";
  }
}

/* ---------- Patterns ---------- */

/** `[(x)]`, `[x]`, `(x)` and the canonical `bindon-` / `bind-` / `on-` prefixes. */
interface SyntaxPattern {
  readonly prefix: string;
  readonly suffix: string;
  readonly command: AttrCommand;
}

// Order matters: `[(` must be tried before `[` and `(`.
const PATTERNS: readonly SyntaxPattern[] = [
  { prefix: "[(", suffix: ")]", command: "twoWay" },
  { prefix: "bindon-", suffix: "", command: "twoWay" },
  { prefix: "[", suffix: "]", command: "property" },
  { prefix: "bind-", suffix: "", command: "property" },
  { prefix: "(", suffix: ")", command: "event" },
  { prefix: "on-", suffix: "", command: "event" },
  { prefix: "#", suffix: "", command: "reference" },
  { prefix: "ref-", suffix: "", command: "reference" },
  { prefix: "let-", suffix: "", command: "variable" },
  { prefix: "*", suffix: "", command: "template" },
];

const ANIMATION_PREFIX = "@";

export function parseAttributeName(rawName: string): AttrSyntax {
  for (const pattern of PATTERNS) {
    if (!rawName.startsWith(pattern.prefix) || !rawName.endsWith(pattern.suffix)) continue;
    const inner = rawName.slice(pattern.prefix.length, rawName.length - pattern.suffix.length);
    if (inner.length === 0) continue;
    const offset = pattern.prefix.length;
    switch (pattern.command) {
      case "property":
        return parsePropertyTarget(rawName, inner, offset);
      case "event":
        return parseEventTarget(rawName, inner, offset);
      default:
        return new AttrSyntax(rawName, inner, pattern.command, offset, pattern.command === "twoWay" ? "twoWay" : null);
    }
  }
  // Bare `@trigger` is a static animation binding.
  if (rawName.startsWith(ANIMATION_PREFIX) && rawName.length > 1) {
    return new AttrSyntax(rawName, rawName.slice(1), "property", 1, "animation");
  }
  return new AttrSyntax(rawName, rawName, "text", 0);
}

function parsePropertyTarget(rawName: string, inner: string, offset: number): AttrSyntax {
  if (inner.startsWith(ANIMATION_PREFIX)) {
    return new AttrSyntax(rawName, inner.slice(1), "property", offset + 1, "animation");
  }
  const dot = inner.indexOf(".");
  if (dot > 0) {
    const head = inner.slice(0, dot);
    const rest = inner.slice(dot + 1);
    const restOffset = offset + dot + 1;
    switch (head) {
      case "attr":
        return new AttrSyntax(rawName, rest, "property", restOffset, "attribute");
      case "class":
        return new AttrSyntax(rawName, rest, "property", restOffset, "class");
      case "style": {
        const unitDot = rest.indexOf(".");
        if (unitDot > 0) {
          return new AttrSyntax(rawName, rest.slice(0, unitDot), "property", restOffset, "style", {
            unit: rest.slice(unitDot + 1),
          });
        }
        return new AttrSyntax(rawName, rest, "property", restOffset, "style");
      }
    }
  }
  return new AttrSyntax(rawName, inner, "property", offset, "property");
}

function parseEventTarget(rawName: string, inner: string, offset: number): AttrSyntax {
  if (inner.startsWith(ANIMATION_PREFIX)) {
    const body = inner.slice(1);
    const dot = body.indexOf(".");
    const name = dot > 0 ? body.slice(0, dot) : body;
    const phase = dot > 0 ? body.slice(dot + 1) : undefined;
    return new AttrSyntax(rawName, name, "event", offset + 1, "animation", phase ? { phase } : {});
  }
  const colon = inner.indexOf(":");
  if (colon > 0) {
    return new AttrSyntax(rawName, inner.slice(colon + 1), "event", offset + colon + 1, null, {
      eventTarget: inner.slice(0, colon),
    });
  }
  return new AttrSyntax(rawName, inner, "event", offset);
}
