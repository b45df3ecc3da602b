/* =======================================================================================
 * COMPILE TRACE - timing and context for pipeline stages
 * ---------------------------------------------------------------------------------------
 * Hierarchical spans (stage → template → block) with attributes and point events.
 * Every stage takes an optional `trace` and falls back to NOOP_TRACE, which runs the
 * wrapped function and records nothing.
 * ======================================================================================= */

/** Follows OpenTelemetry attribute value conventions. */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly AttributeValue[];

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

export interface SpanEvent {
  readonly name: string;
  /** Nanoseconds since an arbitrary origin. */
  readonly timestamp: bigint;
  readonly attributes: ReadonlyAttributeMap;
}

export interface Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: Span | null;
  readonly children: readonly Span[];
  readonly startTime: bigint;
  readonly endTime: bigint | null;
  readonly duration: bigint | null;
  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];
  end(): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

/** Observes span lifecycle; console, JSON file, collector, ... */
export interface TraceExporter {
  onSpanStart(span: Span): void;
  onSpanEnd(span: Span): void;
  onEvent(span: Span, event: SpanEvent): void;
  flush(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Main instrumentation API.
 *
 * @example
 * const trace = options.trace ?? NOOP_TRACE;
 * const block = trace.span("tcb.generate", () => generate(nodes));
 */
export interface CompileTrace {
  /** Run `fn` inside a named span; the span ends when `fn` returns or throws. */
  span<T>(name: string, fn: () => T): T;
  spanAsync<T>(name: string, fn: () => Promise<T>): Promise<T>;
  event(name: string, attributes?: Record<string, AttributeValue>): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  /** Caller ends the span. */
  startSpan(name: string): Span;
  currentSpan(): Span | undefined;
  rootSpan(): Span;
  flush(): Promise<void>;
}

/** Attribute keys shared by all stages. */
export const TraceAttributes = {
  STAGE: "tplcheck.stage",
  TEMPLATE: "tplcheck.template",
  NODE_COUNT: "template.nodes",
  DIRECTIVE_MATCHES: "bind.directives",
  STATEMENT_COUNT: "tcb.statements",
  MAPPING_COUNT: "tcb.mappings",
  TEXT_LENGTH: "tcb.length",
  DIAG_COUNT: "diag.count",
  DIAG_ERROR_COUNT: "diag.errors",
  FILE_PATH: "file.path",
} as const;

export type TraceAttributeKey = (typeof TraceAttributes)[keyof typeof TraceAttributes];

export const NOOP_SPAN: Span = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

export const NOOP_TRACE: CompileTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  spanAsync: <T>(_name: string, fn: () => Promise<T>): Promise<T> => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  startSpan: () => NOOP_SPAN,
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
  flush: () => Promise.resolve(),
};

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

export function formatDuration(nanos: bigint): string {
  const ns = Number(nanos);
  if (ns < 1_000) return `${ns}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

let spanCounter = 0;

class SpanImpl implements Span {
  readonly spanId = `span_${++spanCounter}`;
  readonly startTime = nowNanos();
  private _endTime: bigint | null = null;
  private readonly _children: SpanImpl[] = [];
  private readonly _attributes = new Map<string, AttributeValue>();
  private readonly _events: SpanEvent[] = [];

  constructor(
    readonly name: string,
    readonly traceId: string,
    readonly parent: SpanImpl | null,
    private readonly exporter: TraceExporter | null,
    private readonly onEnd: (span: SpanImpl) => void,
  ) {
    parent?._children.push(this);
    exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this._endTime;
  }

  get duration(): bigint | null {
    return this._endTime === null ? null : this._endTime - this.startTime;
  }

  get children(): readonly Span[] {
    return this._children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this._attributes;
  }

  get events(): readonly SpanEvent[] {
    return this._events;
  }

  end(): void {
    if (this._endTime !== null) return;
    this._endTime = nowNanos();
    this.exporter?.onSpanEnd(this);
    this.onEnd(this);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this._attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) this._attributes.set(key, value);
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = { name, timestamp: nowNanos(), attributes: new Map(Object.entries(attributes ?? {})) };
    this._events.push(event);
    this.exporter?.onEvent(this, event);
  }
}

export interface CreateTraceOptions {
  /** Root span name. */
  name?: string;
  exporter?: TraceExporter;
  traceId?: string;
}

class CompileTraceImpl implements CompileTrace {
  private readonly root: SpanImpl;
  private current: SpanImpl;
  private readonly exporter: TraceExporter | null;
  private readonly traceId: string;

  constructor(options: CreateTraceOptions) {
    this.traceId = options.traceId ?? `trace_${Date.now().toString(36)}`;
    this.exporter = options.exporter ?? null;
    this.root = new SpanImpl(options.name ?? "trace", this.traceId, null, this.exporter, () => {});
    this.current = this.root;
  }

  span<T>(name: string, fn: () => T): T {
    const span = this.startSpan(name);
    try {
      return fn();
    } catch (error) {
      markFailed(span, error);
      throw error;
    } finally {
      span.end();
    }
  }

  async spanAsync<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const span = this.startSpan(name);
    try {
      return await fn();
    } catch (error) {
      markFailed(span, error);
      throw error;
    } finally {
      span.end();
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this.current.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.current.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this.current.setAttributes(attrs);
  }

  startSpan(name: string): Span {
    const previous = this.current;
    const span = new SpanImpl(name, this.traceId, previous, this.exporter, (ended) => {
      if (this.current === ended) this.current = previous;
    });
    this.current = span;
    return span;
  }

  currentSpan(): Span | undefined {
    return this.current;
  }

  rootSpan(): Span {
    return this.root;
  }

  async flush(): Promise<void> {
    await this.exporter?.flush();
  }
}

function markFailed(span: Span, error: unknown): void {
  span.setAttribute("error", true);
  span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
}

export function createTrace(options: CreateTraceOptions = {}): CompileTrace {
  return new CompileTraceImpl(options);
}

/** Keeps ended spans in memory, in end order. */
export interface CollectingExporter extends TraceExporter {
  readonly spans: readonly Span[];
}

export function createCollectingExporter(): CollectingExporter {
  const spans: Span[] = [];
  return {
    spans,
    onSpanStart: () => {},
    onSpanEnd: (span) => {
      spans.push(span);
    },
    onEvent: () => {},
    flush: () => Promise.resolve(),
    shutdown: () => Promise.resolve(),
  };
}
