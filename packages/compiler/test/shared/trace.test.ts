/**
 * Unit tests for CompileTrace instrumentation primitives.
 */
import { describe, test, expect } from "vitest";
import {
  NOOP_SPAN,
  NOOP_TRACE,
  createCollectingExporter,
  createTrace,
  formatDuration,
} from "@tplcheck/compiler/shared/trace.js";

// =============================================================================
// Core Trace Tests
// =============================================================================

describe("createTrace", () => {
  test("creates a trace with a named root span", () => {
    const trace = createTrace({ name: "test-trace" });
    expect(trace.rootSpan().name).toBe("test-trace");
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("can provide a custom traceId", () => {
    const trace = createTrace({ name: "test", traceId: "custom-trace-123" });
    expect(trace.rootSpan().traceId).toBe("custom-trace-123");
  });
});

describe("span() - synchronous instrumentation", () => {
  test("returns the result and nests spans", () => {
    const trace = createTrace({ name: "root" });
    const result = trace.span("outer", () => trace.span("inner", () => 42));

    expect(result).toBe(42);
    const [outer] = trace.rootSpan().children;
    expect(outer?.name).toBe("outer");
    expect(outer?.children.map((s) => s.name)).toEqual(["inner"]);
    expect(outer?.endTime).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });

  test("marks the span as failed and rethrows", () => {
    const trace = createTrace({ name: "root" });
    expect(() =>
      trace.span("failing", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");

    const [failing] = trace.rootSpan().children;
    expect(failing?.attributes.get("error")).toBe(true);
    expect(failing?.attributes.get("error.message")).toBe("boom");
  });
});

describe("spanAsync() - async instrumentation", () => {
  test("ends the span when the promise settles", async () => {
    const trace = createTrace({ name: "root" });
    const result = await trace.spanAsync("work", () => Promise.resolve("done"));

    expect(result).toBe("done");
    expect(trace.rootSpan().children[0]?.duration).not.toBeNull();
  });
});

describe("attributes and events", () => {
  test("attach to the current span", () => {
    const trace = createTrace({ name: "root" });
    trace.span("stage", () => {
      trace.setAttribute("a", 1);
      trace.setAttributes({ b: "two", c: [true, null] });
      trace.event("checkpoint", { n: 3 });
    });

    const [stage] = trace.rootSpan().children;
    expect(stage ? Object.fromEntries(stage.attributes) : null).toEqual({ a: 1, b: "two", c: [true, null] });
    expect(stage?.events.map((e) => [e.name, e.attributes.get("n")])).toEqual([["checkpoint", 3]]);
  });
});

describe("manual span control", () => {
  test("startSpan stays open until ended", () => {
    const trace = createTrace({ name: "root" });
    const span = trace.startSpan("manual");

    expect(trace.currentSpan()).toBe(span);
    expect(span.endTime).toBeNull();
    span.end();
    expect(span.endTime).not.toBeNull();
    expect(trace.currentSpan()).toBe(trace.rootSpan());
  });
});

// =============================================================================
// NOOP
// =============================================================================

describe("NOOP_TRACE", () => {
  test("runs the wrapped function and records nothing", async () => {
    expect(NOOP_TRACE.span("x", () => 1)).toBe(1);
    expect(await NOOP_TRACE.spanAsync("x", () => Promise.resolve(2))).toBe(2);
    NOOP_TRACE.setAttribute("a", 1);
    expect(NOOP_TRACE.startSpan("x")).toBe(NOOP_SPAN);
    expect(NOOP_TRACE.currentSpan()).toBeUndefined();
    expect(NOOP_SPAN.attributes.size).toBe(0);
  });
});

// =============================================================================
// Exporters and formatting
// =============================================================================

describe("CollectingExporter", () => {
  test("collects ended spans in end order", () => {
    const exporter = createCollectingExporter();
    const trace = createTrace({ name: "root", exporter });
    trace.span("outer", () => trace.span("inner", () => undefined));

    expect(exporter.spans.map((s) => s.name)).toEqual(["inner", "outer"]);
  });
});

describe("formatDuration", () => {
  test("picks a unit by magnitude", () => {
    expect(formatDuration(500n)).toBe("500ns");
    expect(formatDuration(1_500n)).toBe("1.50µs");
    expect(formatDuration(2_500_000n)).toBe("2.50ms");
    expect(formatDuration(3_000_000_000n)).toBe("3.00s");
  });
});
