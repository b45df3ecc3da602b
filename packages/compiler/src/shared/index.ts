// Shared compiler infrastructure
//
// Cross-cutting utilities used by every layer.
// IMPORTANT: This module only imports from model/ - no other compiler layers.

// Diagnostics
export { buildDiagnostic, effectiveSeverity, hasErrors, type BuildDiagnosticInput } from "./diagnostics.js";

// Errors
export { TcbErrorCode, TcbInternalError, assertUnreachable } from "./errors.js";

// Logging
export { nullLogger, prefixedLogger, type Logger } from "./logger.js";

// Debug channels (TPLCHECK_DEBUG)
export {
  debug,
  configureDebug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

// Tracing
export {
  createTrace,
  createCollectingExporter,
  formatDuration,
  nowNanos,
  NOOP_SPAN,
  NOOP_TRACE,
  TraceAttributes,
  type AttributeValue,
  type CollectingExporter,
  type CompileTrace,
  type CreateTraceOptions,
  type ReadonlyAttributeMap,
  type Span,
  type SpanEvent,
  type TraceAttributeKey,
  type TraceExporter,
} from "./trace.js";
