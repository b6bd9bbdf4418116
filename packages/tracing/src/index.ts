import { globalTracerRegistry } from "./registry.js"
import type { Tracer } from "./types.js"

export { globalTracerRegistry } from "./registry.js"
export { withSpan } from "./withSpan.js"
export { OpenTelemetryTracer } from "./tracers/open-telemetry.js"
export type { Tracer, Span, SpanAttributes } from "./types.js"

export function setTracingEnabled(enabled: boolean) {
  globalTracerRegistry.setEnabled(enabled)
}

export function addTracer(tracer: Tracer) {
  globalTracerRegistry.addTracer(tracer)
}

export function removeTracer(tracer: Tracer) {
  globalTracerRegistry.removeTracer(tracer)
}
