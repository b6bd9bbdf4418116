import { context, trace } from "@opentelemetry/api"
import { globalTracerRegistry } from "./registry.js"
import type { SpanAttributes } from "./types.js"

/**
 * Runs `fn` inside a span on every registered tracer. A thrown error is
 * recorded on each span and rethrown; spans always end.
 */
export function withSpan<T>(
  name: string,
  fn: () => T,
  attributes?: SpanAttributes
): T {
  const spans = globalTracerRegistry.startSpan(name, attributes)
  if (spans.length === 0) {
    return fn()
  }

  try {
    const otelSpan = spans.find((span) => span.span)?.span
    return otelSpan
      ? context.with(trace.setSpan(context.active(), otelSpan), fn)
      : fn()
  } catch (error) {
    spans.forEach((span) => span.recordError(error))
    throw error
  } finally {
    spans.forEach((span) => span.end())
  }
}
