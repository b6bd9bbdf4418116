import type { Span as OtelSpan } from "@opentelemetry/api"

/**
 * Attribute values a span accepts. Kept to the primitive subset that
 * OpenTelemetry attributes also accept.
 */
export type SpanAttributes = Record<string, string | number | boolean>

export interface Span {
  name: string
  end: () => void
  setAttributes: (attributes: SpanAttributes) => void
  // Called before `end` when the traced work throws
  recordError: (error: unknown) => void
  // Set by OpenTelemetry tracers so withSpan can make the span active
  span?: OtelSpan
}

export interface Tracer {
  startSpan: (name: string, attributes?: SpanAttributes) => Span
}
