import { SpanStatusCode, context } from "@opentelemetry/api"
import type { Span, SpanAttributes, Tracer } from "../types.js"
import type { Tracer as OtelTracer } from "@opentelemetry/api"

/**
 * Bridges spans to an OpenTelemetry tracer. Spans nest under whatever span
 * is active, and failures are recorded as exceptions with an ERROR status.
 */
export class OpenTelemetryTracer implements Tracer {
  constructor(private readonly otelTracer: OtelTracer) {}

  startSpan(name: string, attributes?: SpanAttributes): Span {
    const span = this.otelTracer.startSpan(
      name,
      { attributes },
      context.active()
    )

    return {
      name,
      end: () => span.end(),
      setAttributes: (attrs) => {
        span.setAttributes(attrs)
      },
      recordError: (error) => {
        const message = error instanceof Error ? error.message : String(error)
        span.recordException(error instanceof Error ? error : message)
        span.setStatus({ code: SpanStatusCode.ERROR, message })
      },
      span,
    }
  }
}
