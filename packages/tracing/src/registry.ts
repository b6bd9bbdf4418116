import type { Span, SpanAttributes, Tracer } from "./types.js"

/**
 * Process-wide set of tracers. Compilation asks it for spans; with tracing
 * disabled or no tracers registered it hands out none and costs nothing.
 */
class TracerRegistry {
  private enabled = false
  private readonly tracers = new Set<Tracer>()

  setEnabled(enabled: boolean) {
    this.enabled = enabled
  }

  isEnabled(): boolean {
    return this.enabled
  }

  addTracer(tracer: Tracer) {
    this.tracers.add(tracer)
  }

  removeTracer(tracer: Tracer) {
    this.tracers.delete(tracer)
  }

  clearTracers() {
    this.tracers.clear()
  }

  startSpan(name: string, attributes?: SpanAttributes): Array<Span> {
    if (!this.enabled || this.tracers.size === 0) return []
    return Array.from(this.tracers, (tracer) =>
      tracer.startSpan(name, attributes)
    )
  }
}

export const globalTracerRegistry = new TracerRegistry()
