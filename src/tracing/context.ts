import { context as otelContext, propagation, type Context } from "@opentelemetry/api";

/** Trace headers embedded in an event payload, e.g. `traceparent`. */
export type TraceCarrier = Record<string, string>;

/**
 * Writes the trace context of `ctx` into `carrier` so the receiver of an
 * event can parent its spans to the sender's.
 */
export function injectTraceContext(carrier: TraceCarrier, ctx: Context = otelContext.active()): TraceCarrier {
  propagation.inject(ctx, carrier);
  return carrier;
}

/** Reads the sender's trace context out of an incoming event's carrier. */
export function extractTraceContext(carrier: Readonly<TraceCarrier>, base: Context = otelContext.active()): Context {
  return propagation.extract(base, carrier);
}
