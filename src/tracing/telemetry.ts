import { W3CTraceContextPropagator } from "@opentelemetry/core";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { BasicTracerProvider, BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import type { LogGuard } from "../logger.js";

/**
 * Registers a global tracer provider that batches spans to an OTLP/HTTP
 * collector, and the W3C propagator used by the trace-context helpers.
 */
export function startTelemetry(component: string, endpoint: string): LogGuard {
  const provider = new BasicTracerProvider({
    resource: new Resource({ "service.name": component }),
  });
  provider.addSpanProcessor(new BatchSpanProcessor(new OTLPTraceExporter({ url: endpoint })));
  provider.register({ propagator: new W3CTraceContextPropagator() });

  return {
    kind: "telemetry",
    shutdown: () => provider.shutdown(),
  };
}
