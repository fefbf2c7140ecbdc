import { Effect, Option } from "effect";
import { NodeSdk } from "@effect/opentelemetry";
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";

import type { DemoConfig } from "./decorators/config";

// Picks the span exporter for the configured mode; `undefined` means tracing is off
export function exporterFor(config: DemoConfig): SpanExporter | undefined {
  switch (config.tracing) {
    case "off":
      return undefined;
    case "console":
      return new ConsoleSpanExporter();
    case "otlp": {
      const url = Option.getOrUndefined(config.otlpUrl);
      return new OTLPTraceExporter(url ? { url } : undefined);
    }
  }
}

export function makeTracingLayer(exporter: SpanExporter, serviceName: string) {
  return NodeSdk.layer(() => ({
    resource: { serviceName },
    spanProcessor: new BatchSpanProcessor(exporter),
  }));
}

// Run `effect` with spans exported the way the configuration asks
export function withTracing<A, E>(
  effect: Effect.Effect<A, E, never>,
  config: DemoConfig,
): Effect.Effect<A, E, never> {
  const exporter = exporterFor(config);
  if (exporter === undefined) return effect;
  return effect.pipe(Effect.provide(makeTracingLayer(exporter, config.serviceName)));
}
