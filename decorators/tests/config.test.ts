import { describe, it, expect } from "vitest";
import { ConfigProvider, Effect, Either, Option } from "effect";

import { DemoConfig } from "../config";

const load = (env: Record<string, string>) =>
  Effect.runSync(
    Effect.either(
      Effect.withConfigProvider(DemoConfig, ConfigProvider.fromMap(new Map(Object.entries(env))))
    )
  );

describe("DemoConfig", () => {
  it("defaults to tracing off", () => {
    expect(load({})).toEqual(
      Either.right({ tracing: "off", otlpUrl: Option.none(), serviceName: "deco" })
    );
  });

  it("reads the exporter, collector URL and service name", () => {
    expect(
      load({
        DECO_TRACING: "otlp",
        DECO_OTLP_URL: "http://localhost:4318/v1/traces",
        DECO_SERVICE_NAME: "deco-test",
      })
    ).toEqual(
      Either.right({
        tracing: "otlp",
        otlpUrl: Option.some("http://localhost:4318/v1/traces"),
        serviceName: "deco-test",
      })
    );
  });

  it("rejects an unknown tracing mode", () => {
    expect(Either.isLeft(load({ DECO_TRACING: "jaeger" }))).toBe(true);
  });
});
