import { Config } from "effect";

export const DemoConfig = Config.all({
  tracing: Config.literal("off", "console", "otlp")("DECO_TRACING").pipe(
    Config.withDefault("off")
  ),
  otlpUrl: Config.option(Config.string("DECO_OTLP_URL")),
  serviceName: Config.string("DECO_SERVICE_NAME").pipe(Config.withDefault("deco")),
});

export type DemoConfig = Config.Config.Success<typeof DemoConfig>;
