import {
  createSsoCounter,
  createSsoHistogram,
  createSsoLogger,
  getSsoTracer,
  type SsoCounter,
  type SsoHistogram,
  type SsoInstrumentationOptions,
  type SsoLogger,
  type SsoLogLevel,
  type SsoTracer,
} from "@sso-bridge/telemetry";

export interface SsoClientTelemetryMetrics {
  readonly operationCounter: SsoCounter;
  readonly operationDuration: SsoHistogram;
  readonly bindAttempts: SsoCounter;
  readonly connectDuration: SsoHistogram;
}

export interface SsoClientTelemetryOptions {
  readonly instrumentation?: SsoInstrumentationOptions;
  readonly tracer?: SsoTracer;
  readonly logger?: SsoLogger;
  readonly logLevel?: SsoLogLevel;
  readonly metrics?: Partial<SsoClientTelemetryMetrics>;
}

export interface SsoClientTelemetryContext {
  readonly tracer: SsoTracer;
  readonly logger: SsoLogger;
  readonly metrics: SsoClientTelemetryMetrics;
}

const DEFAULT_INSTRUMENTATION: SsoInstrumentationOptions = { name: "sso-client" };

export const createClientTelemetryContext = (
  options: SsoClientTelemetryOptions = {},
): SsoClientTelemetryContext => {
  const instrumentation: SsoInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getSsoTracer(instrumentation);
  const logger =
    options.logger ??
    createSsoLogger({ name: instrumentation.name ?? "sso-client", level: options.logLevel });
  const metrics: SsoClientTelemetryMetrics = {
    operationCounter:
      options.metrics?.operationCounter ??
      createSsoCounter("sso_client_operations_total", {
        description: "Count of SSO client operations by operation and outcome.",
        instrumentation,
      }),
    operationDuration:
      options.metrics?.operationDuration ??
      createSsoHistogram("sso_client_operation_duration_ms", {
        description: "Duration of SSO client operations, connection included.",
        unit: "ms",
        instrumentation,
      }),
    bindAttempts:
      options.metrics?.bindAttempts ??
      createSsoCounter("sso_client_bind_attempts_total", {
        description: "Bind attempts against the SSO service by outcome.",
        instrumentation,
      }),
    connectDuration:
      options.metrics?.connectDuration ??
      createSsoHistogram("sso_client_connect_duration_ms", {
        description: "Time from bind request to handshake resolution.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics } satisfies SsoClientTelemetryContext;
};
