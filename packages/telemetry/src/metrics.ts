import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type MeterOptions,
  type MetricOptions,
} from "@opentelemetry/api";

export interface SsoInstrumentationOptions extends MeterOptions {
  readonly name?: string;
  readonly version?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "sso-bridge";

/**
 * Resolves a meter from the globally registered provider. Without an SDK
 * registered, the API hands back no-op instruments.
 */
export const getSsoMeter = (options: SsoInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface SsoInstrumentOptions extends MetricOptions {
  readonly instrumentation?: SsoInstrumentationOptions;
}

export type SsoCounter = Counter;

export type SsoHistogram = Histogram;

export const createSsoCounter = (name: string, options: SsoInstrumentOptions = {}): SsoCounter => {
  const { instrumentation, ...metricOptions } = options;
  return getSsoMeter(instrumentation).createCounter(name, metricOptions);
};

export const createSsoHistogram = (name: string, options: SsoInstrumentOptions = {}): SsoHistogram => {
  const { instrumentation, ...metricOptions } = options;
  return getSsoMeter(instrumentation).createHistogram(name, metricOptions);
};
