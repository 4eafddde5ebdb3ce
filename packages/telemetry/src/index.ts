export type { SsoInstrumentationOptions, SsoInstrumentOptions, SsoCounter, SsoHistogram } from "./metrics.js";
export { getSsoMeter, createSsoCounter, createSsoHistogram } from "./metrics.js";

export type { SsoLogger, SsoLoggerOptions, SsoLogLevel, SsoLogFields, SsoLogSink } from "./logging.js";
export { createSsoLogger, describeError, SSO_LOG_LEVELS } from "./logging.js";

export type { SsoTracer, RunWithSpanOptions } from "./tracing.js";
export { getSsoTracer, runWithSpan } from "./tracing.js";
