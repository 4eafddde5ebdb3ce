import { SpanStatusCode, trace, type Span, type SpanAttributes, type Tracer } from "@opentelemetry/api";

import type { SsoInstrumentationOptions } from "./metrics.js";

export type SsoTracer = Tracer;

export interface RunWithSpanOptions {
  readonly attributes?: SpanAttributes;
}

export const getSsoTracer = (options: SsoInstrumentationOptions = {}): SsoTracer =>
  trace
    .getTracerProvider()
    .getTracer(options.name ?? "sso-bridge", options.version, { schemaUrl: options.schemaUrl });

/**
 * Runs the callback inside an active span. The span ends with OK when the
 * callback resolves and with ERROR, plus the recorded exception, when it throws.
 */
export const runWithSpan = async <T>(
  tracer: SsoTracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  options: RunWithSpanOptions = {},
): Promise<T> =>
  tracer.startActiveSpan(name, { attributes: options.attributes }, async (span): Promise<T> => {
    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  });
