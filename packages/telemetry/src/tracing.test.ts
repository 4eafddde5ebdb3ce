import { describe, expect, it } from "vitest";

import { createSsoCounter, createSsoHistogram } from "./metrics.js";
import { getSsoTracer, runWithSpan } from "./tracing.js";

describe("sso instrumentation", () => {
  const tracer = getSsoTracer({ name: "tracing-test", version: "0.0.0", schemaUrl: "https://example.com/schema" });

  it("returns the callback's value from inside a span", async () => {
    const value = await runWithSpan(
      tracer,
      "sso.test.ok",
      async (span) => {
        span.setAttribute("sso.attempt", 1);
        return 42;
      },
      { attributes: { "sso.operation": "login" } },
    );

    expect(value).toBe(42);
  });

  it("rethrows what the callback throws", async () => {
    await expect(
      runWithSpan(tracer, "sso.test.failure", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  it("creates instruments that accept measurements without a registered SDK", () => {
    const counter = createSsoCounter("sso_test_total", { description: "Test counter.", unit: "1" });
    const histogram = createSsoHistogram("sso_test_duration_ms", {
      description: "Test histogram.",
      unit: "ms",
      instrumentation: { name: "tracing-test" },
    });

    expect(() => {
      counter.add(1, { outcome: "ok" });
      histogram.record(3, { outcome: "ok" });
    }).not.toThrow();
  });
});
