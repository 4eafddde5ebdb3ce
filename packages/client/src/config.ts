import { tmpdir } from "node:os";
import { join } from "node:path";

import { z } from "zod";

import type { ServiceTarget } from "@sso-bridge/contracts";
import { SSO_LOG_LEVELS, type SsoLogLevel } from "@sso-bridge/telemetry";

export const DEFAULT_SERVICE_TARGET: ServiceTarget = {
  packageName: "com.example.service",
  componentName: "com.example.service.SsoService",
  action: "com.example.service.SSO_SERVICE",
};

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export const DEFAULT_SOCKET_PATH = join(tmpdir(), "sso-bridge.sock");

export interface SsoClientConfig {
  readonly target: ServiceTarget;
  readonly connectTimeoutMs: number;
  readonly logLevel: SsoLogLevel;
  /** Where the socket transport reaches the service. */
  readonly socketPath: string;
}

const envSchema = z.object({
  SSO_SERVICE_PACKAGE: z.string().min(1).default(DEFAULT_SERVICE_TARGET.packageName),
  SSO_SERVICE_COMPONENT: z.string().min(1).default(DEFAULT_SERVICE_TARGET.componentName),
  SSO_SERVICE_ACTION: z.string().min(1).default(DEFAULT_SERVICE_TARGET.action),
  SSO_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  SSO_LOG_LEVEL: z.enum(SSO_LOG_LEVELS).default("info"),
  SSO_SOCKET_PATH: z.string().min(1).default(DEFAULT_SOCKET_PATH),
});

export class SsoConfigError extends Error {
  constructor(readonly issues: ReadonlyArray<string>) {
    super(`Invalid SSO client configuration: ${issues.join("; ")}`);
    this.name = "SsoConfigError";
  }
}

const blankToUndefined = (
  env: Readonly<Record<string, string | undefined>>,
): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value && value.trim().length > 0 ? value : undefined]),
  );

/**
 * Reads client settings from environment variables. Unset or blank variables
 * fall back to the defaults.
 */
export const loadSsoClientConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): SsoClientConfig => {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new SsoConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  return {
    target: {
      packageName: parsed.data.SSO_SERVICE_PACKAGE,
      componentName: parsed.data.SSO_SERVICE_COMPONENT,
      action: parsed.data.SSO_SERVICE_ACTION,
    },
    connectTimeoutMs: parsed.data.SSO_CONNECT_TIMEOUT_MS,
    logLevel: parsed.data.SSO_LOG_LEVEL,
    socketPath: parsed.data.SSO_SOCKET_PATH,
  };
};
