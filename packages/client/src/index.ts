export { SsoApiClient } from "./gateway/sso-api-client.js";
export type { SsoApiClientOptions, SsoCallOptions, SsoOperation } from "./gateway/sso-api-client.js";

export { ConnectionManager } from "./connection/connection-manager.js";
export type { ConnectionManagerOptions, ConnectionState } from "./connection/connection-manager.js";
export type { ConnectOutcome } from "./connection/connect-attempt.js";

export {
  createAccount,
  decodeAccount,
  decodeAccountList,
  withActiveFlag,
} from "./accounts/account-codec.js";

export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_SERVICE_TARGET,
  DEFAULT_SOCKET_PATH,
  loadSsoClientConfig,
  SsoConfigError,
} from "./config.js";
export type { SsoClientConfig } from "./config.js";

export {
  CHANNEL_LOST_MESSAGE,
  CONNECT_FAILED_INSTALL_HINT,
  CONNECT_FAILED_MESSAGE,
} from "./shared/errors.js";

export { createClientTelemetryContext } from "./shared/telemetry.js";
export type {
  SsoClientTelemetryContext,
  SsoClientTelemetryMetrics,
  SsoClientTelemetryOptions,
} from "./shared/telemetry.js";
