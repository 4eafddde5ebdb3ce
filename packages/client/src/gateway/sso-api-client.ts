import {
  err,
  isRemoteServiceError,
  ok,
  type Account,
  type AccountDescriptor,
  type Result,
  type ServiceBinderPort,
  type SsoError,
  type SsoRemoteService,
} from "@sso-bridge/contracts";
import { describeError, runWithSpan, type SsoLogger } from "@sso-bridge/telemetry";

import { accountDescriptorSchema, decodeAccount, decodeAccountList } from "../accounts/account-codec.js";
import type { SsoClientConfig } from "../config.js";
import { ConnectionManager } from "../connection/connection-manager.js";
import {
  CONNECT_FAILED_INSTALL_HINT,
  CONNECT_FAILED_MESSAGE,
  createChannelLostError,
  createConnectionUnavailableError,
  createRemoteCommunicationError,
  createRemoteRejectionError,
  createValidationError,
} from "../shared/errors.js";
import {
  createClientTelemetryContext,
  type SsoClientTelemetryContext,
  type SsoClientTelemetryOptions,
} from "../shared/telemetry.js";
import { safeParse } from "../shared/validation.js";

export type SsoOperation =
  | "login"
  | "logout"
  | "logout_all"
  | "switch_account"
  | "get_active_account"
  | "get_all_accounts";

export interface SsoApiClientOptions {
  readonly binder: ServiceBinderPort;
  readonly config?: Partial<SsoClientConfig>;
  readonly telemetry?: SsoClientTelemetryOptions;
}

export interface SsoCallOptions {
  /** Aborts the connect wait. A remote call already dispatched is not interrupted. */
  readonly signal?: AbortSignal;
}

/**
 * Entry point for talking to the SSO peer. Connects on demand before every
 * call; nothing is retried. Mutations report failures as Result errors, while
 * queries log the failure and return an empty answer.
 */
export class SsoApiClient {
  private readonly connection: ConnectionManager;

  private readonly telemetry: SsoClientTelemetryContext;

  private readonly logger: SsoLogger;

  constructor(options: SsoApiClientOptions) {
    this.telemetry = createClientTelemetryContext({
      logLevel: options.config?.logLevel,
      ...options.telemetry,
    });
    this.logger = this.telemetry.logger.child({ component: "sso-api-client" });
    this.connection = new ConnectionManager({
      binder: options.binder,
      target: options.config?.target,
      connectTimeoutMs: options.config?.connectTimeoutMs,
      telemetry: this.telemetry,
    });
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  unbind(): void {
    this.connection.unbind();
  }

  async login(account: AccountDescriptor, options: SsoCallOptions = {}): Promise<Result<void>> {
    return this.instrument("login", async () => {
      const descriptor = safeParse(accountDescriptorSchema, account, createValidationError);
      if (!descriptor.ok) {
        return descriptor;
      }
      const result = await this.dispatch(
        "login",
        CONNECT_FAILED_INSTALL_HINT,
        (service) => service.login(descriptor.value),
        options,
      );
      if (result.ok) {
        this.logger.debug("sso.login.completed", { account: descriptor.value.displayName });
      }
      return result;
    });
  }

  /**
   * Signs out one account. The identifier is whatever key the peer matches on:
   * an email, a display name or an id.
   */
  async logout(identifier: string, options: SsoCallOptions = {}): Promise<Result<void>> {
    return this.instrument("logout", () =>
      this.dispatch("logout", CONNECT_FAILED_MESSAGE, (service) => service.logout(identifier), options),
    );
  }

  async logoutAll(options: SsoCallOptions = {}): Promise<Result<void>> {
    return this.instrument("logout_all", () =>
      this.dispatch("logout_all", CONNECT_FAILED_MESSAGE, (service) => service.logoutAll(), options),
    );
  }

  async switchAccount(account: AccountDescriptor, options: SsoCallOptions = {}): Promise<Result<void>> {
    return this.instrument("switch_account", async () => {
      const descriptor = safeParse(accountDescriptorSchema, account, createValidationError);
      if (!descriptor.ok) {
        return descriptor;
      }
      return this.dispatch(
        "switch_account",
        CONNECT_FAILED_MESSAGE,
        (service) => service.switchAccount(descriptor.value),
        options,
      );
    });
  }

  /**
   * Returns undefined both when no account is active and when the peer could
   * not be reached.
   */
  async getActiveAccount(options: SsoCallOptions = {}): Promise<Account | undefined> {
    const result = await this.instrument("get_active_account", () =>
      this.dispatch(
        "get_active_account",
        CONNECT_FAILED_MESSAGE,
        (service) => service.getActiveAccount(),
        options,
      ),
    );
    if (!result.ok) {
      this.logger.warn("sso.get_active_account.degraded", { code: result.error.code, error: result.error.message });
      return undefined;
    }

    const account = decodeAccount(result.value);
    this.logger.debug("sso.get_active_account.completed", {
      active: account ? account.email : null,
    });
    return account;
  }

  async getAllAccounts(options: SsoCallOptions = {}): Promise<ReadonlyArray<Account>> {
    const result = await this.instrument("get_all_accounts", () =>
      this.dispatch(
        "get_all_accounts",
        CONNECT_FAILED_MESSAGE,
        (service) => service.getAllAccounts(),
        options,
      ),
    );
    if (!result.ok) {
      this.logger.warn("sso.get_all_accounts.degraded", { code: result.error.code, error: result.error.message });
      return [];
    }

    const raw = Array.isArray(result.value) ? result.value : [];
    const accounts = decodeAccountList(raw);
    if (accounts.length !== raw.length) {
      this.logger.warn("sso.get_all_accounts.dropped_entries", { dropped: raw.length - accounts.length });
    }
    this.logger.debug("sso.get_all_accounts.completed", { count: accounts.length });
    return accounts;
  }

  private async dispatch<T>(
    operation: SsoOperation,
    unavailableMessage: string,
    call: (service: SsoRemoteService) => Promise<T>,
    options: SsoCallOptions,
  ): Promise<Result<T>> {
    if (!(await this.connection.ensureConnected(options.signal))) {
      return err(createConnectionUnavailableError(unavailableMessage));
    }

    // The channel may have dropped while this caller was resuming.
    const service = this.connection.currentService();
    if (!service) {
      return err(createChannelLostError());
    }

    try {
      return ok(await call(service));
    } catch (error) {
      const failure = this.translateFailure(error);
      this.logger.error("sso.remote_call.failed", {
        operation,
        code: failure.code,
        error: describeError(error),
      });
      return err(failure);
    }
  }

  private translateFailure(error: unknown): SsoError {
    if (isRemoteServiceError(error) && error.kind === "rejection") {
      return createRemoteRejectionError(error.message);
    }
    if (!this.connection.isConnected()) {
      return createChannelLostError(describeError(error));
    }
    return createRemoteCommunicationError(describeError(error));
  }

  private async instrument<T>(operation: SsoOperation, run: () => Promise<Result<T>>): Promise<Result<T>> {
    const start = performance.now();
    this.logger.debug("sso.operation.start", { operation });

    const result = await runWithSpan(
      this.telemetry.tracer,
      `sso.client.${operation}`,
      async (span) => {
        const outcome = await run();
        span.setAttribute("sso.operation.outcome", outcome.ok ? "ok" : outcome.error.code);
        return outcome;
      },
      { attributes: { "sso.operation": operation } },
    );

    const durationMs = performance.now() - start;
    const outcome = result.ok ? "ok" : "error";
    this.telemetry.metrics.operationCounter.add(1, { operation, outcome });
    this.telemetry.metrics.operationDuration.record(durationMs, { operation, outcome });
    if (result.ok) {
      this.logger.debug("sso.operation.success", { operation, durationMs });
    } else {
      this.logger.debug("sso.operation.failed", { operation, durationMs, code: result.error.code });
    }
    return result;
  }
}
