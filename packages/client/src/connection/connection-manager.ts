import {
  formatServiceTarget,
  type ServiceBinderPort,
  type ServiceConnection,
  type ServiceTarget,
  type SsoRemoteService,
} from "@sso-bridge/contracts";
import { describeError, type SsoLogger } from "@sso-bridge/telemetry";

import { DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_SERVICE_TARGET } from "../config.js";
import { createClientTelemetryContext, type SsoClientTelemetryContext } from "../shared/telemetry.js";
import { ConnectAttempt, type ConnectOutcome } from "./connect-attempt.js";

export type ConnectionState = "unbound" | "binding" | "bound";

export interface ConnectionManagerOptions {
  readonly binder: ServiceBinderPort;
  readonly target?: ServiceTarget;
  readonly connectTimeoutMs?: number;
  readonly telemetry?: SsoClientTelemetryContext;
  readonly now?: () => number;
}

/**
 * Owns the channel to the SSO peer. Connects lazily, shares one in-flight
 * handshake between all callers, and bounds the wait with a timeout.
 *
 * Handle and waiter slot are only touched from synchronous sections of this
 * class, so the event loop serializes every transition.
 */
export class ConnectionManager {
  private readonly binder: ServiceBinderPort;

  private readonly target: ServiceTarget;

  private readonly connectTimeoutMs: number;

  private readonly telemetry: SsoClientTelemetryContext;

  private readonly logger: SsoLogger;

  private readonly now: () => number;

  private service: SsoRemoteService | undefined;

  // True while the platform holds a binding for our connection, whether or not it has connected.
  private platformBinding = false;

  private pending: ConnectAttempt | undefined;

  private timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  private readonly connection: ServiceConnection = {
    onServiceConnected: (target, service) => this.handleConnected(target, service),
    onServiceDisconnected: (target) => this.handleDisconnected(target),
    onBindingDied: (target) => this.handleBindingDied(target),
  };

  constructor(options: ConnectionManagerOptions) {
    this.binder = options.binder;
    this.target = options.target ?? DEFAULT_SERVICE_TARGET;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.telemetry = options.telemetry ?? createClientTelemetryContext();
    this.logger = this.telemetry.logger.child({
      component: "connection-manager",
      target: formatServiceTarget(this.target),
    });
    this.now = options.now ?? (() => performance.now());
  }

  state(): ConnectionState {
    if (this.service) {
      return "bound";
    }
    return this.pending || this.platformBinding ? "binding" : "unbound";
  }

  isConnected(): boolean {
    return this.service !== undefined;
  }

  /**
   * The live remote handle, if any. Callers must not cache it across awaits.
   */
  currentService(): SsoRemoteService | undefined {
    return this.service;
  }

  /**
   * Resolves true once a channel is live. Resolves false when the bind is
   * rejected, the handshake does not complete within the timeout, or the
   * caller's signal aborts. Never rejects.
   */
  async ensureConnected(signal?: AbortSignal): Promise<boolean> {
    if (this.service) {
      this.logger.debug("connection.reuse");
      return true;
    }

    if (signal?.aborted) {
      return false;
    }

    // A caller arriving mid-handshake joins the attempt already in flight.
    const attempt = this.pending ?? this.beginAttempt();
    return this.awaitAttempt(attempt, signal);
  }

  /**
   * Releases the platform binding if one is held. Safe to call repeatedly.
   */
  unbind(): void {
    const attempt = this.pending;
    if (attempt) {
      this.finishAttempt(attempt, "unbound");
    }

    if (!this.platformBinding) {
      this.logger.debug("connection.unbind.skipped", { reason: "not_bound" });
      return;
    }

    try {
      this.binder.unbind(this.connection);
      this.logger.debug("connection.unbound");
    } catch (error) {
      this.logger.error("connection.unbind.failed", { error: describeError(error) });
    }
    this.platformBinding = false;
    this.service = undefined;
  }

  private beginAttempt(): ConnectAttempt {
    const attempt = new ConnectAttempt(this.now());
    const hadBinding = this.platformBinding;
    this.pending = attempt;
    this.platformBinding = true;
    this.timeoutHandle = setTimeout(() => this.handleTimeout(attempt), this.connectTimeoutMs);
    this.logger.debug("connection.bind.requested", { timeoutMs: this.connectTimeoutMs });

    let accepted: boolean;
    try {
      accepted = this.binder.bind(this.target, this.connection);
    } catch (error) {
      this.platformBinding = hadBinding;
      this.logger.warn("connection.bind.failed", { error: describeError(error) });
      this.finishAttempt(attempt, "failed");
      return attempt;
    }

    if (!accepted) {
      this.platformBinding = hadBinding;
      this.logger.warn("connection.bind.rejected");
      this.finishAttempt(attempt, "rejected");
    }
    return attempt;
  }

  private async awaitAttempt(attempt: ConnectAttempt, signal: AbortSignal | undefined): Promise<boolean> {
    attempt.join();
    if (!signal) {
      return attempt.outcome;
    }

    let onAbort: () => void = () => undefined;
    const cancelled = new Promise<boolean>((resolve) => {
      onAbort = () => resolve(false);
      signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      const connected = await Promise.race([attempt.outcome, cancelled]);
      if (!attempt.isSettled && attempt.leave() === 0) {
        this.finishAttempt(attempt, "cancelled");
      }
      return connected;
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private finishAttempt(attempt: ConnectAttempt, outcome: ConnectOutcome): void {
    if (this.pending === attempt) {
      this.pending = undefined;
      if (this.timeoutHandle !== undefined) {
        clearTimeout(this.timeoutHandle);
        this.timeoutHandle = undefined;
      }
    }

    if (!attempt.settle(outcome)) {
      return;
    }

    const durationMs = this.now() - attempt.startedAt;
    this.telemetry.metrics.bindAttempts.add(1, { outcome });
    this.telemetry.metrics.connectDuration.record(durationMs, { outcome });
    if (outcome === "connected") {
      this.logger.debug("connection.established", { durationMs });
    } else if (outcome === "timeout") {
      this.logger.warn("connection.timeout", { durationMs });
    } else {
      this.logger.debug("connection.attempt.ended", { outcome, durationMs });
    }
  }

  private handleTimeout(attempt: ConnectAttempt): void {
    if (this.pending !== attempt) {
      return;
    }
    this.timeoutHandle = undefined;
    this.finishAttempt(attempt, "timeout");
  }

  private handleConnected(target: ServiceTarget, service: SsoRemoteService): void {
    this.logger.debug("connection.service_connected", { name: formatServiceTarget(target) });
    this.service = service;
    this.platformBinding = true;
    const attempt = this.pending;
    if (attempt) {
      this.finishAttempt(attempt, "connected");
    }
  }

  private handleDisconnected(target: ServiceTarget): void {
    this.logger.debug("connection.service_disconnected", { name: formatServiceTarget(target) });
    this.service = undefined;
    this.platformBinding = false;
  }

  private handleBindingDied(target: ServiceTarget): void {
    this.logger.warn("connection.binding_died", { name: formatServiceTarget(target) });
    this.service = undefined;
    this.platformBinding = false;
    const attempt = this.pending;
    if (attempt) {
      this.finishAttempt(attempt, "binding_died");
    }
  }
}
