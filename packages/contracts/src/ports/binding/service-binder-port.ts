import type { SsoRemoteService } from "../peer/sso-remote-service.js";

/**
 * Names the remote peer: owning application, service component and binding action.
 */
export interface ServiceTarget {
  readonly packageName: string;
  readonly componentName: string;
  readonly action: string;
}

export interface ServiceConnection {
  onServiceConnected(target: ServiceTarget, service: SsoRemoteService): void;
  onServiceDisconnected(target: ServiceTarget): void;
  /** The platform gave up on a binding that will never connect. */
  onBindingDied?(target: ServiceTarget): void;
}

/**
 * Platform facility that establishes channels to out-of-process services.
 */
export interface ServiceBinderPort {
  /**
   * Requests a binding. Returns `false` when the peer is absent or the request
   * was rejected, and throws when the caller lacks permission. On `true`, the
   * outcome arrives later through the connection callbacks.
   */
  bind(target: ServiceTarget, connection: ServiceConnection): boolean;
  unbind(connection: ServiceConnection): void;
}

export const formatServiceTarget = (target: ServiceTarget): string =>
  `${target.packageName}/${target.componentName}`;
