import {
  formatServiceTarget,
  type ServiceBinderPort,
  type ServiceConnection,
  type ServiceTarget,
  type SsoRemoteService,
} from "@sso-bridge/contracts";

/**
 * How a registered service answers a bind request:
 * `auto` connects on the next microtask, `manual` waits for
 * {@link InMemoryServiceBinder.completeHandshake}, `never` stays silent.
 */
export type HandshakeMode = "auto" | "manual" | "never";

export interface RegisterServiceOptions {
  readonly mode?: HandshakeMode;
}

interface RegisteredService {
  readonly service: SsoRemoteService;
  readonly mode: HandshakeMode;
}

interface ActiveBinding {
  readonly target: ServiceTarget;
  readonly connection: ServiceConnection;
  readonly service: SsoRemoteService;
  connected: boolean;
}

export class InMemoryServiceBinder implements ServiceBinderPort {
  private readonly services = new Map<string, RegisteredService>();

  private readonly bindings = new Map<ServiceConnection, ActiveBinding>();

  private permissionDenied = false;

  private bindCalls = 0;

  private unbindCalls = 0;

  register(target: ServiceTarget, service: SsoRemoteService, options: RegisterServiceOptions = {}): void {
    this.services.set(formatServiceTarget(target), { service, mode: options.mode ?? "auto" });
  }

  unregister(target: ServiceTarget): void {
    this.services.delete(formatServiceTarget(target));
  }

  /** While denied, bind throws as a platform permission check would. */
  denyPermission(denied = true): void {
    this.permissionDenied = denied;
  }

  get bindCount(): number {
    return this.bindCalls;
  }

  get unbindCount(): number {
    return this.unbindCalls;
  }

  get activeBindings(): number {
    return this.bindings.size;
  }

  bind(target: ServiceTarget, connection: ServiceConnection): boolean {
    this.bindCalls += 1;
    if (this.permissionDenied) {
      throw new Error(`Permission denial: not allowed to bind to ${formatServiceTarget(target)}`);
    }

    const registered = this.services.get(formatServiceTarget(target));
    if (!registered) {
      return false;
    }

    const existing = this.bindings.get(connection);
    if (existing) {
      return true;
    }

    const binding: ActiveBinding = { target, connection, service: registered.service, connected: false };
    this.bindings.set(connection, binding);
    if (registered.mode === "auto") {
      queueMicrotask(() => this.deliver(binding));
    }
    return true;
  }

  unbind(connection: ServiceConnection): void {
    this.unbindCalls += 1;
    if (!this.bindings.delete(connection)) {
      throw new Error("Service not registered");
    }
  }

  /**
   * Delivers the connected callback for every binding still waiting on it.
   * Returns how many were delivered.
   */
  completeHandshake(): number {
    const waiting = [...this.bindings.values()].filter((binding) => !binding.connected);
    for (const binding of waiting) {
      this.deliver(binding);
    }
    return waiting.length;
  }

  /** Drops every connected binding and notifies its connection. */
  simulateDisconnect(): void {
    for (const binding of [...this.bindings.values()]) {
      if (!binding.connected) {
        continue;
      }
      this.bindings.delete(binding.connection);
      binding.connection.onServiceDisconnected(binding.target);
    }
  }

  /** Drops every binding and reports it as dead. */
  simulateBindingDied(): void {
    for (const binding of [...this.bindings.values()]) {
      this.bindings.delete(binding.connection);
      binding.connection.onBindingDied?.(binding.target);
    }
  }

  private deliver(binding: ActiveBinding): void {
    if (this.bindings.get(binding.connection) !== binding || binding.connected) {
      return;
    }
    binding.connected = true;
    binding.connection.onServiceConnected(binding.target, binding.service);
  }
}
