import { WebSocket } from "ws";

import {
  formatServiceTarget,
  type ServiceBinderPort,
  type ServiceConnection,
  type ServiceTarget,
} from "@sso-bridge/contracts";
import { createSsoLogger, type SsoLogger } from "@sso-bridge/telemetry";

import { SocketRemoteService } from "./socket-remote-service.js";

export interface SocketServiceBinderOptions {
  /** Maps a target to the socket path it listens on, or undefined when it is not installed. */
  readonly resolvePath: (target: ServiceTarget) => string | undefined;
  readonly logger?: SsoLogger;
}

interface SocketBinding {
  readonly socket: WebSocket;
  opened: boolean;
}

/** `ws+unix://` URL for the root path of a server listening on a Unix socket. */
export const toSocketUrl = (path: string): string => `ws+unix://${path}:/`;

/**
 * Binds to SSO services listening on local sockets. A socket that closes
 * after opening is reported as a disconnect; one that never opens is
 * reported as a dead binding.
 */
export class SocketServiceBinder implements ServiceBinderPort {
  private readonly resolvePath: (target: ServiceTarget) => string | undefined;

  private readonly logger: SsoLogger;

  private readonly bindings = new Map<ServiceConnection, SocketBinding>();

  constructor(options: SocketServiceBinderOptions) {
    this.resolvePath = options.resolvePath;
    this.logger = (options.logger ?? createSsoLogger({ name: "sso-socket-binder" })).child({
      component: "socket-binder",
    });
  }

  bind(target: ServiceTarget, connection: ServiceConnection): boolean {
    const path = this.resolvePath(target);
    if (!path) {
      this.logger.debug("socket.bind.unresolved", { target: formatServiceTarget(target) });
      return false;
    }

    if (this.bindings.has(connection)) {
      return true;
    }

    const socket = new WebSocket(toSocketUrl(path));
    const binding: SocketBinding = { socket, opened: false };
    this.bindings.set(connection, binding);

    socket.once("close", () => {
      if (this.bindings.get(connection) !== binding) {
        return;
      }
      this.bindings.delete(connection);
      if (binding.opened) {
        connection.onServiceDisconnected(target);
      } else {
        connection.onBindingDied?.(target);
      }
    });
    socket.on("error", (error: Error) => {
      this.logger.debug("socket.bind.error", { path, error: error.message });
    });
    socket.once("open", () => {
      binding.opened = true;
      connection.onServiceConnected(target, new SocketRemoteService(socket, this.logger));
    });
    return true;
  }

  unbind(connection: ServiceConnection): void {
    const binding = this.bindings.get(connection);
    if (!binding) {
      throw new Error("Service not registered");
    }
    this.bindings.delete(connection);
    binding.socket.terminate();
  }
}
