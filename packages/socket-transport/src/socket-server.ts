import { createServer } from "node:http";

import { WebSocket, WebSocketServer, type RawData } from "ws";

import { isRemoteServiceError, RemoteServiceError, type SsoRemoteService } from "@sso-bridge/contracts";
import { createSsoLogger, describeError, type SsoLogger } from "@sso-bridge/telemetry";

import {
  accountDescriptorWireSchema,
  decodeMessage,
  encodeFrame,
  requestFrameSchema,
  type ResponseFrame,
  type SsoMethod,
} from "./protocol.js";

export interface SsoSocketServerOptions {
  readonly logger?: SsoLogger;
}

export interface SsoSocketServer {
  listen(path: string): Promise<void>;
  close(): Promise<void>;
  readonly connections: number;
}

type MethodHandler = (service: SsoRemoteService, params: ReadonlyArray<unknown>) => Promise<unknown>;

const descriptorParam = (params: ReadonlyArray<unknown>) => {
  const parsed = accountDescriptorWireSchema.safeParse(params[0]);
  if (!parsed.success) {
    throw new RemoteServiceError("rejection", "Malformed account descriptor");
  }
  return parsed.data;
};

const identifierParam = (params: ReadonlyArray<unknown>): string => {
  const [identifier] = params;
  if (typeof identifier !== "string") {
    throw new RemoteServiceError("rejection", "Account identifier must be a string");
  }
  return identifier;
};

const HANDLERS: Record<SsoMethod, MethodHandler> = {
  login: (service, params) => service.login(descriptorParam(params)),
  logout: (service, params) => service.logout(identifierParam(params)),
  logoutAll: (service) => service.logoutAll(),
  switchAccount: (service, params) => service.switchAccount(descriptorParam(params)),
  getActiveAccount: (service) => service.getActiveAccount(),
  getAllAccounts: (service) => service.getAllAccounts(),
};

/**
 * Exposes an {@link SsoRemoteService} to local clients over a WebSocket served
 * on a Unix socket path. Each request frame gets exactly one response frame.
 */
export const createSsoSocketServer = (
  service: SsoRemoteService,
  options: SsoSocketServerOptions = {},
): SsoSocketServer => {
  const logger = (options.logger ?? createSsoLogger({ name: "sso-socket-server" })).child({
    component: "socket-server",
  });
  const httpServer = createServer();
  const wss = new WebSocketServer({ server: httpServer });

  const respond = async (socket: WebSocket, raw: RawData): Promise<void> => {
    const parsed = requestFrameSchema.safeParse(decodeMessage(raw));
    if (!parsed.success) {
      logger.warn("socket.request.malformed");
      return;
    }

    const { id, method, params } = parsed.data;
    let frame: ResponseFrame;
    try {
      const result = await HANDLERS[method](service, params);
      frame = { id, result };
    } catch (error) {
      const kind = isRemoteServiceError(error) ? error.kind : "rejection";
      logger.debug("socket.request.failed", { method, kind, error: describeError(error) });
      frame = { id, error: { kind, message: describeError(error) } };
    }

    if (socket.readyState === WebSocket.OPEN) {
      socket.send(encodeFrame(frame));
    }
  };

  wss.on("connection", (socket: WebSocket) => {
    logger.debug("socket.client.connected", { connections: wss.clients.size });
    socket.on("message", (raw: RawData) => {
      respond(socket, raw).catch((error: unknown) => {
        logger.error("socket.request.unhandled", { error: describeError(error) });
      });
    });
    socket.on("error", (error: Error) => {
      logger.debug("socket.client.error", { error: error.message });
    });
    socket.once("close", () => {
      logger.debug("socket.client.closed", { connections: wss.clients.size });
    });
  });
  wss.on("error", (error: Error) => {
    logger.error("socket.server.error", { error: error.message });
  });

  return {
    listen: (path) =>
      new Promise<void>((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(path, () => {
          httpServer.off("error", reject);
          logger.info("socket.server.listening", { path });
          resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => {
          httpServer.close((error) => {
            if (error) {
              reject(error);
              return;
            }
            logger.info("socket.server.closed");
            resolve();
          });
        });
      }),
    get connections() {
      return wss.clients.size;
    },
  };
};
