import { createServer } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer, type RawData } from "ws";

import { DEFAULT_SERVICE_TARGET, SsoApiClient } from "@sso-bridge/client";
import { SSO_ERROR_CODES, formatServiceTarget, type ServiceTarget } from "@sso-bridge/contracts";
import { InMemorySsoService } from "@sso-bridge/peer-memory";
import { createSsoLogger } from "@sso-bridge/telemetry";

import { decodeMessage, MALFORMED_FAILURE_MESSAGE, requestFrameSchema, type RequestFrame } from "../src/protocol.js";
import { SocketServiceBinder } from "../src/socket-binder.js";
import { createSsoSocketServer, type SsoSocketServer } from "../src/socket-server.js";

const logger = createSsoLogger({ name: "socket-test", level: "error" });

let socketCounter = 0;
const nextSocketPath = (): string => {
  socketCounter += 1;
  return join(tmpdir(), `sso-bridge-${process.pid}-${Date.now()}-${socketCounter}.sock`);
};

const sequence = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

class HangingLogoutService extends InMemorySsoService {
  logoutCalls = 0;

  override logout(_identifier: string): Promise<void> {
    this.logoutCalls += 1;
    return new Promise<void>(() => undefined);
  }
}

describe("socket transport", () => {
  let socketPath: string;
  let server: SsoSocketServer | undefined;

  const serve = async (service: InMemorySsoService): Promise<SsoSocketServer> => {
    const started = createSsoSocketServer(service, { logger });
    await started.listen(socketPath);
    server = started;
    return started;
  };

  let stopScripted: (() => Promise<void>) | undefined;

  // A bare peer that answers every request with whatever `answer` returns.
  const serveScripted = async (answer: (request: RequestFrame) => unknown): Promise<void> => {
    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer });
    wss.on("connection", (socket) => {
      socket.on("message", (raw: RawData) => {
        socket.send(JSON.stringify(answer(requestFrameSchema.parse(decodeMessage(raw)))));
      });
    });
    await new Promise<void>((resolve) => {
      httpServer.listen(socketPath, resolve);
    });
    stopScripted = async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
    };
  };

  const stopServer = async (): Promise<void> => {
    const running = server;
    server = undefined;
    if (running) {
      await running.close();
    }
    const scripted = stopScripted;
    stopScripted = undefined;
    if (scripted) {
      await scripted();
    }
  };

  const createClient = (resolve: (target: ServiceTarget) => string | undefined = () => socketPath) =>
    new SsoApiClient({
      binder: new SocketServiceBinder({ resolvePath: resolve, logger }),
      config: { connectTimeoutMs: 2000 },
      telemetry: { logger },
    });

  beforeEach(() => {
    socketPath = nextSocketPath();
  });

  afterEach(async () => {
    await stopServer();
  });

  it("runs every operation against a peer behind a socket", async () => {
    await serve(new InMemorySsoService({ idFactory: sequence("id"), tokenFactory: sequence("token") }));
    const client = createClient((target) =>
      formatServiceTarget(target) === formatServiceTarget(DEFAULT_SERVICE_TARGET) ? socketPath : undefined,
    );

    expect((await client.login({ email: "a@example.com", displayName: "Ada" })).ok).toBe(true);
    expect((await client.login({ email: "b@example.com", displayName: "Bea" })).ok).toBe(true);
    expect((await client.switchAccount({ email: "a@example.com" })).ok).toBe(true);

    await expect(client.getActiveAccount()).resolves.toEqual({
      id: "id-1",
      displayName: "Ada",
      email: "a@example.com",
      sessionToken: "token-1",
      isActive: true,
    });

    expect((await client.logout("Bea")).ok).toBe(true);
    const accounts = await client.getAllAccounts();
    expect(accounts.map((account) => account.email)).toEqual(["a@example.com"]);

    expect((await client.logoutAll()).ok).toBe(true);
    await expect(client.getAllAccounts()).resolves.toEqual([]);

    client.unbind();
    expect(client.isConnected()).toBe(false);
  });

  it("carries the peer's rejection across the socket", async () => {
    await serve(new InMemorySsoService());
    const client = createClient();

    const result = await client.switchAccount({ email: "nobody@example.com" });

    expect(result).toEqual({
      ok: false,
      error: { code: SSO_ERROR_CODES.remoteRejection, message: "Account not found" },
    });
    client.unbind();
  });

  it("fails fast when no socket is known for the target", async () => {
    const client = createClient(() => undefined);

    const result = await client.logoutAll();

    expect(!result.ok && result.error.code).toBe(SSO_ERROR_CODES.connectionUnavailable);
  });

  it("fails fast when nothing listens on the socket", async () => {
    const client = createClient();

    const started = Date.now();
    const result = await client.logoutAll();

    expect(!result.ok && result.error.code).toBe(SSO_ERROR_CODES.connectionUnavailable);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it("notices when the server goes away and degrades queries", async () => {
    await serve(new InMemorySsoService());
    const client = createClient();
    expect((await client.login({ email: "a@example.com" })).ok).toBe(true);

    await stopServer();
    await vi.waitFor(() => expect(client.isConnected()).toBe(false));

    await expect(client.getActiveAccount()).resolves.toBeUndefined();
  });

  it("reports a channel lost when the server closes during a call", async () => {
    const service = new HangingLogoutService();
    const running = await serve(service);
    const client = createClient();

    const pending = client.logout("a@example.com");
    await vi.waitFor(() => expect(service.logoutCalls).toBe(1));
    expect(running.connections).toBe(1);

    await stopServer();
    const result = await pending;

    expect(!result.ok && result.error.code).toBe(SSO_ERROR_CODES.channelLost);
  });

  it("fails a call whose error frame cannot be read", async () => {
    await serveScripted(({ id }) => ({ id, error: { kind: "server_error", message: "boom" } }));
    const client = createClient();

    const result = await client.login({ email: "a@example.com" });

    expect(result).toEqual({
      ok: false,
      error: {
        code: SSO_ERROR_CODES.remoteCommunicationFailure,
        message: MALFORMED_FAILURE_MESSAGE,
        retryable: true,
      },
    });
    client.unbind();
  });

  it("passes a communication failure from the peer through", async () => {
    await serveScripted(({ id }) => ({ id, error: { kind: "communication", message: "Store unavailable" } }));
    const client = createClient();

    const result = await client.logoutAll();

    expect(result).toEqual({
      ok: false,
      error: { code: SSO_ERROR_CODES.remoteCommunicationFailure, message: "Store unavailable", retryable: true },
    });
    client.unbind();
  });
});
