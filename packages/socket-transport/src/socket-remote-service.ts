import { WebSocket, type RawData } from "ws";

import {
  RemoteServiceError,
  type AccountDescriptor,
  type SsoRemoteService,
} from "@sso-bridge/contracts";
import type { SsoLogger } from "@sso-bridge/telemetry";

import { decodeMessage, decodeRemoteFailure, encodeFrame, responseFrameSchema, type SsoMethod } from "./protocol.js";

interface PendingCall {
  readonly method: SsoMethod;
  readonly resolve: (value: unknown) => void;
  readonly reject: (error: RemoteServiceError) => void;
}

export const CHANNEL_CLOSED_MESSAGE = "Connection to SSO service closed";

/**
 * Client stub that forwards every call as a JSON frame over an open WebSocket.
 * Calls still waiting when the socket closes fail as communication errors.
 */
export class SocketRemoteService implements SsoRemoteService {
  private nextId = 1;

  private readonly pending = new Map<number, PendingCall>();

  private closed = false;

  constructor(
    private readonly socket: WebSocket,
    private readonly logger?: SsoLogger,
  ) {
    socket.on("message", (raw: RawData) => this.handleMessage(raw));
    socket.once("close", () => this.failPending());
  }

  async login(account: AccountDescriptor): Promise<void> {
    await this.call("login", [account]);
  }

  async logout(identifier: string): Promise<void> {
    await this.call("logout", [identifier]);
  }

  async logoutAll(): Promise<void> {
    await this.call("logoutAll", []);
  }

  async switchAccount(account: AccountDescriptor): Promise<void> {
    await this.call("switchAccount", [account]);
  }

  async getActiveAccount(): Promise<unknown> {
    return this.call("getActiveAccount", []);
  }

  async getAllAccounts(): Promise<ReadonlyArray<unknown>> {
    const result = await this.call("getAllAccounts", []);
    if (!Array.isArray(result)) {
      throw new RemoteServiceError("communication", "Malformed account list from SSO service");
    }
    return result;
  }

  private call(method: SsoMethod, params: ReadonlyArray<unknown>): Promise<unknown> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new RemoteServiceError("communication", CHANNEL_CLOSED_MESSAGE));
    }

    const id = this.nextId;
    this.nextId += 1;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
      this.socket.send(encodeFrame({ id, method, params: [...params] }), (error) => {
        if (error && this.pending.delete(id)) {
          reject(new RemoteServiceError("communication", error.message));
        }
      });
    });
  }

  private handleMessage(raw: RawData): void {
    const parsed = responseFrameSchema.safeParse(decodeMessage(raw));
    if (!parsed.success) {
      this.logger?.warn("socket.response.malformed");
      return;
    }

    const frame = parsed.data;
    const call = this.pending.get(frame.id);
    if (!call) {
      this.logger?.warn("socket.response.unmatched", { id: frame.id });
      return;
    }
    this.pending.delete(frame.id);

    if (frame.error !== undefined) {
      call.reject(decodeRemoteFailure(frame.error));
      return;
    }
    call.resolve(frame.result);
  }

  private failPending(): void {
    this.closed = true;
    const waiting = [...this.pending.values()];
    this.pending.clear();
    for (const call of waiting) {
      this.logger?.debug("socket.call.aborted", { method: call.method });
      call.reject(new RemoteServiceError("communication", CHANNEL_CLOSED_MESSAGE));
    }
  }
}
