import type { AccountDescriptor } from "../../types/account.js";

/**
 * Operations the remote authentication peer answers over a bound channel.
 *
 * Calls reject with a `RemoteServiceError` when the transport faults or the
 * peer refuses the request. Query responses are raw payloads: the caller is
 * responsible for decoding them, since a peer may send malformed entries.
 */
export interface SsoRemoteService {
  login(account: AccountDescriptor): Promise<void>;
  logout(identifier: string): Promise<void>;
  logoutAll(): Promise<void>;
  switchAccount(account: AccountDescriptor): Promise<void>;
  getActiveAccount(): Promise<unknown>;
  getAllAccounts(): Promise<ReadonlyArray<unknown>>;
}
