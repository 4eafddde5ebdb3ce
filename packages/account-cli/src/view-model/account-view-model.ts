import { createStore, type StoreApi } from "zustand/vanilla";

import type { Account, AccountDescriptor, Result } from "@sso-bridge/contracts";
import { createSsoLogger, describeError, type SsoLogger } from "@sso-bridge/telemetry";

export type LoginState =
  | { readonly status: "idle" }
  | { readonly status: "loading" }
  | { readonly status: "success" }
  | { readonly status: "error"; readonly message: string };

export interface AccountViewState {
  readonly loginState: LoginState;
  readonly accounts: ReadonlyArray<Account>;
  readonly activeAccount: Account | undefined;
  readonly errorMessage: string | undefined;
  readonly isInitialized: boolean;
}

/**
 * The slice of the SSO client the view model drives.
 */
export interface AccountGateway {
  login(account: AccountDescriptor): Promise<Result<void>>;
  logout(identifier: string): Promise<Result<void>>;
  logoutAll(): Promise<Result<void>>;
  switchAccount(account: AccountDescriptor): Promise<Result<void>>;
  getActiveAccount(): Promise<Account | undefined>;
  getAllAccounts(): Promise<ReadonlyArray<Account>>;
  unbind(): void;
}

export interface AccountViewModelOptions {
  readonly logger?: SsoLogger;
}

const IDLE: LoginState = { status: "idle" };
const LOADING: LoginState = { status: "loading" };
const SUCCESS: LoginState = { status: "success" };

export const INITIAL_ACCOUNT_VIEW_STATE: AccountViewState = {
  loginState: IDLE,
  accounts: [],
  activeAccount: undefined,
  errorMessage: undefined,
  isInitialized: false,
};

/**
 * Caches what the SSO peer last reported and republishes it as observable
 * state. The cache is only brought back in line with the peer by an explicit
 * refresh; every successful mutation triggers one.
 */
export class AccountViewModel {
  readonly store: StoreApi<AccountViewState>;

  private readonly logger: SsoLogger;

  constructor(
    private readonly gateway: AccountGateway,
    options: AccountViewModelOptions = {},
  ) {
    this.store = createStore<AccountViewState>()(() => INITIAL_ACCOUNT_VIEW_STATE);
    this.logger = (options.logger ?? createSsoLogger({ name: "account-view-model" })).child({
      component: "account-view-model",
    });
  }

  get state(): AccountViewState {
    return this.store.getState();
  }

  subscribe(listener: (state: AccountViewState, previous: AccountViewState) => void): () => void {
    return this.store.subscribe(listener);
  }

  async initialize(): Promise<void> {
    this.logger.debug("accounts.startup.fetch");
    try {
      await this.refreshAccounts();
    } catch (error) {
      this.logger.error("accounts.startup.failed", { error: describeError(error) });
    } finally {
      this.store.setState({ isInitialized: true });
    }
  }

  /**
   * Signs in with the username used as both email and display name.
   */
  async login(username: string): Promise<void> {
    this.store.setState({ loginState: LOADING });
    const result = await this.gateway.login({ email: username, displayName: username, isActive: true });
    if (!result.ok) {
      this.fail(result.error.message, "Login failed");
      return;
    }
    this.store.setState({ loginState: SUCCESS });
    await this.refreshAccounts();
  }

  async logout(identifier: string): Promise<void> {
    this.logger.debug("accounts.logout", { identifier });
    this.store.setState({ loginState: LOADING });
    const result = await this.gateway.logout(identifier);
    if (!result.ok) {
      this.fail(result.error.message, "Logout failed");
      return;
    }
    this.store.setState({ loginState: IDLE });
    await this.refreshAccounts();
  }

  async logoutAll(): Promise<void> {
    this.store.setState({ loginState: LOADING });
    const result = await this.gateway.logoutAll();
    if (!result.ok) {
      this.fail(result.error.message, "Logout all failed");
      return;
    }
    this.store.setState({ loginState: IDLE, accounts: [], activeAccount: undefined });
  }

  async switchAccount(account: AccountDescriptor): Promise<void> {
    this.store.setState({ loginState: LOADING });
    const result = await this.gateway.switchAccount(account);
    if (!result.ok) {
      this.fail(result.error.message, "Switch account failed");
      return;
    }
    this.store.setState({ loginState: SUCCESS });
    await this.refreshAccounts();
  }

  async refreshAccounts(): Promise<void> {
    const accounts = await this.gateway.getAllAccounts();
    const activeAccount = await this.gateway.getActiveAccount();
    this.store.setState({ accounts, activeAccount });
    this.logger.debug("accounts.refreshed", {
      count: accounts.length,
      active: activeAccount?.displayName ?? null,
    });
  }

  clearError(): void {
    this.store.setState({ errorMessage: undefined });
  }

  resetLoginState(): void {
    this.store.setState({ loginState: IDLE });
  }

  dispose(): void {
    this.gateway.unbind();
  }

  private fail(message: string, fallback: string): void {
    const text = message.length > 0 ? message : fallback;
    this.store.setState({ loginState: { status: "error", message: text }, errorMessage: text });
  }
}
