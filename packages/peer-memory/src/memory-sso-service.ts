import { randomUUID } from "node:crypto";

import {
  RemoteServiceError,
  type Account,
  type AccountDescriptor,
  type RemoteFailureKind,
  type SsoRemoteService,
} from "@sso-bridge/contracts";

type IdFactory = () => string;

export interface InMemorySsoServiceOptions {
  readonly initialAccounts?: ReadonlyArray<Account>;
  readonly idFactory?: IdFactory;
  readonly tokenFactory?: IdFactory;
  /** Emails or display names whose login is refused. */
  readonly rejectedIdentifiers?: ReadonlyArray<string>;
}

interface StoredAccount {
  id: string;
  displayName: string;
  email: string;
  profileImageUrl?: string;
  sessionToken: string;
  isActive: boolean;
}

interface InjectedFault {
  readonly kind: RemoteFailureKind;
  readonly message: string;
}

const defaultIdFactory: IdFactory = () => randomUUID();

const keyOf = (descriptor: AccountDescriptor): string => {
  const email = descriptor.email?.trim();
  return email ? email : (descriptor.displayName?.trim() ?? "");
};

const toAccount = (stored: StoredAccount): Account => ({ ...stored });

/**
 * Authentication peer that keeps its accounts in memory. At most one account
 * is active at a time; activating one deactivates the rest.
 */
export class InMemorySsoService implements SsoRemoteService {
  private readonly accounts: StoredAccount[] = [];

  private readonly idFactory: IdFactory;

  private readonly tokenFactory: IdFactory;

  private readonly rejected: ReadonlySet<string>;

  private readonly faults: InjectedFault[] = [];

  private calls = 0;

  constructor(options: InMemorySsoServiceOptions = {}) {
    this.idFactory = options.idFactory ?? defaultIdFactory;
    this.tokenFactory = options.tokenFactory ?? defaultIdFactory;
    this.rejected = new Set(options.rejectedIdentifiers ?? []);
    for (const account of options.initialAccounts ?? []) {
      this.accounts.push({ ...account });
    }
  }

  /** Number of remote calls received, failed ones included. */
  get callCount(): number {
    return this.calls;
  }

  /**
   * Makes the next call fail with the given kind instead of running.
   */
  failNext(kind: RemoteFailureKind, message: string): void {
    this.faults.push({ kind, message });
  }

  async login(account: AccountDescriptor): Promise<void> {
    this.receive();
    const key = keyOf(account);
    if (!key) {
      throw new RemoteServiceError("rejection", "Account email or name is required");
    }
    if (this.rejected.has(key)) {
      throw new RemoteServiceError("rejection", "Invalid credentials");
    }

    const existing = this.find(key);
    if (existing) {
      existing.sessionToken = this.tokenFactory();
      this.activate(existing);
      return;
    }

    const stored: StoredAccount = {
      id: this.idFactory(),
      displayName: account.displayName?.trim() || key,
      email: account.email?.trim() ?? "",
      sessionToken: this.tokenFactory(),
      isActive: false,
    };
    if (account.profileImageUrl !== undefined) {
      stored.profileImageUrl = account.profileImageUrl;
    }
    this.accounts.push(stored);
    this.activate(stored);
  }

  async logout(identifier: string): Promise<void> {
    this.receive();
    const index = this.accounts.findIndex((account) => this.matches(account, identifier));
    if (index < 0) {
      throw new RemoteServiceError("rejection", `No account matches ${identifier}`);
    }

    const [removed] = this.accounts.splice(index, 1);
    const next = this.accounts[0];
    if (removed?.isActive && next) {
      this.activate(next);
    }
  }

  async logoutAll(): Promise<void> {
    this.receive();
    this.accounts.splice(0, this.accounts.length);
  }

  async switchAccount(account: AccountDescriptor): Promise<void> {
    this.receive();
    const target =
      (account.id ? this.accounts.find((stored) => stored.id === account.id) : undefined) ??
      this.find(keyOf(account));
    if (!target) {
      throw new RemoteServiceError("rejection", "Account not found");
    }
    this.activate(target);
  }

  async getActiveAccount(): Promise<unknown> {
    this.receive();
    const active = this.accounts.find((account) => account.isActive);
    return active ? toAccount(active) : null;
  }

  async getAllAccounts(): Promise<ReadonlyArray<unknown>> {
    this.receive();
    return this.accounts.map(toAccount);
  }

  private receive(): void {
    this.calls += 1;
    const fault = this.faults.shift();
    if (fault) {
      throw new RemoteServiceError(fault.kind, fault.message);
    }
  }

  private find(key: string): StoredAccount | undefined {
    if (!key) {
      return undefined;
    }
    return this.accounts.find((account) => account.email === key || account.displayName === key);
  }

  private matches(account: StoredAccount, identifier: string): boolean {
    return account.email === identifier || account.displayName === identifier || account.id === identifier;
  }

  private activate(target: StoredAccount): void {
    for (const account of this.accounts) {
      account.isActive = account === target;
    }
  }
}
