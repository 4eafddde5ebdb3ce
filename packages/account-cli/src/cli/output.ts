import { stringify as stringifyYaml } from "yaml";

import type { Account } from "@sso-bridge/contracts";

import type { AccountViewState } from "../view-model/account-view-model.js";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const ensureFormat = (value: string): OutputFormat => {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format) {
    return format;
  }
  throw new Error(`Unsupported output format ${value}. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
};

interface AccountView {
  readonly id: string;
  readonly displayName: string;
  readonly email: string;
  readonly isActive: boolean;
}

export interface AccountsSnapshot {
  readonly status: AccountViewState["loginState"]["status"];
  readonly activeAccount: AccountView | null;
  readonly accounts: ReadonlyArray<AccountView>;
}

// Session tokens stay out of terminal output.
const toView = (account: Account): AccountView => ({
  id: account.id,
  displayName: account.displayName,
  email: account.email,
  isActive: account.isActive,
});

export const toSnapshot = (state: AccountViewState): AccountsSnapshot => ({
  status: state.loginState.status,
  activeAccount: state.activeAccount ? toView(state.activeAccount) : null,
  accounts: state.accounts.map(toView),
});

export const renderValue = (value: unknown, format: OutputFormat): string =>
  format === "json" ? JSON.stringify(value, null, 2) : stringifyYaml(value).trimEnd();
