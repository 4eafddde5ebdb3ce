import { Command } from "commander";

import type { AccountViewModel } from "../view-model/account-view-model.js";
import { ensureFormat, renderValue, toSnapshot, type AccountsSnapshot, type OutputFormat } from "./output.js";

export interface RunningServer {
  close(): Promise<void>;
}

export interface AccountsProgramDependencies {
  readonly defaultSocketPath: string;
  readonly createViewModel: (socketPath: string) => AccountViewModel;
  readonly startServer: (socketPath: string) => Promise<RunningServer>;
  readonly waitForShutdown: () => Promise<void>;
  readonly writeOut: (text: string) => void;
  readonly writeErr: (text: string) => void;
  readonly setExitCode: (code: number) => void;
}

type GlobalOptions = {
  readonly socket: string;
  readonly format: OutputFormat;
};

type ViewModelAction = (viewModel: AccountViewModel) => Promise<void>;

/**
 * Builds the `sso-accounts` command tree. Every client command connects on
 * demand, runs one view-model action, prints the resulting state and unbinds.
 */
export const createAccountsProgram = (deps: AccountsProgramDependencies): Command => {
  const program = new Command();

  program
    .name("sso-accounts")
    .description("Manage accounts held by the SSO service")
    .option("--socket <path>", "Socket the SSO service listens on", deps.defaultSocketPath)
    .option("--format <format>", "Output format (json|yaml)", ensureFormat, "yaml");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const run = async (
    action: ViewModelAction,
    select: (snapshot: AccountsSnapshot) => unknown = (snapshot) => snapshot,
  ): Promise<void> => {
    const { socket, format } = globals();
    const viewModel = deps.createViewModel(socket);
    try {
      await action(viewModel);
      const { loginState } = viewModel.state;
      if (loginState.status === "error") {
        deps.writeErr(loginState.message);
        deps.setExitCode(1);
        return;
      }
      deps.writeOut(renderValue(select(toSnapshot(viewModel.state)), format));
    } finally {
      viewModel.dispose();
    }
  };

  program
    .command("serve")
    .description("Host an in-memory SSO service on the socket")
    .action(async () => {
      const { socket } = globals();
      const server = await deps.startServer(socket);
      deps.writeErr(`SSO service listening on ${socket}`);
      try {
        await deps.waitForShutdown();
      } finally {
        await server.close();
      }
    });

  program
    .command("login")
    .argument("<username>", "Used as both email and display name")
    .description("Sign in and make the account active")
    .action((username: string) => run((viewModel) => viewModel.login(username)));

  program
    .command("logout")
    .argument("<identifier>", "Email, display name or id of the account")
    .description("Sign out one account")
    .action((identifier: string) => run((viewModel) => viewModel.logout(identifier)));

  program
    .command("logout-all")
    .description("Sign out every account")
    .action(() => run((viewModel) => viewModel.logoutAll()));

  program
    .command("switch")
    .argument("<identifier>", "Email, display name or id of the account")
    .description("Make another signed-in account active")
    .action((identifier: string) =>
      run(async (viewModel) => {
        await viewModel.refreshAccounts();
        const account = viewModel.state.accounts.find(
          (candidate) =>
            candidate.email === identifier || candidate.displayName === identifier || candidate.id === identifier,
        );
        await viewModel.switchAccount(account ?? { email: identifier, displayName: identifier });
      }),
    );

  program
    .command("accounts")
    .description("List signed-in accounts")
    .action(() => run((viewModel) => viewModel.initialize()));

  program
    .command("active")
    .description("Show the active account")
    .action(() =>
      run(
        (viewModel) => viewModel.initialize(),
        (snapshot) => ({ activeAccount: snapshot.activeAccount }),
      ),
    );

  return program;
};
