import { SsoApiClient, loadSsoClientConfig } from "@sso-bridge/client";
import { formatServiceTarget } from "@sso-bridge/contracts";
import { InMemorySsoService } from "@sso-bridge/peer-memory";
import { createSsoSocketServer, SocketServiceBinder } from "@sso-bridge/socket-transport";
import { createSsoLogger } from "@sso-bridge/telemetry";

import type { AccountsProgramDependencies, RunningServer } from "./cli/program.js";
import { AccountViewModel } from "./view-model/account-view-model.js";

/**
 * Wires the CLI to a socket-hosted SSO service, configured from the environment.
 */
export const createRuntimeDependencies = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): AccountsProgramDependencies => {
  const config = loadSsoClientConfig(env);
  const logger = createSsoLogger({ name: "sso-accounts", level: config.logLevel });
  const targetName = formatServiceTarget(config.target);

  const createViewModel = (socketPath: string): AccountViewModel => {
    const binder = new SocketServiceBinder({
      resolvePath: (target) => (formatServiceTarget(target) === targetName ? socketPath : undefined),
      logger,
    });
    const client = new SsoApiClient({ binder, config, telemetry: { logger } });
    return new AccountViewModel(client, { logger });
  };

  const startServer = async (socketPath: string): Promise<RunningServer> => {
    const server = createSsoSocketServer(new InMemorySsoService(), { logger });
    await server.listen(socketPath);
    return server;
  };

  const waitForShutdown = () =>
    new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });

  return {
    defaultSocketPath: config.socketPath,
    createViewModel,
    startServer,
    waitForShutdown,
    writeOut: (text) => {
      process.stdout.write(`${text}\n`);
    },
    writeErr: (text) => {
      process.stderr.write(`${text}\n`);
    },
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
};
