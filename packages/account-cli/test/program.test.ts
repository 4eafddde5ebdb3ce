import { describe, expect, it, vi } from "vitest";

import { DEFAULT_SERVICE_TARGET, SsoApiClient } from "@sso-bridge/client";
import { InMemoryServiceBinder, InMemorySsoService } from "@sso-bridge/peer-memory";
import { createSsoLogger } from "@sso-bridge/telemetry";

import { createAccountsProgram, type AccountsProgramDependencies } from "../src/cli/program.js";
import { AccountViewModel } from "../src/view-model/account-view-model.js";

const logger = createSsoLogger({ name: "cli-test", level: "error" });

const sequence = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

const createHarness = (options: { installed?: boolean } = {}) => {
  const binder = new InMemoryServiceBinder();
  if (options.installed ?? true) {
    binder.register(
      DEFAULT_SERVICE_TARGET,
      new InMemorySsoService({ idFactory: sequence("id"), tokenFactory: sequence("token") }),
    );
  }

  const out: string[] = [];
  const errors: string[] = [];
  const exitCodes: number[] = [];
  const close = vi.fn(async () => undefined);
  const startServer = vi.fn(async (_socketPath: string) => ({ close }));

  const deps: AccountsProgramDependencies = {
    defaultSocketPath: "/tmp/sso-default.sock",
    createViewModel: () =>
      new AccountViewModel(new SsoApiClient({ binder, telemetry: { logger } }), { logger }),
    startServer,
    waitForShutdown: async () => undefined,
    writeOut: (text) => {
      out.push(text);
    },
    writeErr: (text) => {
      errors.push(text);
    },
    setExitCode: (code) => {
      exitCodes.push(code);
    },
  };

  const run = async (...args: string[]) => {
    await createAccountsProgram(deps).parseAsync(["node", "sso-accounts", ...args]);
  };

  return { binder, out, errors, exitCodes, run, startServer, close };
};

describe("sso-accounts program", () => {
  it("logs in and prints the refreshed state as JSON", async () => {
    const harness = createHarness();

    await harness.run("--format", "json", "login", "ada@example.com");

    const ada = { id: "id-1", displayName: "ada@example.com", email: "ada@example.com", isActive: true };
    expect(harness.out).toHaveLength(1);
    expect(JSON.parse(harness.out[0] ?? "")).toEqual({
      status: "success",
      activeAccount: ada,
      accounts: [ada],
    });
    expect(harness.exitCodes).toEqual([]);
  });

  it("prints the active account as YAML", async () => {
    const harness = createHarness();
    await harness.run("login", "ada@example.com");

    await harness.run("active");

    expect(harness.out[1]).toBe(
      [
        "activeAccount:",
        "  id: id-1",
        "  displayName: ada@example.com",
        "  email: ada@example.com",
        "  isActive: true",
      ].join("\n"),
    );
  });

  it("switches to an account by email", async () => {
    const harness = createHarness();
    await harness.run("login", "ada@example.com");
    await harness.run("login", "bea@example.com");

    await harness.run("--format", "json", "switch", "ada@example.com");

    const snapshot: unknown = JSON.parse(harness.out[2] ?? "");
    expect(snapshot).toMatchObject({ status: "success", activeAccount: { email: "ada@example.com" } });
  });

  it("lists nothing after logging everyone out", async () => {
    const harness = createHarness();
    await harness.run("login", "ada@example.com");
    await harness.run("logout-all");

    await harness.run("--format", "json", "accounts");

    expect(JSON.parse(harness.out[2] ?? "")).toEqual({ status: "idle", activeAccount: null, accounts: [] });
  });

  it("prints failures verbatim and sets the exit code", async () => {
    const harness = createHarness({ installed: false });

    await harness.run("login", "ada@example.com");

    expect(harness.out).toEqual([]);
    expect(harness.errors).toEqual(["Could not connect to SSO Service. Please ensure the service is installed."]);
    expect(harness.exitCodes).toEqual([1]);
  });

  it("unbinds after every command", async () => {
    const harness = createHarness();

    await harness.run("accounts");
    await harness.run("logout", "nobody@example.com");

    expect(harness.binder.unbindCount).toBe(2);
    expect(harness.errors).toEqual(["No account matches nobody@example.com"]);
  });

  it("serves on the configured socket by default", async () => {
    const harness = createHarness();

    await harness.run("serve");

    expect(harness.startServer).toHaveBeenCalledWith("/tmp/sso-default.sock");
  });

  it("serves on the requested socket until shutdown", async () => {
    const harness = createHarness();

    await harness.run("--socket", "/tmp/sso-test.sock", "serve");

    expect(harness.startServer).toHaveBeenCalledWith("/tmp/sso-test.sock");
    expect(harness.close).toHaveBeenCalledTimes(1);
    expect(harness.errors).toEqual(["SSO service listening on /tmp/sso-test.sock"]);
  });
});
