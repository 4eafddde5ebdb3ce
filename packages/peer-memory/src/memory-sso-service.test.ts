import { describe, expect, it } from "vitest";

import { RemoteServiceError } from "@sso-bridge/contracts";

import { InMemorySsoService } from "./memory-sso-service.js";

const sequence = (prefix: string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};

const createService = (rejectedIdentifiers: ReadonlyArray<string> = []) =>
  new InMemorySsoService({ idFactory: sequence("id"), tokenFactory: sequence("token"), rejectedIdentifiers });

const activeEmails = async (service: InMemorySsoService) => {
  const accounts = (await service.getAllAccounts()) as ReadonlyArray<{ email: string; isActive: boolean }>;
  return accounts.filter((account) => account.isActive).map((account) => account.email);
};

describe("InMemorySsoService", () => {
  it("keeps exactly one account active across logins", async () => {
    const service = createService();

    await service.login({ email: "a@example.com" });
    await service.login({ email: "b@example.com" });

    expect(await activeEmails(service)).toEqual(["b@example.com"]);
    expect(await service.getActiveAccount()).toEqual({
      id: "id-2",
      displayName: "b@example.com",
      email: "b@example.com",
      sessionToken: "token-2",
      isActive: true,
    });
  });

  it("reactivates an existing account with a fresh token on repeat login", async () => {
    const service = createService();
    await service.login({ email: "a@example.com" });
    await service.login({ email: "b@example.com" });

    await service.login({ email: "a@example.com" });

    const accounts = await service.getAllAccounts();
    expect(accounts).toHaveLength(2);
    expect(await service.getActiveAccount()).toMatchObject({ id: "id-1", sessionToken: "token-3" });
  });

  it("activates the first remaining account when the active one logs out", async () => {
    const service = createService();
    await service.login({ email: "a@example.com", displayName: "A" });
    await service.login({ email: "b@example.com", displayName: "B" });
    await service.login({ email: "c@example.com", displayName: "C" });

    await service.logout("C");

    expect(await activeEmails(service)).toEqual(["a@example.com"]);
  });

  it("matches logout identifiers against email, display name and id", async () => {
    const service = createService();
    await service.login({ email: "a@example.com", displayName: "A" });
    await service.login({ email: "b@example.com", displayName: "B" });
    await service.login({ email: "c@example.com", displayName: "C" });

    await service.logout("a@example.com");
    await service.logout("B");
    await service.logout("id-3");

    expect(await service.getAllAccounts()).toEqual([]);
    expect(await service.getActiveAccount()).toBeNull();
  });

  it("rejects unknown identifiers and refused logins", async () => {
    const service = createService(["mallory@example.com"]);

    await expect(service.logout("nobody")).rejects.toMatchObject({
      kind: "rejection",
      message: "No account matches nobody",
    });
    await expect(service.switchAccount({ email: "nobody@example.com" })).rejects.toBeInstanceOf(RemoteServiceError);
    await expect(service.login({ email: "mallory@example.com" })).rejects.toThrow("Invalid credentials");
  });

  it("fails the next call with an injected fault only once", async () => {
    const service = createService();
    service.failNext("communication", "Transport fault");

    await expect(service.logoutAll()).rejects.toMatchObject({ kind: "communication", message: "Transport fault" });
    await expect(service.logoutAll()).resolves.toBeUndefined();
    expect(service.callCount).toBe(2);
  });

  it("hands out copies that do not alias stored state", async () => {
    const service = createService();
    await service.login({ email: "a@example.com" });

    const [first] = (await service.getAllAccounts()) as ReadonlyArray<{ isActive: boolean }>;
    if (first) {
      first.isActive = false;
    }

    expect(await activeEmails(service)).toEqual(["a@example.com"]);
  });
});
