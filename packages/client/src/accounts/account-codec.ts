import { z } from "zod";

import type { Account, AccountDescriptor } from "@sso-bridge/contracts";

const accountPayloadSchema = z.object({
  id: z.string().default(""),
  displayName: z.string().default(""),
  email: z.string().default(""),
  profileImageUrl: z.string().optional(),
  sessionToken: z.string().default(""),
  isActive: z.boolean().default(false),
});

export const accountDescriptorSchema = z
  .object({
    id: z.string().optional(),
    displayName: z.string().trim().optional(),
    email: z.string().trim().optional(),
    profileImageUrl: z.string().optional(),
    sessionToken: z.string().optional(),
    isActive: z.boolean().optional(),
  })
  .refine((value) => Boolean(value.email) || Boolean(value.displayName), {
    message: "An email or a display name is required.",
  });

const freeze = (account: Account): Account => Object.freeze({ ...account });

export const createAccount = (descriptor: AccountDescriptor): Account => {
  const account: Account = {
    id: descriptor.id ?? "",
    displayName: descriptor.displayName ?? "",
    email: descriptor.email ?? "",
    sessionToken: descriptor.sessionToken ?? "",
    isActive: descriptor.isActive ?? false,
  };
  return freeze(
    descriptor.profileImageUrl === undefined
      ? account
      : { ...account, profileImageUrl: descriptor.profileImageUrl },
  );
};

/**
 * Decodes one account from a peer payload. Returns undefined for anything that
 * is not an account-shaped object.
 */
export const decodeAccount = (payload: unknown): Account | undefined => {
  const parsed = accountPayloadSchema.safeParse(payload);
  return parsed.success ? createAccount(parsed.data) : undefined;
};

export const decodeAccountList = (payload: ReadonlyArray<unknown>): ReadonlyArray<Account> =>
  payload
    .map((entry) => decodeAccount(entry))
    .filter((account): account is Account => account !== undefined);

// Local convenience only; the peer decides which account is really active.
export const withActiveFlag = (account: Account, isActive: boolean): Account =>
  freeze({ ...account, isActive });
