import type { RawData } from "ws";
import { z } from "zod";

import { RemoteServiceError, type AccountDescriptor } from "@sso-bridge/contracts";

export const SSO_METHODS = [
  "login",
  "logout",
  "logoutAll",
  "switchAccount",
  "getActiveAccount",
  "getAllAccounts",
] as const;

export type SsoMethod = (typeof SSO_METHODS)[number];

const frameIdSchema = z.number().int().nonnegative();

export const requestFrameSchema = z.object({
  id: frameIdSchema,
  method: z.enum(SSO_METHODS),
  params: z.array(z.unknown()).default([]),
});

export type RequestFrame = z.infer<typeof requestFrameSchema>;

const remoteFailureSchema = z.object({
  kind: z.enum(["communication", "rejection"]),
  message: z.string(),
});

// `error` stays loose here so that a frame carrying an unreadable error is
// still routed to its caller as a failure.
export const responseFrameSchema = z.object({
  id: frameIdSchema,
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

export type ResponseFrame = z.infer<typeof responseFrameSchema>;

export const MALFORMED_FAILURE_MESSAGE = "Malformed error from SSO service";

export const decodeRemoteFailure = (error: unknown): RemoteServiceError => {
  const parsed = remoteFailureSchema.safeParse(error);
  return parsed.success
    ? new RemoteServiceError(parsed.data.kind, parsed.data.message)
    : new RemoteServiceError("communication", MALFORMED_FAILURE_MESSAGE);
};

export const accountDescriptorWireSchema: z.ZodType<AccountDescriptor> = z.object({
  id: z.string().optional(),
  displayName: z.string().optional(),
  email: z.string().optional(),
  profileImageUrl: z.string().optional(),
  sessionToken: z.string().optional(),
  isActive: z.boolean().optional(),
});

export const encodeFrame = (frame: RequestFrame | ResponseFrame): string => JSON.stringify(frame);

/**
 * Parses one WebSocket message as JSON. Returns undefined for text that is not JSON.
 */
export const decodeMessage = (raw: RawData): unknown => {
  const text = Array.isArray(raw)
    ? Buffer.concat(raw).toString("utf8")
    : raw instanceof ArrayBuffer
      ? Buffer.from(raw).toString("utf8")
      : raw.toString("utf8");
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};
