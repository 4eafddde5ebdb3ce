import type { SsoError } from "./domain-error.js";

export type Result<TValue, TError extends SsoError = SsoError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): Result<TValue> => ({ ok: true as const, value });

export const err = <TError extends SsoError>(error: TError): Result<never, TError> => ({
  ok: false as const,
  error,
});
