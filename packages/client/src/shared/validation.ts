import type { ZodType, ZodTypeDef } from "zod";

import { err, ok, type Result, type SsoError } from "@sso-bridge/contracts";

/**
 * Parses an input using the provided Zod schema and converts validation failures into Result errors.
 */
export const safeParse = <TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, unknown>,
  input: unknown,
  errorFactory: (issues: string) => SsoError,
): Result<TOutput> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    const messages = [
      ...flat.formErrors,
      ...Object.values(flat.fieldErrors)
        .flat()
        .filter((value): value is string => typeof value === "string"),
    ];
    const detail = messages.length > 0 ? messages.join("; ") : parsed.error.message;
    return err(errorFactory(detail));
  }
  return ok(parsed.data);
};
