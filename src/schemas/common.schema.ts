import { z } from "zod";
import { APP } from "../config/constants/app.constants.js";
import { parseMoney } from "../shared/utils/money.js";

const BIGINT_MAX = 9223372036854775807n;

// bigserial ids travel as digit strings and must fit in a bigint
export const idSchema = z
  .string()
  .refine((v) => /^\d{1,19}$/.test(v) && BigInt(v) <= BIGINT_MAX, "Must be a numeric id");

export const idParamsSchema = z.object({ id: idSchema });
export type IdParams = z.infer<typeof idParamsSchema>;

/** Accepts 50, "50", "50.5" or "50.50"; yields integer cents. */
export const moneySchema = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const cents = parseMoney(String(v));
  if (cents === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Must be a non-negative amount with at most 8 digits and 2 decimal places",
    });
    return z.NEVER;
  }
  return cents;
});

export const pagingQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(APP.PAGINATION.MAX_LIMIT).default(APP.PAGINATION.DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});
