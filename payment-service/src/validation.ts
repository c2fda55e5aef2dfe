import { z } from "zod";
import { PaymentError } from "./errors";
import { DEFAULT_CURRENCY, type PaymentIntent } from "./types";

// NUMERIC(12,2)
const MAX_AMOUNT = 10_000_000_000;

/** Upper bound of a Postgres INTEGER / SERIAL column. */
export const MAX_ID = 2_147_483_647;

function hasAtMostTwoDecimals(value: number): boolean {
  return Math.round(value * 100) / 100 === value;
}

const amountSchema = z
  .preprocess(
    (val) => (typeof val === "string" && val.trim() !== "" ? Number(val) : val),
    z.number({ required_error: "amount is required", invalid_type_error: "amount must be a number" })
  )
  .superRefine((value, ctx) => {
    if (!Number.isFinite(value) || value <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "amount must be greater than 0" });
      return;
    }
    if (!hasAtMostTwoDecimals(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "amount must have at most 2 decimal places" });
      return;
    }
    if (value >= MAX_AMOUNT) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "amount must be less than 10000000000" });
      return;
    }
    if (Math.round(value * 100) < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "amount must be at least 0.01" });
    }
  })
  .transform((value) => Math.round(value * 100));

const currencySchema = z.preprocess(
  (val) => (val === undefined || val === null || val === "" ? DEFAULT_CURRENCY : val),
  z
    .string({ invalid_type_error: "currency must be a string" })
    .trim()
    .toUpperCase()
    .regex(/^[A-Z]{3,8}$/, "currency must be a 3 to 8 letter code")
);

export const paymentIntentSchema = z.object({
  user_id: z.preprocess(
    (val) => (typeof val === "string" && /^\d+$/.test(val) ? Number(val) : val),
    z
      .number({ required_error: "user_id is required", invalid_type_error: "user_id must be a number" })
      .int("user_id must be an integer")
      .positive("user_id must be positive")
      .max(MAX_ID, `user_id must be at most ${MAX_ID}`)
  ),
  amount: amountSchema,
  currency: currencySchema,
  description: z
    .string({ invalid_type_error: "description must be a string" })
    .max(2000, "description must be at most 2000 characters")
    .nullish()
    .transform((val) => val ?? null),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validates a raw request body into a PaymentIntent, or throws ValidationFailed. */
export function parsePaymentIntent(input: unknown): PaymentIntent {
  const result = paymentIntentSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new PaymentError("ValidationFailed", formatIssues(result.error), {
      details: { fields: result.error.flatten().fieldErrors },
    });
  }
  const { user_id, amount, currency, description } = result.data;
  return { userId: user_id, amountCents: amount, currency, description };
}

export function toAmount(amountCents: number): number {
  return amountCents / 100;
}

/** Decimal string for a NUMERIC(12,2) column. */
export function formatAmount(amountCents: number): string {
  return (amountCents / 100).toFixed(2);
}

export function parseAmount(value: string | number): number {
  return Math.round(Number(value) * 100);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Positive id that fits an INTEGER column, or null. */
export function parseId(raw: unknown): number | null {
  let id: number;
  if (typeof raw === "number") id = raw;
  else if (typeof raw === "string" && /^\d+$/.test(raw)) id = Number(raw);
  else return null;
  return Number.isInteger(id) && id > 0 && id <= MAX_ID ? id : null;
}
