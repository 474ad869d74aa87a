import { z } from "zod";
import { ValidationError } from "../errors.js";

export const UserCreateSchema = z.object({
  username: z.string().trim().min(3).max(64).regex(/^[A-Za-z0-9_.-]+$/, "letters, digits, _ . - only"),
  email: z.string().trim().toLowerCase().email(),
  fund_name: z.string().trim().min(1).max(200),
  fund_description: z.string().trim().max(2000).default(""),
});

export const UserUpdateSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().optional(),
    fund_name: z.string().trim().min(1).max(200).optional(),
    fund_description: z.string().trim().max(2000).optional(),
  })
  .strict()
  .refine((u) => Object.values(u).some((v) => v !== undefined), { message: "No fields to update" });

const SYMBOL_RE = /^[A-Z0-9.^=-]{1,15}$/;

export const TradingTaskSchema = z.object({
  stocks: z
    .array(z.string().trim().toUpperCase().regex(SYMBOL_RE, "invalid ticker symbol"))
    .min(1, "at least one stock is required")
    .max(50)
    .transform((stocks) => [...new Set(stocks)]),
  task: z.string().trim().min(10, "task must be at least 10 characters").max(4000),
  allocation: z.number().positive().finite(),
  strategy_type: z.string().trim().min(1).max(100).nullish().transform((v) => v ?? null),
  risk_level: z.number().int().min(1).max(10).nullish().transform((v) => v ?? null),
});

export const ListTradesQuerySchema = z.object({
  status: z.enum(["pending", "running", "completed", "failed"]).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10),
  skip: z.coerce.number().int().min(0).default(0),
});

export const AnalyticsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).optional(),
});

/** Parse `input` or raise ValidationError with the zod issues attached. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new ValidationError(message, result.error.issues);
  }
  return result.data;
}
