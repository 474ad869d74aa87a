import { z } from "zod";
import type { AgentResponse } from "../agents/types.js";
import { StageParseError } from "../errors.js";

export const QuantOutputSchema = z.object({
  score: z.coerce.number().min(0).max(100),
  signal: z.enum(["bullish", "bearish", "neutral"]).default("neutral"),
  findings: z.string().min(1),
});

export const RiskOutputSchema = z.object({
  verdict: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["approved", "rejected"]),
  ),
  rationale: z.string().min(1),
  position_size_hint: z.coerce.number().min(0).max(1).default(0),
});

export const OrderOutputSchema = z
  .object({
    side: z.enum(["buy", "sell"]),
    order_type: z.enum(["market", "limit", "stop_limit"]),
    entry: z.coerce.number().positive(),
    exit: z.coerce.number().positive(),
    stop: z.coerce.number().positive(),
    size: z.coerce.number().positive(),
  })
  .refine((o) => (o.side === "buy" ? o.stop < o.entry && o.exit > o.entry : o.stop > o.entry && o.exit < o.entry), {
    message: "stop and exit must sit on opposite sides of entry",
  });

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

function responseText(response: AgentResponse): string {
  return typeof response === "string" ? response : JSON.stringify(response);
}

/**
 * Coerce a capability response into a plain object: structured responses
 * pass through, text is parsed as JSON after stripping a markdown fence or
 * surrounding prose.
 */
export function coerceStructured(response: AgentResponse): Record<string, unknown> {
  if (typeof response !== "string") return response;

  const fenced = FENCE_RE.exec(response);
  let body = (fenced ? fenced[1] : response).trim();
  const open = body.indexOf("{");
  const close = body.lastIndexOf("}");
  if (open === -1 || close < open) {
    throw new StageParseError("Response contains no JSON object", response);
  }
  body = body.slice(open, close + 1);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new StageParseError("JSON parse failed", response);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new StageParseError("Response JSON is not an object", response);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Parse a capability response against a stage schema or raise StageParseError. */
export function parseStageOutput<S extends z.ZodTypeAny>(schema: S, response: AgentResponse): z.output<S> {
  const result = schema.safeParse(coerceStructured(response));
  if (!result.success) {
    throw new StageParseError(`Schema validation failed: ${result.error.message}`, responseText(response));
  }
  return result.data;
}

/** Thesis text: plain prose, or a `narrative`/`thesis` field of a structured response. */
export function parseNarrative(response: AgentResponse): string {
  let text = "";
  if (typeof response === "string") {
    text = response;
  } else {
    const candidate = response.narrative ?? response.thesis;
    if (typeof candidate === "string") text = candidate;
  }
  text = text.trim();
  if (!text) {
    throw new StageParseError("Empty thesis narrative", responseText(response));
  }
  return text;
}
