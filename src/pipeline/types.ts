import type { MarketSnapshot } from "../market/types.js";

export type StageName = "thesis" | "quant" | "risk" | "order";

export type RiskVerdict = "approved" | "rejected";
export type QuantSignal = "bullish" | "bearish" | "neutral";
export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit" | "stop_limit";

export type StockStatus = "completed" | "rejected_exhausted" | "failed";

// ── Stage records ────────────────────────────────────────────────────────
// All records are immutable once produced. A rejected risk outcome leads to
// a new Thesis; earlier ones stay in StockResult.theses.

export interface Thesis {
  readonly id: string;
  readonly stock: string;
  readonly narrative: string;
  /** 1-based attempt number within the stock's pipeline */
  readonly attempt: number;
  readonly prior_rejection_rationale: string | null;
  readonly generated_at: string;
}

export interface QuantAnalysis {
  readonly id: string;
  readonly stock: string;
  readonly thesis_ref: string;
  readonly score: number;
  readonly signal: QuantSignal;
  readonly findings: string;
  readonly generated_at: string;
}

export interface RiskAssessment {
  readonly id: string;
  readonly stock: string;
  readonly thesis_ref: string;
  readonly quant_ref: string;
  readonly verdict: RiskVerdict;
  readonly rationale: string;
  /** Fraction of the allocation the risk desk would commit, 0-1 */
  readonly position_size_hint: number;
  readonly generated_at: string;
}

export interface Order {
  readonly id: string;
  readonly stock: string;
  readonly side: OrderSide;
  readonly order_type: OrderType;
  readonly entry: number;
  readonly exit: number;
  readonly stop: number;
  readonly size: number;
  readonly generated_at: string;
}

// ── Stage inputs ─────────────────────────────────────────────────────────

export interface ThesisInput {
  stock: string;
  task: string;
  prior_rejection_rationale: string | null;
  attempt: number;
}

export interface QuantInput {
  stock: string;
  thesis: Thesis;
  market: MarketSnapshot;
}

export interface RiskInput {
  stock: string;
  thesis: Thesis;
  quant: QuantAnalysis;
  allocation: number;
  risk_level: number | null;
}

export interface OrderInput {
  stock: string;
  thesis: Thesis;
  quant: QuantAnalysis;
  risk: RiskAssessment;
  allocation: number;
}

export interface StageExecutor<I, O> {
  readonly name: StageName;
  run(input: I): Promise<O>;
}

// ── Results ──────────────────────────────────────────────────────────────

/**
 * One per stock per trading cycle. `order` is non-null iff `risk.verdict`
 * is "approved"; a failure after approval drops the assessment from `risk`
 * and names the stage in `failed_stage`.
 */
export interface StockResult {
  stock: string;
  status: StockStatus;
  thesis: Thesis | null;
  quant: QuantAnalysis | null;
  risk: RiskAssessment | null;
  order: Order | null;
  /** Every thesis produced, oldest first */
  theses: Thesis[];
  failed_stage: StageName | null;
  error: string | null;
  duration_ms: number;
}

export interface FundTask {
  name: string;
  description: string;
  stocks: string[];
  task: string;
  allocation: number;
  risk_level: number | null;
  strategy_type: string | null;
}

/** Batch result of one fund run; immutable after completion. */
export interface AutoHedgeOutput {
  id: string;
  name: string;
  description: string;
  stocks: string[];
  task: string;
  allocation: number;
  risk_level: number | null;
  strategy_type: string | null;
  timestamp: string;
  results: StockResult[];
}
