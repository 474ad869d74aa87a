import type { AutoHedgeOutput } from "../pipeline/types.js";

export type TradeStatus = "pending" | "running" | "completed" | "failed";

export interface User {
  id: string;
  username: string;
  email: string;
  fund_name: string;
  fund_description: string;
  created_at: string;
}

/**
 * A submitted batch request. `result` is non-null iff `status` is
 * "completed"; `error` is set only when "failed".
 */
export interface Trade {
  id: string;
  user_id: string;
  stocks: string[];
  task: string;
  allocation: number;
  strategy_type: string | null;
  risk_level: number | null;
  status: TradeStatus;
  created_at: string;
  executed_at: string | null;
  error: string | null;
  result: AutoHedgeOutput | null;
}

/** Trade as stored, with the version used for compare-and-swap. */
export interface TradeRecord extends Trade {
  version: number;
}

export interface HistoricalAnalytics {
  days: number;
  total_trades: number;
  completed_trades: number;
  failed_trades: number;
  /** completed / (completed + failed); 0 when nothing has finished */
  success_rate: number;
  total_allocation: number;
  stocks_analyzed: number;
  approved: number;
  rejected_exhausted: number;
  stock_failures: number;
  /** approved / stocks_analyzed; 0 when nothing was analyzed */
  approval_rate: number;
  top_approved_stocks: Array<{ stock: string; count: number }>;
}
