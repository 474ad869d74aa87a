import type { AutoHedgeOutput, StockResult, StockStatus } from "../src/pipeline/types.js";

export function stockResult(stock: string, status: StockStatus): StockResult {
  return {
    stock,
    status,
    thesis: null,
    quant: null,
    risk: null,
    order: null,
    theses: [],
    failed_stage: status === "failed" ? "quant" : null,
    error: status === "failed" ? "market data: unavailable" : null,
    duration_ms: 5,
  };
}

export function fundOutput(results: StockResult[]): AutoHedgeOutput {
  return {
    id: "output-1",
    name: "Test Fund",
    description: "",
    stocks: results.map((r) => r.stock),
    task: "Placeholder task for tests",
    allocation: 10_000,
    risk_level: null,
    strategy_type: null,
    timestamp: "2026-03-01T00:00:00.000Z",
    results,
  };
}
