import { randomUUID } from "node:crypto";
import type { AgentCapability } from "../agents/types.js";
import { CollaboratorUnavailableError, errorMessage } from "../errors.js";
import { logFund } from "../logging.js";
import type { MarketDataProvider } from "../market/types.js";
import { PipelineOrchestrator } from "./orchestrator.js";
import { mapWithConcurrency } from "./pool.js";
import { createStages, type PipelineStages } from "./stages.js";
import type { AutoHedgeOutput, FundTask, StockResult } from "./types.js";

export interface FundRunnerDeps {
  agent: AgentCapability;
  market: MarketDataProvider;
  maxRetries: number;
  maxWorkers: number;
  /** Override the stage executors built from `agent` (tests) */
  stages?: PipelineStages;
}

export interface FundProgress {
  completed: number;
  total: number;
  stock: string;
  status: StockResult["status"];
}

export interface FundRunOptions {
  /** Pool width; defaults to min(stocks, maxWorkers) */
  concurrency?: number;
  onProgress?: (progress: FundProgress) => void;
}

export interface FundRunner {
  run(task: FundTask, opts?: FundRunOptions): Promise<AutoHedgeOutput>;
}

async function preflight(agent: AgentCapability, market: MarketDataProvider): Promise<void> {
  const checks: Array<[string, () => Promise<void>]> = [
    [`agent:${agent.id}`, () => agent.checkAvailability()],
    [`market:${market.id}`, () => market.checkAvailability()],
  ];
  for (const [label, check] of checks) {
    try {
      await check();
    } catch (e: unknown) {
      if (e instanceof CollaboratorUnavailableError) throw e;
      throw new CollaboratorUnavailableError(`${label} unavailable: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * Runs one orchestrator per stock through a bounded pool. A stock's failure
 * never aborts its siblings; only an unreachable collaborator rejects the run.
 */
export function createFundRunner(deps: FundRunnerDeps): FundRunner {
  const stages = deps.stages ?? createStages(deps.agent);

  return {
    async run(task, opts = {}) {
      await preflight(deps.agent, deps.market);

      const { stocks } = task;
      const perStock = stocks.length > 0 ? task.allocation / stocks.length : 0;
      const width = Math.max(1, Math.min(stocks.length, opts.concurrency ?? deps.maxWorkers));
      const start = Date.now();
      logFund.info({ fund: task.name, stocks, width }, `Fund run started: ${stocks.length} stock(s)`);

      const orchestrators = new Map<string, PipelineOrchestrator>();
      for (const stock of stocks) {
        orchestrators.set(
          stock,
          new PipelineOrchestrator(
            { stock, task: task.task, allocation: perStock, risk_level: task.risk_level },
            { stages, market: deps.market, maxRetries: deps.maxRetries },
          ),
        );
      }

      let completed = 0;
      const results = await mapWithConcurrency(stocks, width, async (stock) => {
        const orchestrator = orchestrators.get(stock);
        if (!orchestrator) throw new Error(`No orchestrator for ${stock}`);
        const result = await orchestrator.run();
        completed++;
        opts.onProgress?.({ completed, total: stocks.length, stock, status: result.status });
        return result;
      });

      const summary = { completed: 0, rejected_exhausted: 0, failed: 0 };
      for (const r of results) summary[r.status]++;
      logFund.info({ fund: task.name, ...summary, duration_ms: Date.now() - start }, "Fund run finished");

      return {
        id: randomUUID(),
        name: task.name,
        description: task.description,
        stocks: [...stocks],
        task: task.task,
        allocation: task.allocation,
        risk_level: task.risk_level,
        strategy_type: task.strategy_type,
        timestamp: new Date().toISOString(),
        results,
      };
    },
  };
}
