import type { Logger } from "pino";
import { StageParseError, errorMessage } from "../errors.js";
import { logPipeline } from "../logging.js";
import type { MarketDataProvider, MarketSnapshot } from "../market/types.js";
import type { PipelineStages } from "./stages.js";
import {
  INITIAL_STATE,
  isTerminal,
  transition,
  type PipelineEvent,
  type PipelineState,
  type TerminalState,
} from "./state-machine.js";
import type { StageExecutor, StockResult } from "./types.js";

/** Extra attempts granted to a stage whose response could not be parsed. */
export const PARSE_RETRIES = 1;

export interface OrchestratorDeps {
  readonly stages: PipelineStages;
  readonly market: MarketDataProvider;
  readonly maxRetries: number;
}

export interface StockRequest {
  readonly stock: string;
  readonly task: string;
  /** Capital available to this stock */
  readonly allocation: number;
  readonly risk_level: number | null;
}

/**
 * Drives one stock through thesis → quant → risk → order. Owns its state
 * until `run` resolves; never throws for stage-level failures, which end up
 * in the returned StockResult instead.
 */
export class PipelineOrchestrator {
  private current: PipelineState = INITIAL_STATE;
  private snapshot: MarketSnapshot | null = null;
  private readonly log: Logger;

  constructor(
    private readonly request: StockRequest,
    private readonly deps: OrchestratorDeps,
  ) {
    this.log = logPipeline.child({ stock: request.stock });
  }

  get state(): PipelineState {
    return this.current;
  }

  async run(): Promise<StockResult> {
    const start = Date.now();
    let state = this.current;
    while (!isTerminal(state)) {
      const event = await this.step(state);
      const next = transition(state, event, this.deps.maxRetries);
      this.log.debug({ from: state.kind, to: next.kind, event: event.type }, "Pipeline transition");
      this.current = next;
      state = next;
    }

    const result = toStockResult(this.request.stock, state, Date.now() - start);
    this.log.info(
      { status: result.status, theses: result.theses.length, failed_stage: result.failed_stage, duration_ms: result.duration_ms },
      `Pipeline finished for ${result.stock}: ${result.status}`,
    );
    return result;
  }

  private async step(state: PipelineState): Promise<PipelineEvent> {
    const { stages } = this.deps;
    const { stock, task, allocation, risk_level } = this.request;

    switch (state.kind) {
      case "init":
        return { type: "start" };

      case "retry_thesis":
        this.log.info({ retry: state.trace.retryCount, rationale: state.rationale }, "Risk rejected thesis, re-running");
        return { type: "retry" };

      case "thesis":
        return this.attempt(stages.thesis, {
          stock,
          task,
          prior_rejection_rationale: state.priorRejection,
          attempt: state.trace.theses.length + 1,
        }, (thesis) => ({ type: "thesis_ready", thesis }));

      case "quant": {
        let market: MarketSnapshot;
        try {
          market = await this.marketSnapshot();
        } catch (e: unknown) {
          return { type: "stage_failed", stage: "quant", error: `market data: ${errorMessage(e)}` };
        }
        return this.attempt(stages.quant, { stock, thesis: state.thesis, market }, (quant) => ({ type: "quant_ready", quant }));
      }

      case "risk":
        return this.attempt(
          stages.risk,
          { stock, thesis: state.thesis, quant: state.quant, allocation, risk_level },
          (risk) => ({ type: "risk_ready", risk }),
        );

      case "order":
        return this.attempt(
          stages.order,
          { stock, thesis: state.thesis, quant: state.quant, risk: state.risk, allocation },
          (order) => ({ type: "order_ready", order }),
        );

      case "done":
      case "failed":
        throw new Error(`Pipeline for ${stock} already finished`);
    }
  }

  /**
   * Run a stage, re-running it with the same input on a parse failure
   * (up to PARSE_RETRIES extra attempts). Any other error ends the stock.
   */
  private async attempt<I, O>(
    stage: StageExecutor<I, O>,
    input: I,
    onSuccess: (output: O) => PipelineEvent,
  ): Promise<PipelineEvent> {
    for (let attempt = 0; ; attempt++) {
      try {
        return onSuccess(await stage.run(input));
      } catch (e: unknown) {
        if (e instanceof StageParseError && attempt < PARSE_RETRIES) {
          this.log.warn({ stage: stage.name, attempt: attempt + 1, error: e.message }, "Unparseable stage response, retrying");
          continue;
        }
        this.log.warn({ stage: stage.name, error: errorMessage(e) }, "Stage failed");
        return { type: "stage_failed", stage: stage.name, error: errorMessage(e) };
      }
    }
  }

  private async marketSnapshot(): Promise<MarketSnapshot> {
    if (!this.snapshot) {
      this.snapshot = await this.deps.market.fetch(this.request.stock);
    }
    return this.snapshot;
  }
}

function toStockResult(stock: string, state: TerminalState, durationMs: number): StockResult {
  const { trace } = state;
  const theses = [...trace.theses];
  const base = {
    stock,
    thesis: theses.length > 0 ? theses[theses.length - 1] : null,
    quant: trace.quant,
    risk: trace.risk,
    theses,
    duration_ms: durationMs,
  };

  if (state.kind === "done") {
    return { ...base, status: "completed", order: state.order, failed_stage: null, error: null };
  }
  return { ...base, status: state.status, order: null, failed_stage: state.failedStage, error: state.error };
}
