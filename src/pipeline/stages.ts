import { randomUUID } from "node:crypto";
import type { AgentCapability, AgentContext, AgentResponse, AgentRole } from "../agents/types.js";
import { StageParseError, StageUnavailableError, errorMessage } from "../errors.js";
import { OrderOutputSchema, QuantOutputSchema, RiskOutputSchema, parseNarrative, parseStageOutput } from "./schema.js";
import type {
  Order,
  OrderInput,
  QuantAnalysis,
  QuantInput,
  RiskAssessment,
  RiskInput,
  StageExecutor,
  StageName,
  Thesis,
  ThesisInput,
} from "./types.js";

/**
 * Typed wrappers over the capability interface. A stage makes exactly one
 * call per `run`; retry policy belongs to the orchestrator.
 */
abstract class CapabilityStage<I, O> implements StageExecutor<I, O> {
  abstract readonly name: StageName;
  protected abstract readonly role: AgentRole;

  constructor(protected readonly agent: AgentCapability) {}

  protected abstract prompt(input: I): string;
  protected abstract context(input: I): AgentContext;
  protected abstract parse(input: I, response: AgentResponse): O;

  async run(input: I): Promise<O> {
    let response: AgentResponse;
    try {
      response = await this.agent.invoke(this.role, this.prompt(input), this.context(input));
    } catch (e: unknown) {
      if (e instanceof StageUnavailableError || e instanceof StageParseError) throw e;
      throw new StageUnavailableError(`${this.name} stage call failed: ${errorMessage(e)}`, { cause: e });
    }
    return this.parse(input, response);
  }
}

export class ThesisStage extends CapabilityStage<ThesisInput, Thesis> {
  readonly name = "thesis";
  protected readonly role = "director";

  protected prompt(input: ThesisInput): string {
    let prompt = `Trading task: ${input.task}\n\nWrite the investment thesis for ${input.stock}.`;
    if (input.prior_rejection_rationale) {
      prompt += `\n\nThe risk desk rejected your previous thesis with this rationale:\n${input.prior_rejection_rationale}\n\nRevise the thesis to address it.`;
    }
    return prompt;
  }

  protected context(input: ThesisInput): AgentContext {
    return input.prior_rejection_rationale
      ? { stock: input.stock, prior_rejection_rationale: input.prior_rejection_rationale }
      : { stock: input.stock };
  }

  protected parse(input: ThesisInput, response: AgentResponse): Thesis {
    return {
      id: randomUUID(),
      stock: input.stock,
      narrative: parseNarrative(response),
      attempt: input.attempt,
      prior_rejection_rationale: input.prior_rejection_rationale,
      generated_at: new Date().toISOString(),
    };
  }
}

export class QuantStage extends CapabilityStage<QuantInput, QuantAnalysis> {
  readonly name = "quant";
  protected readonly role = "quant";

  protected prompt(input: QuantInput): string {
    return `Test this thesis for ${input.stock} against the market data snapshot and return your analysis as a single JSON object.\n\nThesis:\n${input.thesis.narrative}`;
  }

  protected context(input: QuantInput): AgentContext {
    return {
      stock: input.stock,
      quote: input.market.quote,
      indicators: input.market.indicators,
      fundamentals: input.market.fundamentals,
      data_as_of: input.market.fetched_at,
    };
  }

  protected parse(input: QuantInput, response: AgentResponse): QuantAnalysis {
    const out = parseStageOutput(QuantOutputSchema, response);
    return {
      id: randomUUID(),
      stock: input.stock,
      thesis_ref: input.thesis.id,
      score: out.score,
      signal: out.signal,
      findings: out.findings,
      generated_at: new Date().toISOString(),
    };
  }
}

export class RiskStage extends CapabilityStage<RiskInput, RiskAssessment> {
  readonly name = "risk";
  protected readonly role = "risk";

  protected prompt(input: RiskInput): string {
    return `Decide whether the ${input.stock} trade may proceed and return your assessment as a single JSON object.\n\nThesis:\n${input.thesis.narrative}\n\nQuant findings (score ${input.quant.score}, ${input.quant.signal}):\n${input.quant.findings}`;
  }

  protected context(input: RiskInput): AgentContext {
    return {
      stock: input.stock,
      allocation: input.allocation,
      risk_level: input.risk_level,
      quant_score: input.quant.score,
      quant_signal: input.quant.signal,
    };
  }

  protected parse(input: RiskInput, response: AgentResponse): RiskAssessment {
    const out = parseStageOutput(RiskOutputSchema, response);
    return {
      id: randomUUID(),
      stock: input.stock,
      thesis_ref: input.thesis.id,
      quant_ref: input.quant.id,
      verdict: out.verdict,
      rationale: out.rationale,
      position_size_hint: out.verdict === "rejected" ? 0 : out.position_size_hint,
      generated_at: new Date().toISOString(),
    };
  }
}

export class OrderStage extends CapabilityStage<OrderInput, Order> {
  readonly name = "order";
  protected readonly role = "execution";

  protected prompt(input: OrderInput): string {
    return `The risk desk approved the ${input.stock} trade. Produce one order as a single JSON object.\n\nThesis:\n${input.thesis.narrative}\n\nRisk approval:\n${input.risk.rationale}`;
  }

  protected context(input: OrderInput): AgentContext {
    return {
      stock: input.stock,
      allocation: input.allocation,
      position_size_hint: input.risk.position_size_hint,
      quant_score: input.quant.score,
      quant_signal: input.quant.signal,
    };
  }

  protected parse(input: OrderInput, response: AgentResponse): Order {
    const out = parseStageOutput(OrderOutputSchema, response);
    return {
      id: randomUUID(),
      stock: input.stock,
      side: out.side,
      order_type: out.order_type,
      entry: out.entry,
      exit: out.exit,
      stop: out.stop,
      size: out.size,
      generated_at: new Date().toISOString(),
    };
  }
}

export interface PipelineStages {
  thesis: StageExecutor<ThesisInput, Thesis>;
  quant: StageExecutor<QuantInput, QuantAnalysis>;
  risk: StageExecutor<RiskInput, RiskAssessment>;
  order: StageExecutor<OrderInput, Order>;
}

export function createStages(agent: AgentCapability): PipelineStages {
  return {
    thesis: new ThesisStage(agent),
    quant: new QuantStage(agent),
    risk: new RiskStage(agent),
    order: new OrderStage(agent),
  };
}
