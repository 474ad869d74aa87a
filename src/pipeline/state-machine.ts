// ── Per-stock pipeline state machine ─────────────────────────────────────
//
//   init → thesis → quant → risk ─┬→ order → done
//             ↑                   ├→ retry_thesis ─┐
//             └───────────────────┼────────────────┘
//                                 └→ failed (rejected_exhausted)
//
//   Any stage failure → failed (failed)
//
// `transition` is pure: the orchestrator performs the stage call for the
// current state and feeds the outcome back in as an event.

import type { Order, QuantAnalysis, RiskAssessment, StageName, Thesis } from "./types.js";

/** Accumulated records carried through every state. */
export interface PipelineTrace {
  readonly theses: readonly Thesis[];
  readonly quant: QuantAnalysis | null;
  readonly risk: RiskAssessment | null;
  /** Re-thesis rounds taken so far */
  readonly retryCount: number;
}

export type PipelineState =
  | { readonly kind: "init"; readonly trace: PipelineTrace }
  | { readonly kind: "thesis"; readonly trace: PipelineTrace; readonly priorRejection: string | null }
  | { readonly kind: "quant"; readonly trace: PipelineTrace; readonly thesis: Thesis }
  | { readonly kind: "risk"; readonly trace: PipelineTrace; readonly thesis: Thesis; readonly quant: QuantAnalysis }
  | {
      readonly kind: "order";
      readonly trace: PipelineTrace;
      readonly thesis: Thesis;
      readonly quant: QuantAnalysis;
      readonly risk: RiskAssessment;
    }
  | { readonly kind: "retry_thesis"; readonly trace: PipelineTrace; readonly rationale: string }
  | { readonly kind: "done"; readonly trace: PipelineTrace; readonly order: Order }
  | {
      readonly kind: "failed";
      readonly trace: PipelineTrace;
      readonly status: "rejected_exhausted" | "failed";
      readonly failedStage: StageName | null;
      readonly error: string | null;
    };

export type PipelineStateKind = PipelineState["kind"];

export type PipelineEvent =
  | { readonly type: "start" }
  | { readonly type: "thesis_ready"; readonly thesis: Thesis }
  | { readonly type: "quant_ready"; readonly quant: QuantAnalysis }
  | { readonly type: "risk_ready"; readonly risk: RiskAssessment }
  | { readonly type: "order_ready"; readonly order: Order }
  | { readonly type: "retry" }
  | { readonly type: "stage_failed"; readonly stage: StageName; readonly error: string };

export type TerminalState = Extract<PipelineState, { kind: "done" | "failed" }>;

export const INITIAL_STATE: PipelineState = {
  kind: "init",
  trace: { theses: [], quant: null, risk: null, retryCount: 0 },
};

export function isTerminal(state: PipelineState): state is TerminalState {
  return state.kind === "done" || state.kind === "failed";
}

export class InvalidTransitionError extends Error {
  constructor(state: PipelineStateKind, event: PipelineEvent["type"]) {
    super(`Invalid pipeline transition: ${event} in state ${state}`);
    this.name = "InvalidTransitionError";
  }
}

function fail(trace: PipelineTrace, stage: StageName, error: string): PipelineState {
  // An approved assessment never survives without its order
  const risk = trace.risk?.verdict === "approved" ? null : trace.risk;
  return { kind: "failed", trace: { ...trace, risk }, status: "failed", failedStage: stage, error };
}

export function transition(state: PipelineState, event: PipelineEvent, maxRetries: number): PipelineState {
  if (event.type === "stage_failed" && !isTerminal(state)) {
    return fail(state.trace, event.stage, event.error);
  }

  switch (state.kind) {
    case "init":
      if (event.type === "start") return { kind: "thesis", trace: state.trace, priorRejection: null };
      break;

    case "thesis":
      if (event.type === "thesis_ready") {
        return {
          kind: "quant",
          // A new round starts clean; quant and risk must reference this thesis
          trace: { ...state.trace, theses: [...state.trace.theses, event.thesis], quant: null, risk: null },
          thesis: event.thesis,
        };
      }
      break;

    case "quant":
      if (event.type === "quant_ready") {
        return {
          kind: "risk",
          trace: { ...state.trace, quant: event.quant },
          thesis: state.thesis,
          quant: event.quant,
        };
      }
      break;

    case "risk":
      if (event.type === "risk_ready") {
        const trace = { ...state.trace, risk: event.risk };
        if (event.risk.verdict === "approved") {
          return { kind: "order", trace, thesis: state.thesis, quant: state.quant, risk: event.risk };
        }
        if (state.trace.retryCount < maxRetries) {
          return {
            kind: "retry_thesis",
            trace: { ...trace, retryCount: state.trace.retryCount + 1 },
            rationale: event.risk.rationale,
          };
        }
        return { kind: "failed", trace, status: "rejected_exhausted", failedStage: null, error: null };
      }
      break;

    case "retry_thesis":
      if (event.type === "retry") return { kind: "thesis", trace: state.trace, priorRejection: state.rationale };
      break;

    case "order":
      if (event.type === "order_ready") return { kind: "done", trace: state.trace, order: event.order };
      break;

    case "done":
    case "failed":
      break;
  }

  throw new InvalidTransitionError(state.kind, event.type);
}
