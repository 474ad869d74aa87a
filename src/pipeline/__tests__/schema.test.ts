import { describe, it, expect } from "vitest";
import { StageParseError } from "../../errors.js";
import {
  OrderOutputSchema,
  RiskOutputSchema,
  coerceStructured,
  parseNarrative,
  parseStageOutput,
} from "../schema.js";

describe("coerceStructured", () => {
  it("passes structured responses through", () => {
    const obj = { score: 10 };
    expect(coerceStructured(obj)).toBe(obj);
  });

  it("strips a markdown fence", () => {
    expect(coerceStructured('```json\n{"score": 50}\n```')).toEqual({ score: 50 });
  });

  it("takes the object out of surrounding prose", () => {
    expect(coerceStructured('Here is my answer: {"a": 1} hope it helps')).toEqual({ a: 1 });
  });

  it("throws StageParseError when there is no object", () => {
    expect(() => coerceStructured("I cannot help with that")).toThrow(StageParseError);
    expect(() => coerceStructured("I cannot help with that")).toThrow("Response contains no JSON object");
  });

  it("throws StageParseError on malformed JSON and keeps the raw text", () => {
    try {
      coerceStructured("{score: fifty}");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(StageParseError);
      if (e instanceof StageParseError) {
        expect(e.message).toBe("JSON parse failed");
        expect(e.rawResponse).toBe("{score: fifty}");
      }
    }
  });
});

describe("parseStageOutput", () => {
  it("normalizes the risk verdict and defaults the size hint", () => {
    const out = parseStageOutput(RiskOutputSchema, { verdict: " Approved ", rationale: "fine" });
    expect(out).toEqual({ verdict: "approved", rationale: "fine", position_size_hint: 0 });
  });

  it("coerces numeric strings", () => {
    const out = parseStageOutput(OrderOutputSchema, {
      side: "buy",
      order_type: "market",
      entry: "100",
      exit: "110",
      stop: "95",
      size: "3",
    });
    expect(out.entry).toBe(100);
    expect(out.size).toBe(3);
  });

  it("rejects a sell order whose stop sits below entry", () => {
    expect(() =>
      parseStageOutput(OrderOutputSchema, { side: "sell", order_type: "limit", entry: 100, exit: 90, stop: 95, size: 1 }),
    ).toThrow(StageParseError);
  });

  it("rejects an unknown verdict", () => {
    expect(() => parseStageOutput(RiskOutputSchema, { verdict: "maybe", rationale: "unsure" })).toThrow(
      StageParseError,
    );
  });
});

describe("parseNarrative", () => {
  it("trims plain text", () => {
    expect(parseNarrative("  Buy the dip.  ")).toBe("Buy the dip.");
  });

  it("reads a narrative field from structured output", () => {
    expect(parseNarrative({ narrative: "Long on margin expansion." })).toBe("Long on margin expansion.");
    expect(parseNarrative({ thesis: "Short on guidance cut." })).toBe("Short on guidance cut.");
  });

  it("throws on an empty thesis", () => {
    expect(() => parseNarrative("   ")).toThrow("Empty thesis narrative");
    expect(() => parseNarrative({ other: 1 })).toThrow(StageParseError);
  });
});
