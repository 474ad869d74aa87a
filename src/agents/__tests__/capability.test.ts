import { describe, it, expect } from "vitest";
import { CollaboratorUnavailableError, StageUnavailableError } from "../../errors.js";
import { guardedInvoke, requireCredential } from "../capability.js";
import { buildUserPrompt, hashPrompt } from "../prompts.js";

describe("guardedInvoke", () => {
  it("returns the provider text and hands it the built prompt", async () => {
    let seen = "";
    const out = await guardedInvoke("claude", "quant", "Score it", { stock: "AAPL" }, async (userPrompt) => {
      seen = userPrompt;
      return '{"score": 1}';
    });
    expect(out).toBe('{"score": 1}');
    expect(seen).toBe('Score it\n\nContext:\n{\n  "stock": "AAPL"\n}');
  });

  it("maps a provider error to StageUnavailableError", async () => {
    const call = guardedInvoke("openai", "risk", "Decide", {}, async () => {
      throw new Error("429 Too Many Requests");
    });
    await expect(call).rejects.toBeInstanceOf(StageUnavailableError);
    await expect(
      guardedInvoke("openai", "risk", "Decide", {}, async () => {
        throw new Error("429 Too Many Requests");
      }),
    ).rejects.toThrow("openai risk call failed: 429 Too Many Requests");
  });

  it("maps a timeout to StageUnavailableError", async () => {
    const never = () => new Promise<string>(() => {});
    await expect(guardedInvoke("gemini", "director", "Write", {}, never, 5)).rejects.toThrow(
      "gemini director call failed: gemini:director timed out after 5ms",
    );
  });
});

describe("requireCredential", () => {
  it("resolves with a credential and rejects without one", async () => {
    await expect(requireCredential("claude", "ANTHROPIC_API_KEY", "test-secret")).resolves.toBeUndefined();
    await expect(requireCredential("claude", "ANTHROPIC_API_KEY", "")).rejects.toBeInstanceOf(
      CollaboratorUnavailableError,
    );
  });
});

describe("prompts", () => {
  it("omits the context block when the context is empty", () => {
    expect(buildUserPrompt("Write the thesis.", {})).toBe("Write the thesis.");
  });

  it("hashes deterministically per role", () => {
    const a = hashPrompt("quant", "same input");
    expect(a).toMatch(/^[0-9a-f]{16}$/);
    expect(hashPrompt("quant", "same input")).toBe(a);
    expect(hashPrompt("risk", "same input")).not.toBe(a);
  });
});
