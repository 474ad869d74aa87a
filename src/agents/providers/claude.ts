import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config.js";
import { guardedInvoke, requireCredential } from "../capability.js";
import { SYSTEM_PROMPTS } from "../prompts.js";
import type { AgentCapability } from "../types.js";

export interface ClaudeOptions {
  apiKey?: string;
  model?: string;
}

export function createClaudeCapability(opts: ClaudeOptions = {}): AgentCapability {
  const apiKey = opts.apiKey ?? config.agents.anthropicApiKey;
  const model = opts.model ?? config.agents.claudeModel;
  let client: Anthropic | null = null;

  function getClient(): Anthropic {
    if (!client) {
      client = new Anthropic({ apiKey });
    }
    return client;
  }

  return {
    id: "claude",
    checkAvailability: () => requireCredential("claude", "ANTHROPIC_API_KEY", apiKey),
    invoke: (role, prompt, context) =>
      guardedInvoke("claude", role, prompt, context, async (userPrompt) => {
        const response = await getClient().messages.create({
          model,
          max_tokens: config.agents.maxTokens,
          temperature: config.agents.temperature,
          system: [
            {
              type: "text",
              text: SYSTEM_PROMPTS[role],
              cache_control: { type: "ephemeral" },
            },
          ],
          messages: [{ role: "user", content: userPrompt }],
        });
        const first = response.content[0];
        return first?.type === "text" ? first.text : "";
      }),
  };
}
