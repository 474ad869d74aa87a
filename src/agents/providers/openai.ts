import OpenAI from "openai";
import { config } from "../../config.js";
import { guardedInvoke, requireCredential } from "../capability.js";
import { SYSTEM_PROMPTS } from "../prompts.js";
import type { AgentCapability } from "../types.js";

export interface OpenAIOptions {
  apiKey?: string;
  model?: string;
}

/**
 * GPT capability. Structured roles ask for `json_object` output; the director
 * writes prose so it stays on plain text.
 */
export function createOpenAICapability(opts: OpenAIOptions = {}): AgentCapability {
  const apiKey = opts.apiKey ?? config.agents.openaiApiKey;
  const model = opts.model ?? config.agents.openaiModel;
  let client: OpenAI | null = null;

  function getClient(): OpenAI {
    if (!client) {
      client = new OpenAI({ apiKey });
    }
    return client;
  }

  return {
    id: "openai",
    checkAvailability: () => requireCredential("openai", "OPENAI_API_KEY", apiKey),
    invoke: (role, prompt, context) =>
      guardedInvoke("openai", role, prompt, context, async (userPrompt) => {
        const response = await getClient().chat.completions.create({
          model,
          temperature: config.agents.temperature,
          max_tokens: config.agents.maxTokens,
          ...(role === "director" ? {} : { response_format: { type: "json_object" as const } }),
          messages: [
            { role: "system", content: SYSTEM_PROMPTS[role] },
            { role: "user", content: userPrompt },
          ],
        });
        return response.choices[0]?.message?.content ?? "";
      }),
  };
}
