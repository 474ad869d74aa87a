import { GoogleGenAI } from "@google/genai";
import { config } from "../../config.js";
import { guardedInvoke, requireCredential } from "../capability.js";
import { SYSTEM_PROMPTS } from "../prompts.js";
import type { AgentCapability } from "../types.js";

export interface GeminiOptions {
  apiKey?: string;
  model?: string;
}

export function createGeminiCapability(opts: GeminiOptions = {}): AgentCapability {
  const apiKey = opts.apiKey ?? config.agents.googleAiApiKey;
  const model = opts.model ?? config.agents.geminiModel;
  let genAI: GoogleGenAI | null = null;

  function getGenAI(): GoogleGenAI {
    if (!genAI) {
      genAI = new GoogleGenAI({ apiKey });
    }
    return genAI;
  }

  return {
    id: "gemini",
    checkAvailability: () => requireCredential("gemini", "GOOGLE_AI_API_KEY", apiKey),
    invoke: (role, prompt, context) =>
      guardedInvoke("gemini", role, prompt, context, async (userPrompt) => {
        const response = await getGenAI().models.generateContent({
          model,
          contents: userPrompt,
          config: {
            systemInstruction: SYSTEM_PROMPTS[role],
            temperature: config.agents.temperature,
            maxOutputTokens: config.agents.maxTokens,
            ...(role === "director" ? {} : { responseMimeType: "application/json" }),
          },
        });
        return response.text ?? "";
      }),
  };
}
