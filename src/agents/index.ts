import { config, type AgentProviderId } from "../config.js";
import { logAgents } from "../logging.js";
import { createClaudeCapability } from "./providers/claude.js";
import { createGeminiCapability } from "./providers/gemini.js";
import { createOpenAICapability } from "./providers/openai.js";
import type { AgentCapability } from "./types.js";

export type { AgentCapability, AgentContext, AgentResponse, AgentRole } from "./types.js";

/** Build the capability provider selected by AGENT_PROVIDER. */
export function createAgentCapability(provider: AgentProviderId = config.agents.provider): AgentCapability {
  logAgents.info({ provider }, "Agent capability selected");
  switch (provider) {
    case "openai":
      return createOpenAICapability();
    case "gemini":
      return createGeminiCapability();
    case "claude":
      return createClaudeCapability();
  }
}
