import { config } from "../config.js";
import { CollaboratorUnavailableError, StageUnavailableError, errorMessage } from "../errors.js";
import { logAgents } from "../logging.js";
import { withTimeout } from "../retry.js";
import { buildUserPrompt, hashPrompt } from "./prompts.js";
import type { AgentContext, AgentRole } from "./types.js";

/**
 * Run one provider call with the shared timeout, latency logging and error
 * mapping. `call` receives the fully built user prompt.
 */
export async function guardedInvoke(
  providerId: string,
  role: AgentRole,
  prompt: string,
  context: AgentContext,
  call: (userPrompt: string) => Promise<string>,
  timeoutMs: number = config.agents.timeoutMs,
): Promise<string> {
  const userPrompt = buildUserPrompt(prompt, context);
  const promptHash = hashPrompt(role, userPrompt);
  const start = Date.now();

  try {
    const raw = await withTimeout(call(userPrompt), timeoutMs, `${providerId}:${role}`);
    logAgents.debug(
      { provider: providerId, role, prompt_hash: promptHash, latency_ms: Date.now() - start, chars: raw.length },
      "Capability call completed",
    );
    return raw;
  } catch (e: unknown) {
    logAgents.warn(
      { provider: providerId, role, prompt_hash: promptHash, latency_ms: Date.now() - start, error: errorMessage(e) },
      "Capability call failed",
    );
    throw new StageUnavailableError(`${providerId} ${role} call failed: ${errorMessage(e)}`, { cause: e });
  }
}

export function requireCredential(providerId: string, envName: string, value: string): Promise<void> {
  if (!value) {
    return Promise.reject(new CollaboratorUnavailableError(`${envName} not configured for ${providerId}`));
  }
  return Promise.resolve();
}
