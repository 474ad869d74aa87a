export type AgentRole = "director" | "quant" | "risk" | "execution";

/** Raw capability output: free text, or an already-structured object. */
export type AgentResponse = string | Record<string, unknown>;

export type AgentContext = Record<string, unknown>;

/**
 * Uniform call into an external reasoning provider.
 *
 * Implementations throw StageUnavailableError when the call itself fails
 * (network, timeout, quota). They never validate the response shape; that
 * belongs to the stage executors.
 */
export interface AgentCapability {
  readonly id: string;
  invoke(role: AgentRole, prompt: string, context: AgentContext): Promise<AgentResponse>;
  /** Rejects with CollaboratorUnavailableError when the provider cannot be called at all. */
  checkAvailability(): Promise<void>;
}
