/** Input handed to whatever runs the agent. */
export interface AgentInvocationRequest {
  readonly question: string;
  readonly agentName: string | null;
  readonly signal: AbortSignal;
}

/**
 * External agent runner. Resolves with the full response text; must reject
 * (or honor `signal`) rather than resolve after being aborted.
 */
export interface AgentInvoker {
  invoke(request: AgentInvocationRequest): Promise<string>;
}
