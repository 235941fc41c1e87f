/** Question text split into an optional target agent and the question itself. */
export interface AgentCommand {
  readonly agentName: string | null;
  readonly question: string;
}

/**
 * Splits `agent_name Question` from a bare `Question`.
 *
 * The first token names an agent only if it is one of `knownAgentNames`
 * (case-insensitive); otherwise the whole text is the question. Returns null
 * when no question text remains.
 */
export function parseAgentCommand(
  question: string,
  knownAgentNames: Iterable<string> = [],
): AgentCommand | null {
  const trimmed = question.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const match = /^(\S+)\s+([\s\S]+)$/.exec(trimmed);
  if (match) {
    const agentName = findAgent(match[1], knownAgentNames);
    if (agentName !== null) {
      const rest = match[2].trim();
      return rest.length > 0 ? { agentName, question: rest } : null;
    }
  }

  if (findAgent(trimmed, knownAgentNames) !== null) {
    return null;
  }

  return { agentName: null, question: trimmed };
}

function findAgent(token: string, knownAgentNames: Iterable<string>): string | null {
  const needle = token.toLowerCase();
  for (const name of knownAgentNames) {
    if (name.toLowerCase() === needle) {
      return name;
    }
  }
  return null;
}
