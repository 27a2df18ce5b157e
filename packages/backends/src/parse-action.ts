import type { AgentAction, LegalAction } from "@gridparley/schemas";
import { WAIT, isAgentAction, validateAgentActionData, isOffered, describeAction } from "@gridparley/schemas";

// Guard against a runaway model flooding the parser
const MAX_REPLY_SIZE = 200_000;

export interface ParsedReply {
  action: AgentAction;
  /** Present when the reply could not be used as-is and wait was substituted. */
  notes?: string;
}

function fallback(notes: string): ParsedReply {
  return { action: WAIT, notes };
}

/**
 * Pulls the JSON object out of a model reply: drops code fences and any prose
 * around the outermost braces.
 */
export function extractJsonBlock(raw: string): string | null {
  const unfenced = raw.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return unfenced.slice(start, end + 1);
}

/** Copies only the fields of the action kind, dropping whatever else the model added. */
function normalize(action: AgentAction): AgentAction {
  switch (action.action) {
    case "move": return { action: "move", direction: action.direction };
    case "talk": return { action: "talk", target: action.target, message: action.message.trim() };
    case "wait": return { action: "wait" };
  }
}

/**
 * Turns a free-text model reply into one of the offered actions. Never throws:
 * anything unusable becomes wait with a note saying why.
 */
export function parseAgentReply(raw: string, legalActions: readonly LegalAction[]): ParsedReply {
  if (raw.length > MAX_REPLY_SIZE) {
    return fallback(`unparseable reply: ${raw.length} characters exceeds ${MAX_REPLY_SIZE}`);
  }
  const block = extractJsonBlock(raw);
  if (!block) return fallback("unparseable reply: no JSON object found");

  let data: unknown;
  try {
    data = JSON.parse(block);
  } catch {
    return fallback(`unparseable reply: invalid JSON ${block.slice(0, 80)}`);
  }

  if (!isAgentAction(data)) {
    const { errors } = validateAgentActionData(data);
    return fallback(`invalid action shape: ${errors.join("; ")}`);
  }

  const action = normalize(data);
  if (action.action === "talk" && action.message.length === 0) {
    return fallback("invalid action shape: talk message is blank");
  }
  if (!isOffered(action, legalActions)) {
    return fallback(`illegal ${describeAction(action)} rejected`);
  }
  return { action };
}
