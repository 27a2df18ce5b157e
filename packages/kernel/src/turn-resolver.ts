import type { AgentAction, ConversationEntry } from "@gridparley/schemas";
import { WAIT, translate } from "@gridparley/schemas";
import type { SimulationLog } from "@gridparley/journal";
import type { World } from "./world.js";
import type { Inbox } from "./inbox.js";

export interface ProposedAction {
  agent: string;
  action: AgentAction;
}

export interface Resolution {
  agent: string;
  appliedAction: AgentAction;
  outcome: string;
  notes?: string;
}

export interface TurnResolution {
  resolutions: Resolution[];
  messages: ConversationEntry[];
}

/**
 * Applies one turn's actions in the order given, which callers keep equal to
 * creation order. Under exclusive occupancy a move onto a cell that an earlier
 * agent took this turn is downgraded to wait: earlier agents win the cell.
 */
export function resolveTurn(
  world: World,
  log: SimulationLog,
  turn: number,
  batch: readonly ProposedAction[],
  inbox?: Inbox,
): TurnResolution {
  const resolutions: Resolution[] = [];
  const messages: ConversationEntry[] = [];

  for (const { agent, action } of batch) {
    switch (action.action) {
      case "move": {
        const destination = translate(world.positionOf(agent), action.direction);
        const where = `(${destination.x}, ${destination.y})`;
        if (!world.inBounds(destination)) {
          resolutions.push({ agent, appliedAction: WAIT, outcome: "Waited.", notes: `move to ${where} is off the grid; waited instead` });
          break;
        }
        if (world.exclusiveOccupancy) {
          const blockers = world.occupantsAt(destination).filter((name) => name !== agent);
          if (blockers.length > 0) {
            resolutions.push({
              agent,
              appliedAction: WAIT,
              outcome: "Waited.",
              notes: `move to ${where} blocked by ${blockers.join(", ")}; waited instead`,
            });
            break;
          }
        }
        world.apply(agent, action);
        resolutions.push({ agent, appliedAction: action, outcome: `Moved to ${where}.` });
        break;
      }
      case "talk": {
        const entry = log.appendConversation({ turn, from: agent, to: action.target, message: action.message });
        inbox?.deliver(entry);
        messages.push(entry);
        resolutions.push({ agent, appliedAction: action, outcome: `Spoke to ${action.target}.` });
        break;
      }
      case "wait":
        resolutions.push({ agent, appliedAction: WAIT, outcome: "Waited." });
        break;
    }
  }

  return { resolutions, messages };
}
