import type { AgentAction, LegalAction, Position, Direction, WaitAction } from "./types.js";

export const WAIT: WaitAction = Object.freeze({ action: "wait" as const });

const DELTAS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function translate(position: Position, direction: Direction): Position {
  const delta = DELTAS[direction];
  return { x: position.x + delta.x, y: position.y + delta.y };
}

/**
 * Finds the offered option an action corresponds to. Moves match on direction,
 * talks on target; the talk message is the agent's own and is not compared.
 */
export function findOffered(action: AgentAction, legalActions: readonly LegalAction[]): LegalAction | undefined {
  return legalActions.find((option) => {
    switch (action.action) {
      case "move":
        return option.action === "move" && option.direction === action.direction;
      case "talk":
        return option.action === "talk" && option.target === action.target;
      case "wait":
        return option.action === "wait";
    }
  });
}

export function isOffered(action: AgentAction, legalActions: readonly LegalAction[]): boolean {
  return findOffered(action, legalActions) !== undefined;
}

export function defaultGreeting(title: string): string {
  return `Hey ${title}, let's keep moving!`;
}

export function describeAction(action: AgentAction): string {
  switch (action.action) {
    case "move": return `move ${action.direction}`;
    case "talk": return `talk to ${action.target}`;
    case "wait": return "wait";
  }
}
