import type { Agent, AgentAction, AgentSnapshot, LegalAction, Position } from "@gridparley/schemas";
import { DIRECTIONS, translate } from "@gridparley/schemas";

export interface WorldOptions {
  /** When true no two agents may end a move on the same cell. Default: true */
  exclusiveOccupancy?: boolean;
}

function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Grid geometry and agent positions for one run. The agent set is fixed at
 * construction; only {@link apply} moves anyone, and it trusts its caller.
 */
export class World {
  readonly gridSize: number;
  readonly exclusiveOccupancy: boolean;
  private readonly agentList: Agent[];
  private readonly byName = new Map<string, Agent>();

  constructor(gridSize: number, agents: Agent[], options: WorldOptions = {}) {
    this.gridSize = gridSize;
    this.exclusiveOccupancy = options.exclusiveOccupancy ?? true;
    this.agentList = agents.map((agent) => ({ ...agent, position: { ...agent.position } }));
    for (const agent of this.agentList) {
      if (this.byName.has(agent.name)) throw new Error(`Duplicate agent name: ${agent.name}`);
      this.byName.set(agent.name, agent);
    }
  }

  /** Agents in creation order. */
  agents(): readonly Agent[] {
    return this.agentList;
  }

  agent(name: string): Agent {
    const agent = this.byName.get(name);
    if (!agent) throw new Error(`Unknown agent: ${name}`);
    return agent;
  }

  positionOf(name: string): Position {
    const { x, y } = this.agent(name).position;
    return { x, y };
  }

  inBounds(position: Position): boolean {
    return position.x >= 0 && position.y >= 0 && position.x < this.gridSize && position.y < this.gridSize;
  }

  occupantsAt(position: Position): string[] {
    return this.agentList.filter((a) => samePosition(a.position, position)).map((a) => a.name);
  }

  isOccupied(position: Position, except?: string): boolean {
    return this.agentList.some((a) => a.name !== except && samePosition(a.position, position));
  }

  /**
   * Everything the agent may do right now: wait, the moves that stay on the
   * grid (and off occupied cells when exclusive), and a talk to each other agent.
   */
  legalActions(name: string): LegalAction[] {
    const self = this.agent(name);
    const actions: LegalAction[] = [{ action: "wait" }];

    for (const direction of DIRECTIONS) {
      const destination = translate(self.position, direction);
      if (!this.inBounds(destination)) continue;
      if (this.exclusiveOccupancy && this.isOccupied(destination, name)) continue;
      actions.push({ action: "move", direction });
    }

    for (const other of this.agentList) {
      if (other.name === name) continue;
      actions.push({ action: "talk", target: other.name, targetTitle: other.title });
    }
    return actions;
  }

  apply(name: string, action: AgentAction): void {
    if (action.action !== "move") return;
    const agent = this.agent(name);
    agent.position = translate(agent.position, action.direction);
  }

  snapshotAgents(): AgentSnapshot[] {
    return this.agentList.map((a) => ({
      name: a.name,
      title: a.title,
      icon: a.icon,
      position: { x: a.position.x, y: a.position.y },
      isPlayer: a.isPlayer,
    }));
  }
}
