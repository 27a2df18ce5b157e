import { describe, it, expect } from "vitest";
import type { Agent, Position } from "@gridparley/schemas";
import { SimulationLog } from "@gridparley/journal";
import { World } from "./world.js";
import { Inbox } from "./inbox.js";
import { resolveTurn } from "./turn-resolver.js";

function makeAgent(name: string, title: string, position: Position): Agent {
  return { name, title, icon: "*", persona: `You are ${title}.`, position, backendKind: "mock", isPlayer: false };
}

function makeWorld(exclusiveOccupancy: boolean): World {
  return new World(3, [
    makeAgent("agent1", "Alex", { x: 0, y: 0 }),
    makeAgent("agent2", "Blair", { x: 2, y: 0 }),
  ], { exclusiveOccupancy });
}

describe("resolveTurn", () => {
  it("gives a contested cell to the earlier agent under exclusive occupancy", () => {
    const world = makeWorld(true);
    const { resolutions } = resolveTurn(world, new SimulationLog(), 1, [
      { agent: "agent1", action: { action: "move", direction: "right" } },
      { agent: "agent2", action: { action: "move", direction: "left" } },
    ]);

    expect(resolutions).toEqual([
      { agent: "agent1", appliedAction: { action: "move", direction: "right" }, outcome: "Moved to (1, 0)." },
      {
        agent: "agent2",
        appliedAction: { action: "wait" },
        outcome: "Waited.",
        notes: "move to (1, 0) blocked by agent1; waited instead",
      },
    ]);
    expect(world.positionOf("agent1")).toEqual({ x: 1, y: 0 });
    expect(world.positionOf("agent2")).toEqual({ x: 2, y: 0 });
  });

  it("lets agents share a cell when occupancy is not exclusive", () => {
    const world = makeWorld(false);
    const { resolutions } = resolveTurn(world, new SimulationLog(), 1, [
      { agent: "agent1", action: { action: "move", direction: "right" } },
      { agent: "agent2", action: { action: "move", direction: "left" } },
    ]);
    expect(resolutions.map((r) => r.outcome)).toEqual(["Moved to (1, 0).", "Moved to (1, 0)."]);
    expect(world.occupantsAt({ x: 1, y: 0 })).toEqual(["agent1", "agent2"]);
  });

  it("downgrades a move off the grid", () => {
    const world = makeWorld(true);
    const { resolutions } = resolveTurn(world, new SimulationLog(), 1, [
      { agent: "agent1", action: { action: "move", direction: "up" } },
    ]);
    expect(resolutions[0]).toEqual({
      agent: "agent1",
      appliedAction: { action: "wait" },
      outcome: "Waited.",
      notes: "move to (0, -1) is off the grid; waited instead",
    });
    expect(world.positionOf("agent1")).toEqual({ x: 0, y: 0 });
  });

  it("logs talk and delivers it to the target's inbox", () => {
    const log = new SimulationLog();
    const inbox = new Inbox();
    const { resolutions, messages } = resolveTurn(makeWorld(true), log, 4, [
      { agent: "agent1", action: { action: "talk", target: "agent2", message: "Meet me at the well" } },
      { agent: "agent2", action: { action: "wait" } },
    ], inbox);

    const entry = { turn: 4, from: "agent1", to: "agent2", message: "Meet me at the well" };
    expect(messages).toEqual([entry]);
    expect(log.conversation()).toEqual([entry]);
    expect(inbox.take("agent2")).toEqual([entry]);
    expect(resolutions.map((r) => r.outcome)).toEqual(["Spoke to agent2.", "Waited."]);
  });

  it("applies in batch order", () => {
    const world = makeWorld(true);
    // agent2 moves first and takes (1, 0) before agent1 gets there
    const { resolutions } = resolveTurn(world, new SimulationLog(), 1, [
      { agent: "agent2", action: { action: "move", direction: "left" } },
      { agent: "agent1", action: { action: "move", direction: "right" } },
    ]);
    expect(resolutions[1]?.notes).toBe("move to (1, 0) blocked by agent2; waited instead");
  });
});
