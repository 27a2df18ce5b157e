import { describe, it, expect, vi } from "vitest";
import { Simulation } from "@gridparley/kernel";
import type { SimulationConfig } from "@gridparley/schemas";
import { askPlayer, runSimulation } from "./run-loop.js";
import type { AskLine } from "./run-loop.js";
import { formatError, helpText } from "./turn-formatter.js";

function scriptedAsk(lines: (string | null)[]) {
  const queue = [...lines];
  return vi.fn<AskLine>(async () => (queue.length > 0 ? queue.shift() ?? null : null));
}

const MOCK_CONFIG: SimulationConfig = {
  gridSize: 3,
  numAgents: 2,
  seed: 7,
  backendKind: "mock",
  includePlayerAgent: false,
};

describe("askPlayer", () => {
  const player = { agent: "agent2", title: "Player", legalActions: [{ action: "wait" as const }] };

  it("re-asks until a line parses", async () => {
    const ask = scriptedAsk(["jump", "u"]);
    const printed: string[] = [];
    const input = await askPlayer(player, ask, (t) => printed.push(t));
    expect(input).toEqual({ action: "move", direction: "up" });
    expect(ask).toHaveBeenCalledTimes(2);
    expect(printed).toContain(formatError('Unrecognized input: "jump"'));
  });

  it("prints help on ?", async () => {
    const ask = scriptedAsk(["?", "w"]);
    const printed: string[] = [];
    await askPlayer(player, ask, (t) => printed.push(t));
    expect(printed).toContain(helpText());
  });

  it("returns null when input ends", async () => {
    expect(await askPlayer(player, scriptedAsk([null]), () => {})).toBeNull();
  });
});

describe("runSimulation", () => {
  it("plays the requested number of turns with model agents only", async () => {
    const sim = new Simulation();
    const ask = scriptedAsk([]);
    const summary = await runSimulation(sim, MOCK_CONFIG, { turns: 3, ask, print: () => {} });
    expect(summary.abandoned).toBe(false);
    expect(summary.turnsPlayed).toBe(3);
    expect(summary.results.map((r) => r.turn)).toEqual([1, 2, 3]);
    expect(sim.snapshot().turn).toBe(3);
    expect(ask).not.toHaveBeenCalled();
  });

  it("asks the player and resumes the turn", async () => {
    const sim = new Simulation();
    const ask = scriptedAsk(["w"]);
    const summary = await runSimulation(sim, { ...MOCK_CONFIG, includePlayerAgent: true }, {
      turns: 1,
      ask,
      print: () => {},
    });
    expect(summary.turnsPlayed).toBe(1);
    const playerEntry = summary.results[0]?.debug.find((d) => d.agent === "agent2");
    expect(playerEntry?.backend).toBe("human");
    expect(playerEntry?.appliedAction).toEqual({ action: "wait" });
    expect(sim.status).toBe("ready");
  });

  it("re-asks after the engine rejects an action that was not offered", async () => {
    const sim = new Simulation();
    const ask = scriptedAsk(["t nobody hello", "w"]);
    const printed: string[] = [];
    const summary = await runSimulation(sim, { ...MOCK_CONFIG, includePlayerAgent: true }, {
      turns: 1,
      ask,
      print: (t) => printed.push(t),
    });
    expect(summary.turnsPlayed).toBe(1);
    expect(ask).toHaveBeenCalledTimes(2);
    expect(printed).toContain(formatError("talk to nobody is not one of the offered actions"));
  });

  it("stops when input ends while the player owes a move", async () => {
    const sim = new Simulation();
    const summary = await runSimulation(sim, { ...MOCK_CONFIG, includePlayerAgent: true }, {
      turns: 2,
      ask: scriptedAsk([]),
      print: () => {},
    });
    expect(summary).toEqual({ turnsPlayed: 0, abandoned: true, results: [] });
    expect(sim.status).toBe("awaiting_player");
  });

  it("propagates configuration errors from reset", async () => {
    await expect(
      runSimulation(new Simulation(), { ...MOCK_CONFIG, gridSize: 2, numAgents: 5 }, {
        turns: 1,
        ask: scriptedAsk([]),
        print: () => {},
      }),
    ).rejects.toThrow();
  });
});
