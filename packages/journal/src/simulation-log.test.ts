import { describe, it, expect, vi } from "vitest";
import type { DebugEntry, StepResult } from "@gridparley/schemas";
import { SimulationLog } from "./simulation-log.js";
import type { SimulationLogEvent } from "./simulation-log.js";

function makeDebug(turn: number, agent: string, overrides: Partial<DebugEntry> = {}): DebugEntry {
  return {
    turn,
    agent,
    backend: "mock",
    prompt: "prompt",
    rawResponse: '{"action":"wait"}',
    legalActions: [{ action: "wait" }],
    parsedAction: { action: "wait" },
    appliedAction: { action: "wait" },
    outcome: "Waited.",
    ...overrides,
  };
}

describe("SimulationLog", () => {
  it("appends conversation entries in order and queries by turn", () => {
    const log = new SimulationLog();
    log.appendConversation({ turn: 1, from: "agent1", to: "agent2", message: "hello" });
    log.appendConversation({ turn: 2, from: "agent2", to: "agent1", message: "hi" });
    log.appendConversation({ turn: 2, from: "agent1", to: "agent2", message: "again" });

    expect(log.conversationCount).toBe(3);
    expect(log.conversationForTurn(2).map((e) => e.message)).toEqual(["hi", "again"]);
    expect(log.recentConversation(2).map((e) => e.message)).toEqual(["hi", "again"]);
    expect(log.recentConversation(0)).toEqual([]);
  });

  it("freezes stored entries", () => {
    const log = new SimulationLog();
    const stored = log.appendConversation({ turn: 1, from: "agent1", to: "agent2", message: "hello" });
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(log.appendDebug(makeDebug(1, "agent1")))).toBe(true);
  });

  it("refuses conversation entries that go back in time", () => {
    const log = new SimulationLog();
    log.appendConversation({ turn: 3, from: "agent1", to: "agent2", message: "late" });
    expect(() => log.appendConversation({ turn: 2, from: "agent2", to: "agent1", message: "early" }))
      .toThrow("Conversation entry for turn 2 arrived after turn 3");
    expect(log.conversationCount).toBe(1);
  });

  it("returns copies so callers cannot mutate the trail", () => {
    const log = new SimulationLog();
    log.appendConversation({ turn: 1, from: "agent1", to: "agent2", message: "hello" });
    const copy = log.conversation();
    copy.pop();
    expect(log.conversation()).toHaveLength(1);
  });

  it("filters debug entries by turn", () => {
    const log = new SimulationLog();
    log.appendDebug(makeDebug(1, "agent1"));
    log.appendDebug(makeDebug(1, "agent2"));
    log.appendDebug(makeDebug(2, "agent1"));
    expect(log.debugForTurn(1).map((e) => e.agent)).toEqual(["agent1", "agent2"]);
    expect(log.debug()).toHaveLength(3);
  });

  it("redacts credentials from debug entries by default", () => {
    const log = new SimulationLog();
    const key = "AIza" + "x".repeat(35);
    const stored = log.appendDebug(makeDebug(1, "agent1", { notes: `backend failed: bad key ${key}` }));
    expect(stored.notes).toBe("backend failed: bad key [REDACTED]");
  });

  it("keeps debug entries verbatim when redaction is off", () => {
    const log = new SimulationLog({ redact: false });
    const key = "AIza" + "x".repeat(35);
    const stored = log.appendDebug(makeDebug(1, "agent1", { notes: key }));
    expect(stored.notes).toBe(key);
  });

  it("notifies listeners and survives a throwing listener", () => {
    const log = new SimulationLog();
    const events: SimulationLogEvent["type"][] = [];
    log.on(() => { throw new Error("boom"); });
    const off = log.on((event) => events.push(event.type));

    log.appendConversation({ turn: 1, from: "agent1", to: "agent2", message: "hello" });
    log.appendDebug(makeDebug(1, "agent1"));
    off();
    log.appendDebug(makeDebug(1, "agent2"));

    expect(events).toEqual(["conversation", "debug"]);
  });

  it("records turn results and clears everything on demand", () => {
    const log = new SimulationLog();
    const listener = vi.fn();
    log.on(listener);
    const result = { turn: 1, requiresPlayer: false, turnMessages: [], debug: [] } as unknown as StepResult;
    log.recordTurn(result);
    log.appendConversation({ turn: 1, from: "agent1", to: "agent2", message: "hello" });

    expect(log.history()).toEqual([result]);
    log.clear();
    expect(log.history()).toEqual([]);
    expect(log.conversation()).toEqual([]);
    expect(listener).toHaveBeenLastCalledWith({ type: "cleared" });
  });

  it("keeps recorded results apart from the caller's copy", () => {
    const log = new SimulationLog();
    const result: StepResult = {
      turn: 1,
      snapshot: {
        turn: 1,
        gridSize: 3,
        seed: 42,
        backend: "mock",
        exclusiveOccupancy: true,
        status: "ready",
        playerAgent: null,
        agents: [{ name: "agent1", title: "Alex", icon: "🛡️", position: { x: 0, y: 0 }, isPlayer: false }],
        messages: [],
      },
      turnMessages: [],
      debug: [],
      requiresPlayer: false,
    };
    const stored = log.recordTurn(result);

    result.snapshot.agents.push({ name: "agent9", title: "Ghost", icon: "👻", position: { x: 2, y: 2 }, isPlayer: false });
    result.turn = 99;

    const [recorded] = log.history();
    expect(recorded?.turn).toBe(1);
    expect(recorded?.snapshot.agents.map((a) => a.name)).toEqual(["agent1"]);
    expect(recorded).toBe(stored);
    expect(Object.isFrozen(recorded?.snapshot.agents)).toBe(true);
    expect(() => recorded?.snapshot.agents.push(result.snapshot.agents[0]!)).toThrow(TypeError);
  });
});
