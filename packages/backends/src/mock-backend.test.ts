import { describe, it, expect } from "vitest";
import type { ActionRequest, LegalAction } from "@gridparley/schemas";
import { isOffered } from "@gridparley/schemas";
import { MockBackend } from "./mock-backend.js";

function makeRequest(legalActions: LegalAction[]): ActionRequest {
  return {
    agent: {
      name: "agent1",
      title: "Alex",
      icon: "A",
      persona: "A careful scout.",
      position: { x: 0, y: 0 },
      backendKind: "mock",
      isPlayer: false,
    },
    turn: 1,
    prompt: "unused",
    legalActions,
    timeoutMs: 1000,
  };
}

const legal: LegalAction[] = [
  { action: "wait" },
  { action: "move", direction: "down" },
  { action: "move", direction: "right" },
  { action: "talk", target: "agent2", targetTitle: "Blair" },
];

describe("MockBackend", () => {
  it("repeats its choices for the same seed", async () => {
    const a = new MockBackend({ seed: 42 });
    const b = new MockBackend({ seed: 42 });
    for (let i = 0; i < 20; i++) {
      expect(await a.requestAction(makeRequest(legal))).toEqual(await b.requestAction(makeRequest(legal)));
    }
  });

  it("only picks offered actions", async () => {
    const backend = new MockBackend({ seed: 7 });
    for (let i = 0; i < 50; i++) {
      const decision = await backend.requestAction(makeRequest(legal));
      if (decision.kind !== "action") throw new Error("mock backend never suspends");
      expect(isOffered(decision.action, legal)).toBe(true);
      expect(decision.notes).toBeUndefined();
    }
  });

  it("greets the talk target by title", async () => {
    const decision = await new MockBackend({ seed: 1 }).requestAction(
      makeRequest([{ action: "talk", target: "agent3", targetTitle: "Kai" }]),
    );
    expect(decision).toEqual({
      kind: "action",
      action: { action: "talk", target: "agent3", message: "Hey Kai, let's keep moving!" },
      rawResponse: "{\"action\":\"talk\",\"target\":\"agent3\",\"message\":\"Hey Kai, let's keep moving!\"}",
    });
  });

  it("waits when nothing is offered", async () => {
    const decision = await new MockBackend({ seed: 1 }).requestAction(makeRequest([]));
    expect(decision).toEqual({ kind: "action", action: { action: "wait" }, rawResponse: "{\"action\":\"wait\"}" });
  });
});
