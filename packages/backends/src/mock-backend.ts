import type { ActionBackend, ActionDecision, ActionRequest, AgentAction, LegalAction } from "@gridparley/schemas";
import { WAIT, createRng, pick, defaultGreeting, randomSeed, type RngState } from "@gridparley/schemas";

export interface MockBackendOptions {
  seed?: number;
}

function toAction(option: LegalAction): AgentAction {
  switch (option.action) {
    case "move": return { action: "move", direction: option.direction };
    case "talk": return { action: "talk", target: option.target, message: defaultGreeting(option.targetTitle) };
    case "wait": return WAIT;
  }
}

/**
 * Offline backend: picks one of the offered actions with its own seeded RNG.
 * One instance per agent keeps each agent's draws independent of the others.
 */
export class MockBackend implements ActionBackend {
  readonly kind = "mock" as const;
  private readonly rng: RngState;

  constructor(options: MockBackendOptions = {}) {
    this.rng = createRng(options.seed ?? randomSeed());
  }

  async requestAction(request: ActionRequest): Promise<ActionDecision> {
    const option = pick(this.rng, request.legalActions);
    const action = option ? toAction(option) : WAIT;
    return { kind: "action", action, rawResponse: JSON.stringify(action) };
  }
}
