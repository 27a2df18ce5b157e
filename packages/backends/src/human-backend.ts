import type { ActionBackend, ActionDecision } from "@gridparley/schemas";

/** The player's slot. It never answers; the orchestrator pauses for input instead. */
export class HumanBackend implements ActionBackend {
  readonly kind = "human" as const;

  async requestAction(): Promise<ActionDecision> {
    return { kind: "suspend" };
  }
}
