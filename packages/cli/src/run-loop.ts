import type { PendingPlayer, PlayerActionInput, SimulationConfig, StepResult } from "@gridparley/schemas";
import { ValidationError } from "@gridparley/schemas";
import type { Simulation } from "@gridparley/kernel";
import { parsePlayerInput } from "./config.js";
import { formatError, formatPlayerPrompt, formatSnapshot, formatStep, helpText } from "./turn-formatter.js";

/** Resolves with the entered line, or null once input has ended. */
export type AskLine = (prompt: string) => Promise<string | null>;

export interface RunLoopOptions {
  turns: number;
  ask: AskLine;
  print: (text: string) => void;
  verbose?: boolean;
}

export interface RunSummary {
  turnsPlayed: number;
  /** True when input ended while the player still owed a move. */
  abandoned: boolean;
  results: StepResult[];
}

/**
 * Asks until the line parses. Input the engine rejects is re-asked by the
 * caller, since only the engine knows the offered set.
 */
export async function askPlayer(
  player: PendingPlayer,
  ask: AskLine,
  print: (text: string) => void,
): Promise<PlayerActionInput | null> {
  print(formatPlayerPrompt(player));
  for (;;) {
    const line = await ask("gridparley> ");
    if (line === null) return null;
    if (line.trim() === "?" || line.trim().toLowerCase() === "help") {
      print(helpText());
      continue;
    }
    const input = parsePlayerInput(line);
    if (input) return input;
    print(formatError(`Unrecognized input: "${line.trim()}"`));
    print(helpText());
  }
}

export async function runSimulation(
  sim: Simulation,
  config: SimulationConfig,
  opts: RunLoopOptions,
): Promise<RunSummary> {
  const { ask, print } = opts;
  print(formatSnapshot(sim.reset(config)));

  const results: StepResult[] = [];
  for (let i = 0; i < opts.turns; i++) {
    let result = await sim.step();
    while (result.requiresPlayer && result.player) {
      print(formatStep(result, { verbose: opts.verbose }));
      const input = await askPlayer(result.player, ask, print);
      if (input === null) {
        return { turnsPlayed: results.length, abandoned: true, results };
      }
      try {
        result = await sim.submitPlayerAction(input);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        print(formatError(err));
      }
    }
    print(formatStep(result, { verbose: opts.verbose }));
    results.push(result);
  }
  return { turnsPlayed: results.length, abandoned: false, results };
}
