import type { BackendOptions, ModelBackendKind, SimulationConfig } from "@gridparley/schemas";
import {
  ConfigurationError,
  PlacementError,
  isSimulationConfig,
  randomSeed,
  validateSimulationConfigData,
} from "@gridparley/schemas";

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_LOG_WINDOW = 50;

export interface ResolvedConfig {
  gridSize: number;
  numAgents: number;
  seed: number;
  backendKind: ModelBackendKind;
  /** Creation index of the player, or null when there is none. */
  playerIndex: number | null;
  exclusiveOccupancy: boolean;
  timeoutMs: number;
  logWindow: number;
  backendOptions: BackendOptions;
}

/** Schema check only; throws ConfigurationError listing every violation. */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  if (!isSimulationConfig(input)) {
    const { errors } = validateSimulationConfigData(input);
    throw new ConfigurationError(`Invalid simulation config: ${errors.join("; ")}`, errors);
  }
  return input;
}

export function resolveConfig(input: unknown): ResolvedConfig {
  const config = parseSimulationConfig(input);
  const { gridSize, numAgents } = config;

  if (numAgents > gridSize * gridSize) throw new PlacementError(numAgents, gridSize);

  let playerIndex: number | null = null;
  if (config.includePlayerAgent) {
    playerIndex = config.playerIndex ?? numAgents - 1;
    if (playerIndex >= numAgents) {
      throw new ConfigurationError(
        `playerIndex ${playerIndex} is out of range for ${numAgents} agents`,
        [`/playerIndex: must be < ${numAgents}`],
      );
    }
  }

  return {
    gridSize,
    numAgents,
    seed: config.seed ?? randomSeed(),
    backendKind: config.backendKind,
    playerIndex,
    exclusiveOccupancy: config.exclusiveOccupancy ?? true,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    logWindow: config.logWindow ?? DEFAULT_LOG_WINDOW,
    backendOptions: { ...config.backendOptions },
  };
}
