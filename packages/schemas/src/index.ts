export * from "./types.js";
export * from "./errors.js";
export { TimeoutError, withTimeout } from "./timeout.js";
export { AgentActionSchema, MoveActionSchema, TalkActionSchema, WaitActionSchema, PlayerActionSchema } from "./action.schema.js";
export {
  SimulationConfigSchema,
  BackendOptionsSchema,
  MIN_GRID_SIZE,
  MAX_GRID_SIZE,
  MIN_AGENTS,
  MAX_AGENTS,
} from "./config.schema.js";
export {
  validateAgentActionData,
  validatePlayerActionData,
  validateSimulationConfigData,
  isAgentAction,
  isPlayerActionInput,
  isSimulationConfig,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { WAIT, translate, findOffered, isOffered, defaultGreeting, describeAction } from "./actions.js";
export { createRng, nextFloat, nextInt, pick, shuffle, deriveSeed, randomSeed } from "./rng.js";
export type { RngState } from "./rng.js";
