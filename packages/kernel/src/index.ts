export { Simulation } from "./simulation.js";
export type { SimulationOptions, BackendFactory } from "./simulation.js";
export { toPlayerAction } from "./simulation.js";
export { World } from "./world.js";
export type { WorldOptions } from "./world.js";
export { resolveTurn } from "./turn-resolver.js";
export type { ProposedAction, Resolution, TurnResolution } from "./turn-resolver.js";
export { placeAgents } from "./placement.js";
export { Inbox } from "./inbox.js";
export { PERSONA_POOL, PLAYER_PROFILE, personaFor } from "./personas.js";
export { renderPrompt, buildSystemPrompt, buildObservation } from "./prompt.js";
export type { Observation } from "./prompt.js";
export { parseSimulationConfig, resolveConfig, DEFAULT_TIMEOUT_MS, DEFAULT_LOG_WINDOW } from "./config.js";
export type { ResolvedConfig } from "./config.js";
