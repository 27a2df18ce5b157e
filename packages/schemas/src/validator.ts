import Ajv, { type ErrorObject } from "ajv";
import { AgentActionSchema, PlayerActionSchema } from "./action.schema.js";
import { SimulationConfigSchema } from "./config.schema.js";
import type { AgentAction, PlayerActionInput, SimulationConfig } from "./types.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });

const validateAgentAction = ajv.compile<AgentAction>(AgentActionSchema);
const validatePlayerAction = ajv.compile<PlayerActionInput>(PlayerActionSchema);
const validateSimulationConfig = ajv.compile<SimulationConfig>(SimulationConfigSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

/** Shape check for an action produced by a model backend. */
export function validateAgentActionData(data: unknown): ValidationResult {
  const valid = validateAgentAction(data);
  return toResult(valid, validateAgentAction.errors);
}

export function validatePlayerActionData(data: unknown): ValidationResult {
  const valid = validatePlayerAction(data);
  return toResult(valid, validatePlayerAction.errors);
}

export function validateSimulationConfigData(data: unknown): ValidationResult {
  const valid = validateSimulationConfig(data);
  return toResult(valid, validateSimulationConfig.errors);
}

export function isAgentAction(data: unknown): data is AgentAction {
  return validateAgentAction(data);
}

export function isPlayerActionInput(data: unknown): data is PlayerActionInput {
  return validatePlayerAction(data);
}

export function isSimulationConfig(data: unknown): data is SimulationConfig {
  return validateSimulationConfig(data);
}
