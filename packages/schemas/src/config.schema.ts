export const MIN_GRID_SIZE = 2;
export const MAX_GRID_SIZE = 8;
export const MIN_AGENTS = 2;
export const MAX_AGENTS = 6;

export const BackendOptionsSchema = {
  type: "object",
  properties: {
    cliPath: { type: "string", minLength: 1 },
    model: { type: ["string", "null"], minLength: 1 },
    extraFlags: { type: "array", items: { type: "string" } },
    debug: { type: "boolean" },
  },
  additionalProperties: false,
} as const;

export const SimulationConfigSchema = {
  type: "object",
  required: ["gridSize", "numAgents", "backendKind", "includePlayerAgent"],
  properties: {
    gridSize: { type: "integer", minimum: MIN_GRID_SIZE, maximum: MAX_GRID_SIZE },
    numAgents: { type: "integer", minimum: MIN_AGENTS, maximum: MAX_AGENTS },
    seed: { type: "integer", minimum: 0, maximum: 4294967295 },
    backendKind: { type: "string", enum: ["gemini", "codex", "mock"] },
    includePlayerAgent: { type: "boolean" },
    playerIndex: { type: "integer", minimum: 0, maximum: MAX_AGENTS - 1 },
    exclusiveOccupancy: { type: "boolean" },
    timeoutMs: { type: "integer", minimum: 100, maximum: 600000 },
    logWindow: { type: "integer", minimum: 1, maximum: 10000 },
    backendOptions: BackendOptionsSchema,
  },
  additionalProperties: false,
} as const;
