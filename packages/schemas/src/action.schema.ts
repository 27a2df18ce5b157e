export const MoveActionSchema = {
  type: "object",
  required: ["action", "direction"],
  properties: {
    action: { const: "move" },
    direction: { type: "string", enum: ["up", "down", "left", "right"] },
  },
} as const;

export const TalkActionSchema = {
  type: "object",
  required: ["action", "target", "message"],
  properties: {
    action: { const: "talk" },
    target: { type: "string", minLength: 1 },
    message: { type: "string", minLength: 1, maxLength: 2000 },
  },
} as const;

export const WaitActionSchema = {
  type: "object",
  required: ["action"],
  properties: {
    action: { const: "wait" },
  },
} as const;

// Extra keys are tolerated: models like to echo target_title or add reasoning.
export const AgentActionSchema = {
  type: "object",
  required: ["action"],
  properties: {
    action: { type: "string", enum: ["move", "talk", "wait"] },
  },
  oneOf: [MoveActionSchema, TalkActionSchema, WaitActionSchema],
} as const;

/** Player submissions may omit the talk message; a default greeting is filled in. */
export const PlayerActionSchema = {
  type: "object",
  required: ["action"],
  properties: {
    action: { type: "string", enum: ["move", "talk", "wait"] },
    direction: { type: "string", enum: ["up", "down", "left", "right"] },
    target: { type: "string", minLength: 1 },
    message: { type: "string", maxLength: 2000 },
  },
  allOf: [
    {
      if: { properties: { action: { const: "move" } } },
      then: { required: ["direction"] },
    },
    {
      if: { properties: { action: { const: "talk" } } },
      then: { required: ["target"] },
    },
  ],
  additionalProperties: false,
} as const;
