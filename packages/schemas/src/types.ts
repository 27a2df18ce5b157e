/**
 * GridParley Core Types
 *
 * The canonical data model shared by the engine, its backends and its adapters.
 * Everything that crosses the engine boundary is defined here.
 */

// ─── Grid ───────────────────────────────────────────────────────────

export interface Position {
  x: number;
  y: number;
}

export type Direction = "up" | "down" | "left" | "right";

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

// ─── Actions ────────────────────────────────────────────────────────

export interface MoveAction {
  action: "move";
  direction: Direction;
}

export interface TalkAction {
  action: "talk";
  target: string;
  message: string;
}

export interface WaitAction {
  action: "wait";
}

/** A talk option as offered to an agent: the message is chosen by the agent. */
export interface TalkOption {
  action: "talk";
  target: string;
  targetTitle: string;
}

/** One entry of the per-turn legality set. */
export type LegalAction = MoveAction | TalkOption | WaitAction;

/** What an agent actually does on its turn. */
export type AgentAction = MoveAction | TalkAction | WaitAction;

/** What a human submits: the talk message may be left for a default greeting. */
export type PlayerActionInput =
  | MoveAction
  | { action: "talk"; target: string; message?: string }
  | WaitAction;

// ─── Agents ─────────────────────────────────────────────────────────

export type BackendKind = "gemini" | "codex" | "mock" | "human";

export const BACKEND_KINDS: readonly BackendKind[] = ["gemini", "codex", "mock", "human"];

/** Backends that answer on their own; "human" is only ever the player slot. */
export type ModelBackendKind = Exclude<BackendKind, "human">;

export interface AgentProfile {
  title: string;
  icon: string;
  persona: string;
}

export interface Agent extends AgentProfile {
  name: string;
  position: Position;
  backendKind: BackendKind;
  isPlayer: boolean;
}

// ─── Logs ───────────────────────────────────────────────────────────

export interface ConversationEntry {
  turn: number;
  from: string;
  to: string;
  message: string;
}

export interface DebugEntry {
  turn: number;
  agent: string;
  backend: BackendKind;
  prompt: string;
  rawResponse: string;
  legalActions: LegalAction[];
  parsedAction: AgentAction;
  appliedAction: AgentAction;
  outcome: string;
  notes?: string;
}

// ─── Engine boundary ────────────────────────────────────────────────

export type SimulationStatus = "idle" | "ready" | "awaiting_player";

export interface AgentSnapshot {
  name: string;
  title: string;
  icon: string;
  position: Position;
  isPlayer: boolean;
}

export interface Snapshot {
  turn: number;
  gridSize: number;
  seed: number;
  backend: ModelBackendKind;
  exclusiveOccupancy: boolean;
  status: SimulationStatus;
  playerAgent: string | null;
  agents: AgentSnapshot[];
  messages: ConversationEntry[];
}

export interface PendingPlayer {
  agent: string;
  title: string;
  legalActions: LegalAction[];
}

export interface StepResult {
  turn: number;
  snapshot: Snapshot;
  turnMessages: ConversationEntry[];
  debug: DebugEntry[];
  requiresPlayer: boolean;
  player?: PendingPlayer;
}

// ─── Configuration ──────────────────────────────────────────────────

export interface BackendOptions {
  /** Executable for the CLI backends. Defaults to "gemini" / "codex". */
  cliPath?: string;
  /** Unset picks the backend's default model; null leaves `-m` off so the CLI decides. */
  model?: string | null;
  /** Appended verbatim to the CLI argv. */
  extraFlags?: string[];
  debug?: boolean;
}

export interface SimulationConfig {
  gridSize: number;
  numAgents: number;
  seed?: number;
  backendKind: ModelBackendKind;
  includePlayerAgent: boolean;
  /** Creation index of the player agent. Defaults to the last agent. */
  playerIndex?: number;
  /** When false, several agents may share a cell. Default true. */
  exclusiveOccupancy?: boolean;
  /** Per backend call. Default 60000. */
  timeoutMs?: number;
  /** Conversation entries included in a Snapshot. Default 50. */
  logWindow?: number;
  backendOptions?: BackendOptions;
}

// ─── Backend contract ───────────────────────────────────────────────

export interface ActionRequest {
  agent: Agent;
  turn: number;
  prompt: string;
  legalActions: LegalAction[];
  timeoutMs: number;
}

export type ActionDecision =
  | { kind: "action"; action: AgentAction; rawResponse: string; notes?: string }
  | { kind: "suspend" };

/**
 * Turns a prompt and a legality set into one action for one agent.
 * Implementations must not reject for bad model output; they fall back to wait.
 */
export interface ActionBackend {
  readonly kind: BackendKind;
  requestAction(request: ActionRequest): Promise<ActionDecision>;
}
