import type {
  ActionBackend,
  ActionDecision,
  ActionRequest,
  Agent,
  AgentAction,
  BackendKind,
  DebugEntry,
  LegalAction,
  PendingPlayer,
  PlayerActionInput,
  SimulationConfig,
  SimulationStatus,
  Snapshot,
  StepResult,
} from "@gridparley/schemas";
import {
  BusyError,
  InvalidStateError,
  ValidationError,
  WAIT,
  createRng,
  defaultGreeting,
  deriveSeed,
  describeAction,
  findOffered,
  isOffered,
  isPlayerActionInput,
  validatePlayerActionData,
  withTimeout,
} from "@gridparley/schemas";
import { SimulationLog, redactPayload, type SimulationLogOptions } from "@gridparley/journal";
import { createBackend, type CreateBackendOptions } from "@gridparley/backends";
import { World } from "./world.js";
import { Inbox } from "./inbox.js";
import { placeAgents } from "./placement.js";
import { PLAYER_PROFILE, personaFor } from "./personas.js";
import { renderPrompt } from "./prompt.js";
import { resolveTurn } from "./turn-resolver.js";
import { resolveConfig, type ResolvedConfig } from "./config.js";

export type BackendFactory = (kind: BackendKind, options: CreateBackendOptions) => ActionBackend;

export interface SimulationOptions {
  /** Builds one backend per agent at reset. Defaults to createBackend. */
  backendFactory?: BackendFactory;
  /** Time allowed past the per-call timeout before a backend is abandoned. Default 5000 */
  backendGraceMs?: number;
  log?: SimulationLogOptions;
}

const DEFAULT_BACKEND_GRACE_MS = 5_000;

const VALID_TRANSITIONS: Record<SimulationStatus, SimulationStatus[]> = {
  idle: ["ready"],
  ready: ["ready", "awaiting_player"],
  awaiting_player: ["ready"],
};

interface TurnSlot {
  agent: Agent;
  backend: BackendKind;
  prompt: string;
  rawResponse: string;
  legalActions: LegalAction[];
  parsedAction: AgentAction;
  /** What goes to the resolver: parsedAction, or wait if it was not offered. */
  action: AgentAction;
  notes: string[];
}

interface PendingTurn {
  turn: number;
  nextIndex: number;
  slots: TurnSlot[];
  player: (PendingPlayer & { prompt: string }) | null;
}

interface RunState {
  config: ResolvedConfig;
  world: World;
  backends: Map<string, ActionBackend>;
  inbox: Inbox;
  turn: number;
  pending: PendingTurn | null;
  busy: boolean;
}

/**
 * Turn orchestrator for one simulation.
 *
 * Agents are solicited in creation order. Their legal actions all come from the
 * pre-turn world, and nothing moves until every agent has an action, at which
 * point the batch goes to the resolver. A human slot suspends the turn; the
 * pending turn keeps the player's legal set exactly as offered until
 * {@link submitPlayerAction} resumes it with the next agent.
 */
export class Simulation {
  private state: SimulationStatus = "idle";
  private run: RunState | null = null;
  private readonly simLog: SimulationLog;
  private readonly backendFactory: BackendFactory;
  private readonly backendGraceMs: number;
  private readonly redact: boolean;

  constructor(options: SimulationOptions = {}) {
    this.simLog = new SimulationLog(options.log);
    this.backendFactory = options.backendFactory ?? createBackend;
    this.backendGraceMs = options.backendGraceMs ?? DEFAULT_BACKEND_GRACE_MS;
    this.redact = options.log?.redact ?? true;
  }

  get status(): SimulationStatus {
    return this.state;
  }

  get log(): SimulationLog {
    return this.simLog;
  }

  /**
   * Discards the current run and starts a new one at turn 0. Nothing is
   * touched until the config has been validated and every agent placed.
   */
  reset(config: SimulationConfig): Snapshot {
    const resolved = resolveConfig(config);
    const positions = placeAgents(resolved.gridSize, resolved.numAgents, createRng(resolved.seed));

    let personaIndex = 0;
    const agents = positions.map((position, index): Agent => {
      const isPlayer = resolved.playerIndex === index;
      const profile = isPlayer ? { ...PLAYER_PROFILE } : personaFor(personaIndex++);
      return {
        name: `agent${index + 1}`,
        ...profile,
        position,
        backendKind: isPlayer ? "human" : resolved.backendKind,
        isPlayer,
      };
    });

    const backends = new Map<string, ActionBackend>();
    agents.forEach((agent, index) => {
      backends.set(agent.name, this.backendFactory(agent.backendKind, {
        ...resolved.backendOptions,
        seed: deriveSeed(resolved.seed, index),
      }));
    });

    this.run = {
      config: resolved,
      world: new World(resolved.gridSize, agents, { exclusiveOccupancy: resolved.exclusiveOccupancy }),
      backends,
      inbox: new Inbox(),
      turn: 0,
      pending: null,
      busy: false,
    };
    this.simLog.clear();
    // reset is accepted from every state, so it bypasses the transition table
    this.state = "ready";
    return this.snapshot();
  }

  /** Plays the next turn, or as much of it as comes before the player's slot. */
  async step(): Promise<StepResult> {
    const run = this.requireRun();
    if (run.busy) throw new BusyError();
    if (this.state !== "ready") {
      throw new InvalidStateError(`Cannot step while ${this.state}; submit the player's action first`);
    }

    run.busy = true;
    try {
      run.pending = { turn: run.turn + 1, nextIndex: 0, slots: [], player: null };
      return await this.advance(run);
    } finally {
      run.busy = false;
    }
  }

  /**
   * Resumes a suspended turn with the player's choice. The action is checked
   * against the legal set that was offered, not a fresh one; a rejected action
   * leaves the turn pending.
   */
  async submitPlayerAction(input: unknown): Promise<StepResult> {
    const run = this.requireRun();
    if (run.busy) throw new BusyError();
    const pending = run.pending;
    if (this.state !== "awaiting_player" || !pending?.player) {
      throw new InvalidStateError(`Cannot submit a player action while ${this.state}`);
    }

    const player = pending.player;
    const action = toPlayerAction(input, player.legalActions);

    run.busy = true;
    try {
      const agent = run.world.agent(player.agent);
      run.inbox.take(agent.name);
      pending.slots.push({
        agent,
        backend: agent.backendKind,
        prompt: player.prompt,
        rawResponse: JSON.stringify(input),
        legalActions: player.legalActions,
        parsedAction: action,
        action,
        notes: [],
      });
      pending.nextIndex += 1;
      pending.player = null;
      this.transition("ready");
      return await this.advance(run);
    } finally {
      run.busy = false;
    }
  }

  snapshot(): Snapshot {
    return this.snapshotOf(this.requireRun());
  }

  history(): StepResult[] {
    return this.simLog.history();
  }

  pendingPlayer(): PendingPlayer | null {
    const player = this.run?.pending?.player;
    if (this.state !== "awaiting_player" || !player) return null;
    return { agent: player.agent, title: player.title, legalActions: [...player.legalActions] };
  }

  private async advance(run: RunState): Promise<StepResult> {
    const pending = run.pending;
    if (!pending) throw new InvalidStateError("No turn is in progress");
    const agents = run.world.agents();

    for (let index = pending.nextIndex; index < agents.length; index++) {
      const agent = agents[index];
      if (!agent) break;
      const backend = run.backends.get(agent.name);
      if (!backend) throw new Error(`No backend for ${agent.name}`);

      const legalActions = run.world.legalActions(agent.name);
      const prompt = renderPrompt(run.world, agent, pending.turn, legalActions, run.inbox.peek(agent.name));
      const decision = await this.requestDecision(backend, {
        agent: { ...agent, position: { ...agent.position } },
        turn: pending.turn,
        prompt,
        legalActions,
        timeoutMs: run.config.timeoutMs,
      });
      this.assertCurrent(run);

      if (decision.kind === "suspend") {
        pending.nextIndex = index;
        pending.player = { agent: agent.name, title: agent.title, legalActions, prompt };
        this.transition("awaiting_player");
        return this.suspendedResult(run, pending);
      }

      run.inbox.take(agent.name);
      const notes = decision.notes ? [decision.notes] : [];
      let action = decision.action;
      if (!isOffered(action, legalActions)) {
        notes.push(`illegal ${describeAction(action)} rejected`);
        action = WAIT;
      }
      pending.slots.push({
        agent,
        backend: backend.kind,
        prompt,
        rawResponse: decision.rawResponse,
        legalActions,
        parsedAction: decision.action,
        action,
        notes,
      });
    }

    return this.finishTurn(run, pending);
  }

  private async requestDecision(backend: ActionBackend, request: ActionRequest): Promise<ActionDecision> {
    try {
      return await withTimeout(
        () => backend.requestAction(request),
        request.timeoutMs + this.backendGraceMs,
        `${backend.kind} backend for ${request.agent.name}`,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[kernel] ${request.agent.name}: backend error: ${message}`);
      return { kind: "action", action: WAIT, rawResponse: "", notes: `backend error: ${message}` };
    }
  }

  private finishTurn(run: RunState, pending: PendingTurn): StepResult {
    const { resolutions, messages } = resolveTurn(
      run.world,
      this.simLog,
      pending.turn,
      pending.slots.map((slot) => ({ agent: slot.agent.name, action: slot.action })),
      run.inbox,
    );

    const debug = pending.slots.map((slot) => {
      const resolution = resolutions.find((r) => r.agent === slot.agent.name);
      if (!resolution) throw new Error(`No resolution for ${slot.agent.name}`);
      const notes = resolution.notes ? [...slot.notes, resolution.notes] : slot.notes;
      return this.simLog.appendDebug(toDebugEntry(pending.turn, slot, resolution.appliedAction, resolution.outcome, notes));
    });

    run.turn = pending.turn;
    run.pending = null;
    this.transition("ready");

    const result: StepResult = {
      turn: run.turn,
      snapshot: this.snapshotOf(run),
      turnMessages: messages,
      debug,
      requiresPlayer: false,
    };
    this.simLog.recordTurn(result);
    return result;
  }

  /** Partial result for a turn paused at the player's slot; nothing has been resolved yet. */
  private suspendedResult(run: RunState, pending: PendingTurn): StepResult {
    const debug = pending.slots.map((slot) => {
      const entry = toDebugEntry(pending.turn, slot, slot.action, "Awaiting resolution.", slot.notes);
      return this.redact ? redactPayload(entry) : entry;
    });
    const player = pending.player;
    return {
      turn: pending.turn,
      snapshot: this.snapshotOf(run),
      turnMessages: [],
      debug,
      requiresPlayer: true,
      ...(player ? { player: { agent: player.agent, title: player.title, legalActions: [...player.legalActions] } } : {}),
    };
  }

  private snapshotOf(run: RunState): Snapshot {
    const player = run.world.agents().find((a) => a.isPlayer);
    return {
      turn: run.turn,
      gridSize: run.config.gridSize,
      seed: run.config.seed,
      backend: run.config.backendKind,
      exclusiveOccupancy: run.config.exclusiveOccupancy,
      status: this.state,
      playerAgent: player ? player.name : null,
      agents: run.world.snapshotAgents(),
      messages: this.simLog.recentConversation(run.config.logWindow).map((entry) => ({ ...entry })),
    };
  }

  private requireRun(): RunState {
    if (!this.run || this.state === "idle") {
      throw new InvalidStateError("No simulation is running; call reset() first");
    }
    return this.run;
  }

  private assertCurrent(run: RunState): void {
    if (this.run !== run) {
      throw new InvalidStateError("The simulation was reset while this turn was in flight");
    }
  }

  private transition(next: SimulationStatus): void {
    const allowed = VALID_TRANSITIONS[this.state];
    if (!allowed.includes(next)) {
      throw new InvalidStateError(`Invalid simulation transition: ${this.state} → ${next}`);
    }
    this.state = next;
  }
}

function toDebugEntry(
  turn: number,
  slot: TurnSlot,
  appliedAction: AgentAction,
  outcome: string,
  notes: string[],
): DebugEntry {
  return {
    turn,
    agent: slot.agent.name,
    backend: slot.backend,
    prompt: slot.prompt,
    rawResponse: slot.rawResponse,
    legalActions: slot.legalActions,
    parsedAction: slot.parsedAction,
    appliedAction,
    outcome,
    ...(notes.length > 0 ? { notes: notes.join("; ") } : {}),
  };
}

function fromInput(input: PlayerActionInput): AgentAction {
  switch (input.action) {
    case "move": return { action: "move", direction: input.direction };
    case "talk": return { action: "talk", target: input.target, message: (input.message ?? "").trim() };
    case "wait": return WAIT;
  }
}

/** Validates a player's submission against the offered set and fills in a blank talk message. */
export function toPlayerAction(input: unknown, legalActions: readonly LegalAction[]): AgentAction {
  if (!isPlayerActionInput(input)) {
    const { errors } = validatePlayerActionData(input);
    throw new ValidationError(`Malformed player action: ${errors.join("; ")}`, errors);
  }

  let action = fromInput(input);

  const offered = findOffered(action, legalActions);
  if (!offered) {
    throw new ValidationError(`${describeAction(action)} is not one of the offered actions`);
  }
  if (action.action === "talk" && action.message === "" && offered.action === "talk") {
    action = { ...action, message: defaultGreeting(offered.targetTitle) };
  }
  return action;
}
