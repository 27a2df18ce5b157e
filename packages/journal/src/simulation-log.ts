import type { ConversationEntry, DebugEntry, StepResult } from "@gridparley/schemas";
import { redactPayload } from "./redact.js";

export interface SimulationLogOptions {
  /** Scrub credentials out of debug entries before they are stored. Default: true */
  redact?: boolean;
}

export type SimulationLogEvent =
  | { type: "conversation"; entry: ConversationEntry }
  | { type: "debug"; entry: DebugEntry }
  | { type: "turn"; result: StepResult }
  | { type: "cleared" };

export type SimulationLogListener = (event: SimulationLogEvent) => void;

/**
 * Append-only conversation and debug trail for one run.
 *
 * Entries are frozen on the way in and are returned in append order, which is
 * also chronological. Nothing is removed except by {@link clear}, which only a
 * reset uses.
 */
export class SimulationLog {
  private conversationEntries: ConversationEntry[] = [];
  private debugEntries: DebugEntry[] = [];
  private turnResults: StepResult[] = [];
  private listeners: SimulationLogListener[] = [];
  private redact: boolean;

  constructor(options?: SimulationLogOptions) {
    this.redact = options?.redact ?? true;
  }

  on(listener: SimulationLogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  appendConversation(entry: ConversationEntry): ConversationEntry {
    const last = this.conversationEntries[this.conversationEntries.length - 1];
    if (last && entry.turn < last.turn) {
      throw new Error(`Conversation entry for turn ${entry.turn} arrived after turn ${last.turn}`);
    }
    const frozen = Object.freeze({ ...entry });
    this.conversationEntries.push(frozen);
    this.notify({ type: "conversation", entry: frozen });
    return frozen;
  }

  appendDebug(entry: DebugEntry): DebugEntry {
    const stored = this.redact ? redactPayload(entry) : { ...entry };
    const frozen = Object.freeze({ ...stored, legalActions: [...stored.legalActions] });
    this.debugEntries.push(frozen);
    this.notify({ type: "debug", entry: frozen });
    return frozen;
  }

  /** Stores a frozen copy; the caller keeps its own result to do with as it likes. */
  recordTurn(result: StepResult): StepResult {
    const stored = deepFreeze(structuredClone(result));
    this.turnResults.push(stored);
    this.notify({ type: "turn", result: stored });
    return stored;
  }

  conversation(): ConversationEntry[] {
    return [...this.conversationEntries];
  }

  conversationForTurn(turn: number): ConversationEntry[] {
    return this.conversationEntries.filter((e) => e.turn === turn);
  }

  recentConversation(limit: number): ConversationEntry[] {
    if (limit <= 0) return [];
    return this.conversationEntries.slice(-limit);
  }

  debug(): DebugEntry[] {
    return [...this.debugEntries];
  }

  debugForTurn(turn: number): DebugEntry[] {
    return this.debugEntries.filter((e) => e.turn === turn);
  }

  history(): StepResult[] {
    return [...this.turnResults];
  }

  get conversationCount(): number {
    return this.conversationEntries.length;
  }

  clear(): void {
    this.conversationEntries = [];
    this.debugEntries = [];
    this.turnResults = [];
    this.notify({ type: "cleared" });
  }

  private notify(event: SimulationLogEvent): void {
    for (const listener of this.listeners) {
      try { listener(event); } catch { /* listeners must not break the log */ }
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
