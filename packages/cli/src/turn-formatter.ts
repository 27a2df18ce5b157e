// Pure formatting for the run command's terminal output. No side effects.
import type { ConversationEntry, DebugEntry, LegalAction, PendingPlayer, Snapshot, StepResult } from "@gridparley/schemas";

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const MAX_RAW_LEN = 300;

export function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}… (${s.length} chars)` : s;
}

/** Single-character grid label: the agent's number, or its initial. */
export function cellLabel(name: string): string {
  const digits = /(\d+)$/.exec(name)?.[1];
  return digits ?? (name.charAt(0) || "?");
}

/** Rows top to bottom (y grows downward); `+` marks a shared cell. */
export function formatGrid(snapshot: Snapshot): string {
  const size = snapshot.gridSize;
  const cells: string[][] = Array.from({ length: size }, () => Array.from({ length: size }, () => "."));
  for (const agent of snapshot.agents) {
    const row = cells[agent.position.y];
    if (!row) continue;
    const current = row[agent.position.x];
    if (current === undefined) continue;
    row[agent.position.x] = current === "." ? cellLabel(agent.name) : "+";
  }
  return cells.map((row) => row.join(" ")).join("\n");
}

export function formatPositions(snapshot: Snapshot): string {
  return snapshot.agents
    .map((a) => {
      const tag = a.isPlayer ? ` ${cyan("[you]")}` : "";
      return `  ${cellLabel(a.name)} ${a.icon} ${a.title} (${a.name}) at (${a.position.x}, ${a.position.y})${tag}`;
    })
    .join("\n");
}

export function formatMessage(entry: ConversationEntry): string {
  return `  ${bold(entry.from)} → ${entry.to}: ${entry.message}`;
}

export function formatDebugEntry(entry: DebugEntry): string {
  let line = `  ${entry.agent} ${dim(`[${entry.backend}]`)} ${entry.outcome}`;
  if (entry.notes) line += ` ${yellow(`(${entry.notes})`)}`;
  return line;
}

/** Verbose form: adds the raw reply under each debug line. */
export function formatDebugDetail(entry: DebugEntry): string {
  const raw = entry.rawResponse.trim() === "" ? "(empty)" : truncate(entry.rawResponse.trim(), MAX_RAW_LEN);
  return `${formatDebugEntry(entry)}\n    ${dim(`raw: ${raw}`)}`;
}

export interface FormatStepOptions {
  verbose?: boolean;
}

export function formatStep(result: StepResult, opts: FormatStepOptions = {}): string {
  const lines: string[] = [];
  if (result.requiresPlayer) {
    lines.push(bold(`Turn ${result.turn}: waiting for your move`));
  } else {
    lines.push(bold(`Turn ${result.turn} resolved`));
  }
  for (const entry of result.debug) {
    lines.push(opts.verbose ? formatDebugDetail(entry) : formatDebugEntry(entry));
  }
  if (result.turnMessages.length > 0) {
    lines.push(dim("Messages:"));
    for (const message of result.turnMessages) lines.push(formatMessage(message));
  }
  lines.push(formatGrid(result.snapshot));
  return lines.join("\n");
}

export function formatSnapshot(snapshot: Snapshot): string {
  return [
    bold(`Seed ${snapshot.seed}, ${snapshot.backend} backend, ${snapshot.gridSize}x${snapshot.gridSize} grid`),
    formatPositions(snapshot),
    formatGrid(snapshot),
  ].join("\n");
}

export function formatLegalAction(action: LegalAction): string {
  switch (action.action) {
    case "move": return action.direction.charAt(0);
    case "talk": return `t ${action.target} <message>  (${action.targetTitle})`;
    case "wait": return "w";
  }
}

export function formatPlayerPrompt(player: PendingPlayer): string {
  const options = player.legalActions.map((a) => `  ${formatLegalAction(a)}`).join("\n");
  return `${green(`${player.title} (${player.agent}), your move.`)} Options:\n${options}`;
}

export function playerPromptLine(): string {
  return "gridparley> ";
}

export function helpText(): string {
  return [
    "Moves: u, d, l, r (or up, down, left, right)",
    "Talk:  t <agent> <message>   (message may be left blank)",
    "Wait:  w or an empty line",
  ].join("\n");
}

export function formatError(err: unknown): string {
  return red(err instanceof Error ? err.message : String(err));
}
