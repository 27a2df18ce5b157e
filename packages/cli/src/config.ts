import type { BackendOptions, Direction, ModelBackendKind, PlayerActionInput } from "@gridparley/schemas";
import { ConfigurationError } from "@gridparley/schemas";

export const DEFAULT_PORT = 3100;

const MODEL_BACKENDS: readonly ModelBackendKind[] = ["gemini", "codex", "mock"];

export type Env = Record<string, string | undefined>;

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function parsePositiveInt(value: string, label: string, fallback?: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    if (fallback !== undefined) return fallback;
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return n;
}

export function parseBackendKind(value: string): ModelBackendKind {
  const kind = MODEL_BACKENDS.find((k) => k === value.trim().toLowerCase());
  if (!kind) {
    throw new ConfigurationError(
      `Unknown backend "${value}". Available: ${MODEL_BACKENDS.join(", ")}`,
      [`/backendKind: must be one of ${MODEL_BACKENDS.join(", ")}`],
    );
  }
  return kind;
}

/**
 * Splits a flag string the way a shell would for plain words: whitespace
 * separates, single and double quotes group, a backslash escapes the next
 * character outside single quotes.
 */
export function splitFlags(input: string): string[] {
  const out: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < input.length) {
        current += input.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < input.length) {
      current += input.charAt(++i);
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) out.push(current);
      current = "";
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (quote) throw new Error(`Unterminated ${quote} in flags: ${input}`);
  if (inToken) out.push(current);
  return out;
}

export interface BackendCliOptions {
  cliPath?: string;
  model?: string;
  extraFlags?: string;
  debug?: boolean;
}

/** Command-line options win over the environment; unset values stay unset. */
export function resolveBackendOptions(
  kind: ModelBackendKind,
  opts: BackendCliOptions,
  env: Env = process.env,
): BackendOptions {
  const options: BackendOptions = {};

  const envPath = kind === "gemini" ? env.GRIDPARLEY_GEMINI_PATH
    : kind === "codex" ? env.GRIDPARLEY_CODEX_PATH
    : undefined;
  const envModel = kind === "gemini" ? env.GRIDPARLEY_GEMINI_MODEL
    : kind === "codex" ? env.GRIDPARLEY_CODEX_MODEL
    : undefined;

  const cliPath = opts.cliPath ?? (envPath || undefined);
  if (cliPath) options.cliPath = cliPath;
  const model = opts.model ?? (envModel || undefined);
  if (model) options.model = model;

  const flags = opts.extraFlags ?? env.GRIDPARLEY_EXTRA_FLAGS;
  if (flags !== undefined) {
    const extraFlags = splitFlags(flags);
    if (extraFlags.length > 0) options.extraFlags = extraFlags;
  }
  if (opts.debug) options.debug = true;
  return options;
}

export function defaultBackend(env: Env = process.env): ModelBackendKind {
  return env.GRIDPARLEY_BACKEND ? parseBackendKind(env.GRIDPARLEY_BACKEND) : "mock";
}

export function defaultTimeoutMs(env: Env = process.env): number | undefined {
  const raw = env.GRIDPARLEY_TIMEOUT_MS;
  return raw ? parsePositiveInt(raw, "GRIDPARLEY_TIMEOUT_MS") : undefined;
}

export function defaultPort(env: Env = process.env): number {
  return env.GRIDPARLEY_PORT ? parsePort(env.GRIDPARLEY_PORT, "GRIDPARLEY_PORT") : DEFAULT_PORT;
}

const MOVE_KEYS = new Map<string, Direction>([
  ["u", "up"], ["up", "up"],
  ["d", "down"], ["down", "down"],
  ["l", "left"], ["left", "left"],
  ["r", "right"], ["right", "right"],
]);

/**
 * Reads one line of player input: `u/d/l/r` (or the full direction) moves,
 * `t <target> [message]` talks, `w` or an empty line waits. Anything else is null.
 */
export function parsePlayerInput(line: string): PlayerActionInput | null {
  const trimmed = line.trim();
  if (trimmed === "" || /^w(ait)?$/i.test(trimmed)) return { action: "wait" };

  const direction = MOVE_KEYS.get(trimmed.toLowerCase());
  if (direction) return { action: "move", direction };

  const talk = /^t(?:alk)?\s+(\S+)(?:\s+([\s\S]*))?$/i.exec(trimmed);
  if (talk?.[1]) {
    const message = talk[2]?.trim();
    return message
      ? { action: "talk", target: talk[1], message }
      : { action: "talk", target: talk[1] };
  }
  return null;
}
