import type {
  ActionBackend,
  ActionDecision,
  ActionRequest,
  BackendOptions,
  ModelBackendKind,
} from "@gridparley/schemas";
import { WAIT } from "@gridparley/schemas";
import { runCommand, type CommandResult, type CommandRunner } from "./run-command.js";
import { parseAgentReply } from "./parse-action.js";

const PREVIEW_CHARS = 200;
const OUTPUT_PREVIEW_CHARS = 500;

export interface CliBackendOptions extends BackendOptions {
  /** Replaces the real subprocess runner. */
  runner?: CommandRunner;
  killGraceMs?: number;
}

export type ExtractResult = { ok: true; text: string } | { ok: false; error: string };

/**
 * Shared plumbing for backends that shell out to a model CLI: build argv, run
 * it under the turn's timeout, pull the reply text out of the envelope and
 * parse it against the offered actions. Every failure resolves to wait.
 */
export abstract class CliBackend implements ActionBackend {
  abstract readonly kind: ModelBackendKind;
  protected readonly debug: boolean;
  private readonly runner: CommandRunner;
  private readonly killGraceMs: number | undefined;

  constructor(options: CliBackendOptions = {}) {
    this.debug = options.debug ?? false;
    this.runner = options.runner ?? runCommand;
    this.killGraceMs = options.killGraceMs;
  }

  /** The complete argv, executable first. */
  abstract buildArgv(prompt: string): string[];

  /** Reads the model's reply text out of the CLI's stdout. */
  abstract extractText(stdout: string, stderr: string): ExtractResult;

  async requestAction(request: ActionRequest): Promise<ActionDecision> {
    const argv = this.buildArgv(request.prompt);
    if (this.debug) this.logRequest(argv, request.prompt);

    const result = await this.runner(argv, {
      timeoutMs: request.timeoutMs,
      ...(this.killGraceMs !== undefined ? { killGraceMs: this.killGraceMs } : {}),
    });
    if (this.debug) this.logResult(result);

    const failure = this.describeFailure(result, request.timeoutMs);
    if (failure) {
      return { kind: "action", action: WAIT, rawResponse: result.stdout, notes: failure };
    }

    const extracted = this.extractText(result.stdout, result.stderr);
    if (!extracted.ok) {
      return {
        kind: "action",
        action: WAIT,
        rawResponse: result.stdout,
        notes: `backend reported an error: ${extracted.error}`,
      };
    }

    const parsed = parseAgentReply(extracted.text, request.legalActions);
    return {
      kind: "action",
      action: parsed.action,
      rawResponse: extracted.text,
      ...(parsed.notes ? { notes: parsed.notes } : {}),
    };
  }

  private describeFailure(result: CommandResult, timeoutMs: number): string | undefined {
    if (result.error) return `backend failed: ${result.error}`;
    if (result.timedOut) return `backend timed out after ${timeoutMs}ms`;
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim();
      const reason = result.signal ? `killed by ${result.signal}` : `exit ${result.exitCode}`;
      return `backend failed: ${reason}${detail ? `: ${detail.slice(0, PREVIEW_CHARS)}` : ""}`;
    }
    return undefined;
  }

  private logRequest(argv: string[], prompt: string): void {
    const shown = argv.map((arg) => (arg === prompt ? "<prompt>" : arg));
    const preview = prompt.slice(0, PREVIEW_CHARS).replace(/\n/g, "\\n");
    console.log(`[backend] ${this.kind} command: ${shown.join(" ")}`);
    console.log(`[backend] prompt preview: ${preview}${prompt.length > PREVIEW_CHARS ? "..." : ""}`);
  }

  private logResult(result: CommandResult): void {
    console.log(`[backend] ${this.kind} exit=${result.exitCode} signal=${result.signal ?? "none"} timedOut=${result.timedOut}`);
    console.log(`[backend] stdout: ${result.stdout.trim().slice(0, OUTPUT_PREVIEW_CHARS)}`);
    if (result.stderr.trim()) {
      console.log(`[backend] stderr: ${result.stderr.trim().slice(0, OUTPUT_PREVIEW_CHARS)}`);
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
