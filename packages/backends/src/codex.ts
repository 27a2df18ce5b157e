import { CliBackend, isRecord, type CliBackendOptions, type ExtractResult } from "./cli-backend.js";

export interface CodexBackendOptions extends CliBackendOptions {
  /** Words placed right after the executable. Default `exec --json`. */
  subcommand?: string[];
  outputFlags?: string[];
  /** When set the prompt is passed as `<promptFlag> <prompt>` instead of positionally. */
  promptFlag?: string;
}

export class CodexCliBackend extends CliBackend {
  readonly kind = "codex" as const;
  private readonly cliPath: string;
  private readonly model: string | null;
  private readonly subcommand: string[];
  private readonly outputFlags: string[];
  private readonly extraFlags: string[];
  private readonly promptFlag: string | undefined;

  constructor(options: CodexBackendOptions = {}) {
    super(options);
    this.cliPath = options.cliPath ?? "codex";
    this.model = options.model ?? null;
    this.subcommand = [...(options.subcommand ?? ["exec", "--json"])];
    this.outputFlags = [...(options.outputFlags ?? [])];
    this.extraFlags = [...(options.extraFlags ?? [])];
    this.promptFlag = options.promptFlag;
  }

  buildArgv(prompt: string): string[] {
    const argv = [this.cliPath, ...this.subcommand];
    if (this.model !== null) argv.push("-m", this.model);
    argv.push(...this.outputFlags, ...this.extraFlags);
    if (this.promptFlag) {
      argv.push(this.promptFlag, prompt);
    } else {
      argv.push(prompt);
    }
    return argv;
  }

  /**
   * `codex exec --json` streams one event per line. The reply is the text of
   * the agent_message items; anything else is progress noise.
   */
  extractText(stdout: string, stderr: string): ExtractResult {
    const text = stdout.trim();
    if (!text) {
      const err = stderr.trim();
      return err ? { ok: false, error: err.slice(0, 200) } : { ok: true, text: "" };
    }

    const messages: string[] = [];
    for (const line of text.split("\n")) {
      if (!line.trim()) continue;
      let event: unknown;
      try {
        event = JSON.parse(line);
      } catch {
        continue;
      }
      if (!isRecord(event)) continue;
      const item = event["item"];
      if (isRecord(item) && item["type"] === "agent_message" && typeof item["text"] === "string") {
        messages.push(item["text"]);
      }
    }
    return { ok: true, text: messages.length > 0 ? messages.join("\n").trim() : text };
  }
}
