import { CliBackend, isRecord, type CliBackendOptions, type ExtractResult } from "./cli-backend.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

/**
 * Drives the Gemini CLI in headless mode (`-p <prompt> -o json`). The CLI
 * wraps the reply in a JSON envelope that also carries per-model API stats.
 */
export class GeminiCliBackend extends CliBackend {
  readonly kind = "gemini" as const;
  private readonly cliPath: string;
  private readonly model: string | null;
  private readonly extraFlags: string[];

  constructor(options: CliBackendOptions = {}) {
    super(options);
    this.cliPath = options.cliPath ?? "gemini";
    this.model = options.model === undefined ? DEFAULT_GEMINI_MODEL : options.model;
    this.extraFlags = [...(options.extraFlags ?? [])];
  }

  buildArgv(prompt: string): string[] {
    const argv = [this.cliPath];
    if (this.model !== null) argv.push("-m", this.model);
    argv.push("-p", prompt, "-o", "json", ...this.extraFlags);
    return argv;
  }

  extractText(stdout: string): ExtractResult {
    const payload = parseEnvelope(stdout);
    if (payloadHasError(payload)) {
      return { ok: false, error: "Gemini CLI reported an API error" };
    }
    return { ok: true, text: textFromPayload(payload, stdout) };
  }
}

function parseEnvelope(stdout: string): Record<string, unknown> {
  const trimmed = stdout.trim();
  if (!trimmed) return {};
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : {};
  } catch {
    // Plain-text output; the caller falls back to raw stdout
    return {};
  }
}

export function payloadHasError(payload: Record<string, unknown>): boolean {
  if ("error" in payload) return true;
  const stats = payload["stats"];
  if (!isRecord(stats)) return false;
  const models = stats["models"];
  if (!isRecord(models)) return false;
  return Object.values(models).some((meta) => {
    if (!isRecord(meta)) return false;
    const api = meta["api"];
    if (!isRecord(api)) return false;
    const totalErrors = api["totalErrors"];
    return typeof totalErrors === "number" && totalErrors > 0;
  });
}

function walkText(node: unknown, chunks: string[]): void {
  if (typeof node === "string") {
    chunks.push(node);
  } else if (Array.isArray(node)) {
    for (const item of node) walkText(item, chunks);
  } else if (isRecord(node)) {
    const text = node["text"];
    if (typeof text === "string") chunks.push(text);
    if ("parts" in node) walkText(node["parts"], chunks);
    if ("content" in node) walkText(node["content"], chunks);
  }
}

export function textFromPayload(payload: Record<string, unknown>, fallback: string): string {
  const candidates = payload["candidates"];
  if (Array.isArray(candidates) && candidates.length > 0) {
    const chunks: string[] = [];
    walkText(candidates[0], chunks);
    if (chunks.length > 0) return chunks.join("").trim();
  }
  for (const key of ["output", "text", "response"]) {
    const value = payload[key];
    if (typeof value === "string") return value.trim();
  }
  return fallback.trim();
}
