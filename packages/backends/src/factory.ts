import type { ActionBackend } from "@gridparley/schemas";
import { BACKEND_KINDS, ConfigurationError } from "@gridparley/schemas";
import type { CommandRunner } from "./run-command.js";
import { GeminiCliBackend } from "./gemini.js";
import { CodexCliBackend, type CodexBackendOptions } from "./codex.js";
import { MockBackend } from "./mock-backend.js";
import { HumanBackend } from "./human-backend.js";

export interface CreateBackendOptions extends CodexBackendOptions {
  /** Mock only. */
  seed?: number;
  runner?: CommandRunner;
}

export function createBackend(kind: string, options: CreateBackendOptions = {}): ActionBackend {
  switch (kind) {
    case "gemini":
      return new GeminiCliBackend(options);
    case "codex":
      return new CodexCliBackend(options);
    case "mock":
      return new MockBackend(options.seed !== undefined ? { seed: options.seed } : {});
    case "human":
      return new HumanBackend();
    default:
      throw new ConfigurationError(
        `Unknown backend "${kind}". Available: ${BACKEND_KINDS.join(", ")}`,
        [`/backendKind: must be one of ${BACKEND_KINDS.join(", ")}`],
      );
  }
}
