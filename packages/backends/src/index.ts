export { runCommand } from "./run-command.js";
export type { CommandRunner, CommandResult, RunCommandOptions } from "./run-command.js";
export { parseAgentReply, extractJsonBlock } from "./parse-action.js";
export type { ParsedReply } from "./parse-action.js";
export { CliBackend } from "./cli-backend.js";
export type { CliBackendOptions, ExtractResult } from "./cli-backend.js";
export { GeminiCliBackend, DEFAULT_GEMINI_MODEL } from "./gemini.js";
export { CodexCliBackend } from "./codex.js";
export type { CodexBackendOptions } from "./codex.js";
export { MockBackend } from "./mock-backend.js";
export type { MockBackendOptions } from "./mock-backend.js";
export { HumanBackend } from "./human-backend.js";
export { createBackend } from "./factory.js";
export type { CreateBackendOptions } from "./factory.js";
