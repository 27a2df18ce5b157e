import { spawn } from "node:child_process";

const DEFAULT_KILL_GRACE_MS = 2000;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
  maxOutputBytes?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started at all (ENOENT, EACCES). */
  error?: string;
}

/**
 * Collects raw chunks up to a byte limit and decodes them once, so a UTF-8
 * sequence split across two pipe reads survives intact.
 */
class CappedOutput {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    const room = this.maxBytes - this.bytes;
    if (room <= 0) return;
    const kept = chunk.byteLength > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.bytes += kept.byteLength;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

export type CommandRunner = (argv: readonly string[], options: RunCommandOptions) => Promise<CommandResult>;

/**
 * Runs a command without a shell and resolves once the child has exited and
 * its pipes have closed. Never rejects: spawn failures and timeouts are
 * reported in the result. On timeout the child gets SIGTERM, then SIGKILL
 * after the grace period, so no call leaves a process behind.
 */
export const runCommand: CommandRunner = (argv, options) => {
  const [binary, ...args] = argv;
  if (!binary) {
    return Promise.resolve({ exitCode: null, signal: null, stdout: "", stderr: "", timedOut: false, error: "empty command" });
  }
  const maxBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise<CommandResult>((resolve) => {
    const stdout = new CappedOutput(maxBytes);
    const stderr = new CappedOutput(maxBytes);
    const stdinErrors: string[] = [];
    let timedOut = false;
    let spawnError: string | undefined;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const proc = spawn(binary, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: options.env ?? process.env,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
      killTimer = setTimeout(() => proc.kill("SIGKILL"), killGraceMs);
    }, options.timeoutMs);

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      const stderrText = [stderr.text(), ...stdinErrors].filter((s) => s !== "").join("\n");
      resolve({
        exitCode: spawnError ? null : exitCode,
        signal,
        stdout: stdout.text(),
        stderr: stderrText,
        timedOut,
        ...(spawnError ? { error: spawnError } : {}),
      });
    };

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (err: NodeJS.ErrnoException) => {
      spawnError = err.code === "ENOENT" ? `command not found: ${binary}` : err.message;
      // A child that never started has nothing to wait for.
      if (proc.pid === undefined) settle(null, null);
    });

    proc.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      settle(code, signal);
    });

    // The child may exit without reading its input; EPIPE is reported through close.
    proc.stdin.on("error", (err: Error) => {
      stdinErrors.push(err.message);
    });
    if (options.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
  });
};
