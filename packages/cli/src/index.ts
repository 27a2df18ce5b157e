#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import * as readline from "node:readline";
import { Simulation } from "@gridparley/kernel";
import { ApiServer } from "@gridparley/api";
import { SimulationError } from "@gridparley/schemas";
import type { SimulationConfig } from "@gridparley/schemas";
import {
  defaultBackend,
  defaultPort,
  defaultTimeoutMs,
  parseBackendKind,
  parseNonNegativeInt,
  parsePort,
  parsePositiveInt,
  resolveBackendOptions,
} from "./config.js";
import { runSimulation } from "./run-loop.js";
import type { AskLine } from "./run-loop.js";
import { formatError } from "./turn-formatter.js";

// Global error handlers: an unhandled rejection or exception ends the process loudly
process.on("unhandledRejection", (reason) => {
  console.error("[gridparley] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[gridparley] Uncaught exception:", err);
  process.exit(1);
});

function createAsk(rl: readline.Interface): AskLine {
  let closed = false;
  rl.on("close", () => { closed = true; });
  return (prompt) => new Promise<string | null>((resolve, reject) => {
    if (closed) { resolve(null); return; }
    const onClose = (): void => resolve(null);
    const onError = (err: Error): void => { rl.off("close", onClose); reject(err); };
    rl.once("close", onClose);
    rl.once("error", onError);
    rl.question(prompt, (answer) => {
      rl.off("close", onClose);
      rl.off("error", onError);
      resolve(answer);
    });
  });
}

const program = new Command();
program.name("gridparley").description("GridParley: agents taking turns on a shared grid").version("0.1.0");

program.command("run").description("Run a simulation in the terminal")
  .option("--grid <n>", "Grid size", "5")
  .option("--agents <n>", "Number of agents, the player included", "3")
  .option("--turns <n>", "Turns to play", "5")
  .option("--seed <n>", "Seed for placement and the mock backend")
  .option("--backend <kind>", "Backend: gemini, codex, mock (defaults to GRIDPARLEY_BACKEND or mock)")
  .option("--player", "Include a human-controlled player agent")
  .option("--player-index <i>", "Creation index of the player (defaults to the last agent)")
  .option("--allow-colocation", "Let several agents share a cell")
  .option("--timeout <ms>", "Per-call backend timeout (defaults to GRIDPARLEY_TIMEOUT_MS or 60000)")
  .option("--cli-path <path>", "Executable for the gemini or codex backend")
  .option("--model <name>", "Model passed to the backend CLI")
  .option("--extra-flags <flags>", "Extra flags appended to the backend CLI, quoted like a shell")
  .option("--debug", "Log backend commands and show raw replies")
  .action(async (opts: {
    grid: string; agents: string; turns: string; seed?: string; backend?: string;
    player?: boolean; playerIndex?: string; allowColocation?: boolean; timeout?: string;
    cliPath?: string; model?: string; extraFlags?: string; debug?: boolean;
  }) => {
    const backendKind = opts.backend ? parseBackendKind(opts.backend) : defaultBackend();
    const timeoutMs = opts.timeout ? parsePositiveInt(opts.timeout, "timeout") : defaultTimeoutMs();
    const config: SimulationConfig = {
      gridSize: parsePositiveInt(opts.grid, "grid"),
      numAgents: parsePositiveInt(opts.agents, "agents"),
      backendKind,
      includePlayerAgent: opts.player === true,
      exclusiveOccupancy: opts.allowColocation !== true,
      backendOptions: resolveBackendOptions(backendKind, {
        cliPath: opts.cliPath,
        model: opts.model,
        extraFlags: opts.extraFlags,
        debug: opts.debug,
      }),
    };
    if (opts.seed !== undefined) config.seed = parseNonNegativeInt(opts.seed, "seed");
    if (opts.playerIndex !== undefined) config.playerIndex = parseNonNegativeInt(opts.playerIndex, "player-index");
    if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;
    const turns = parsePositiveInt(opts.turns, "turns");

    const rl = config.includePlayerAgent
      ? readline.createInterface({ input: process.stdin, output: process.stdout })
      : undefined;
    const ask: AskLine = rl ? createAsk(rl) : async () => null;

    try {
      const summary = await runSimulation(new Simulation(), config, {
        turns,
        ask,
        print: (text) => console.log(text),
        verbose: opts.debug === true,
      });
      if (summary.abandoned) {
        console.log(`Input ended; stopped after ${summary.turnsPlayed} turn(s).`);
      }
    } catch (err) {
      if (!(err instanceof SimulationError)) throw err;
      console.error(formatError(err));
      process.exitCode = 1;
    } finally {
      rl?.close();
    }
  });

program.command("serve").description("Start the HTTP API server")
  .option("-p, --port <port>", "Port number (defaults to GRIDPARLEY_PORT or 3100)")
  .action((opts: { port?: string }) => {
    const port = opts.port ? parsePort(opts.port) : defaultPort();
    const corsOrigins = process.env.GRIDPARLEY_CORS_ORIGINS;
    const maxSimulations = process.env.GRIDPARLEY_MAX_SIMULATIONS;
    const apiServer = new ApiServer({
      corsOrigins: corsOrigins ? corsOrigins.split(",").map((s) => s.trim()) : undefined,
      maxSimulations: maxSimulations ? parsePositiveInt(maxSimulations, "GRIDPARLEY_MAX_SIMULATIONS", 32) : undefined,
    });
    apiServer.listen(port);

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      console.log("\nShutting down...");
      await apiServer.shutdown();
      process.exit(0);
    };
    process.on("SIGTERM", () => { void shutdown(); });
    process.on("SIGINT", () => { void shutdown(); });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(formatError(err));
  process.exit(1);
});
