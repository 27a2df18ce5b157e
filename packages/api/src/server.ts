import express from "express";
import type { NextFunction, Request, Response } from "express";
import { v4 as uuid } from "uuid";
import type { Server } from "node:http";
import {
  BusyError,
  ConfigurationError,
  InvalidStateError,
  ValidationError,
} from "@gridparley/schemas";
import { Simulation, parseSimulationConfig, type SimulationOptions } from "@gridparley/kernel";

// ─── Constants ────────────────────────────────────────────────────
const DEFAULT_MAX_SIMULATIONS = 32;
const MAX_BODY_SIZE = "100kb";
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Structured error logging; omits stack traces in production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[api] ${label}: ${msg}`);
  } else {
    console.error(`[api] ${label}:`, err);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ApiServerConfig {
  /** Concurrent simulations before POST /simulations answers 429. Default 32 */
  maxSimulations?: number;
  /** Passed to every Simulation the server creates. */
  simulationOptions?: SimulationOptions;
  corsOrigins?: string | string[];
}

/**
 * HTTP adapter over the engine. Each simulation is an independent
 * {@link Simulation} keyed by a UUID; the routes only translate between JSON
 * and engine calls.
 */
export class ApiServer {
  private app: express.Application;
  private simulations = new Map<string, Simulation>();
  private maxSimulations: number;
  private simulationOptions: SimulationOptions;
  private corsOrigins?: string | string[];
  private httpServer?: Server;

  constructor(config: ApiServerConfig = {}) {
    this.maxSimulations = config.maxSimulations ?? DEFAULT_MAX_SIMULATIONS;
    this.simulationOptions = config.simulationOptions ?? {};
    this.corsOrigins = config.corsOrigins;

    this.app = express();
    this.app.use(express.json({ limit: MAX_BODY_SIZE }));
    // Security headers
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("X-Frame-Options", "DENY");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    if (this.corsOrigins === "*") {
      console.warn("[api] WARNING: CORS wildcard origin '*' allows any website to drive simulations. Use explicit origins in production.");
    }
    if (this.corsOrigins) {
      const origins = this.corsOrigins;
      this.app.use((req, res, next) => {
        const origin = req.headers.origin;
        const allowed = typeof origins === "string"
          ? origins === "*" || origin === origins
          : origin !== undefined && origins.includes(origin);
        if (allowed && origin) {
          res.setHeader("Access-Control-Allow-Origin", origin);
          res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
          res.setHeader("Access-Control-Allow-Headers", "Content-Type");
          res.setHeader("Access-Control-Max-Age", "86400");
        }
        if (req.method === "OPTIONS") { res.status(204).end(); return; }
        next();
      });
    }
    this.setupRoutes();
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (err instanceof SyntaxError) { res.status(400).json({ error: "Invalid JSON body" }); return; }
      if (isRecord(err) && err["type"] === "entity.too.large") { res.status(413).json({ error: "Request body too large" }); return; }
      next(err);
    });
  }

  get simulationCount(): number {
    return this.simulations.size;
  }

  getExpressApp(): express.Application { return this.app; }

  listen(port: number): Server {
    const server = this.app.listen(port, () => {
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;
      console.log(`[api] GridParley API listening on http://localhost:${actualPort}`);
    });
    this.httpServer = server;
    return server;
  }

  async shutdown(): Promise<void> {
    this.simulations.clear();
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      this.httpServer = undefined;
    }
  }

  /** Maps engine errors to status codes; anything unexpected is a logged 500. */
  private sendError(res: Response, label: string, err: unknown): void {
    if (err instanceof ValidationError || err instanceof ConfigurationError) {
      res.status(400).json({ error: err.message, code: err.code, errors: err.errors });
      return;
    }
    if (err instanceof InvalidStateError || err instanceof BusyError) {
      res.status(409).json({ error: err.message, code: err.code });
      return;
    }
    logError(label, err);
    res.status(500).json({ error: "Internal server error" });
  }

  /** Resolves :id to a simulation, answering 400/404 itself when it can't. */
  private lookup(req: Request, res: Response): Simulation | undefined {
    const id = req.params["id"] ?? "";
    if (!UUID_RE.test(id)) { res.status(400).json({ error: "Invalid simulation ID format" }); return undefined; }
    const simulation = this.simulations.get(id);
    if (!simulation) { res.status(404).json({ error: "Simulation not found" }); return undefined; }
    return simulation;
  }

  private setupRoutes(): void {
    const router = express.Router();

    router.get("/health", (_req, res) => {
      res.json({ status: "ok", simulations: this.simulations.size });
    });

    router.post("/simulations", (req, res) => {
      if (this.simulations.size >= this.maxSimulations) {
        res.status(429).json({ error: "Simulation limit reached" });
        return;
      }
      try {
        const config = parseSimulationConfig(req.body);
        const simulation = new Simulation(this.simulationOptions);
        const snapshot = simulation.reset(config);
        const id = uuid();
        this.simulations.set(id, simulation);
        res.status(201).json({ simulation_id: id, snapshot });
      } catch (err) { this.sendError(res, "POST /simulations", err); }
    });

    router.get("/simulations/:id", (req, res) => {
      const simulation = this.lookup(req, res);
      if (!simulation) return;
      try {
        res.json({
          snapshot: simulation.snapshot(),
          history: simulation.history(),
          status: simulation.status,
          player: simulation.pendingPlayer(),
        });
      } catch (err) { this.sendError(res, "GET /simulations/:id", err); }
    });

    router.post("/simulations/:id/step", async (req, res) => {
      const simulation = this.lookup(req, res);
      if (!simulation) return;
      try {
        res.json(await simulation.step());
      } catch (err) { this.sendError(res, "POST /simulations/:id/step", err); }
    });

    router.post("/simulations/:id/player-action", async (req, res) => {
      const simulation = this.lookup(req, res);
      if (!simulation) return;
      const body: unknown = req.body;
      try {
        res.json(await simulation.submitPlayerAction(isRecord(body) ? body["action"] : undefined));
      } catch (err) { this.sendError(res, "POST /simulations/:id/player-action", err); }
    });

    router.post("/simulations/:id/reset", (req, res) => {
      const simulation = this.lookup(req, res);
      if (!simulation) return;
      try {
        res.json({ snapshot: simulation.reset(parseSimulationConfig(req.body)) });
      } catch (err) { this.sendError(res, "POST /simulations/:id/reset", err); }
    });

    router.delete("/simulations/:id", (req, res) => {
      const simulation = this.lookup(req, res);
      if (!simulation) return;
      this.simulations.delete(req.params["id"] ?? "");
      res.json({ deleted: true });
    });

    this.app.use("/api", router);
  }
}
