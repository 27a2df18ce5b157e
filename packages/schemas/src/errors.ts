export type SimulationErrorCode =
  | "INVALID_STATE"
  | "BUSY"
  | "VALIDATION"
  | "CONFIGURATION"
  | "PLACEMENT";

/** Base class for every error the engine reports to its caller. */
export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = "SimulationError";
    this.code = code;
  }
}

/** An operation was called in a state that does not accept it. */
export class InvalidStateError extends SimulationError {
  constructor(message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
  }
}

/** A step or player action arrived while another one was still in flight. */
export class BusyError extends SimulationError {
  constructor(message = "A turn is already being resolved for this simulation") {
    super("BUSY", message);
    this.name = "BusyError";
  }
}

export class ValidationError extends SimulationError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super("VALIDATION", message);
    this.name = "ValidationError";
    this.errors = errors;
  }
}

export class ConfigurationError extends SimulationError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [], code: SimulationErrorCode = "CONFIGURATION") {
    super(code, message);
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}

/** More agents were requested than the grid has cells. */
export class PlacementError extends ConfigurationError {
  constructor(numAgents: number, gridSize: number) {
    super(
      `Cannot place ${numAgents} agents on a ${gridSize}x${gridSize} grid (${gridSize * gridSize} cells)`,
      [],
      "PLACEMENT",
    );
    this.name = "PlacementError";
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}
