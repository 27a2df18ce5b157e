export { SimulationLog } from "./simulation-log.js";
export type { SimulationLogOptions, SimulationLogEvent, SimulationLogListener } from "./simulation-log.js";
export { redactPayload, redactText } from "./redact.js";
