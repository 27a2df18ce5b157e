export { ApiServer } from "./server.js";
export type { ApiServerConfig } from "./server.js";
