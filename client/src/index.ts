export { GameClient } from "./net.js";
export type { GameClientOptions } from "./net.js";
