export * from "./constants.js";
export * from "./errors.js";
export * from "./protocol.js";
export * from "./framing.js";
export * from "./geometry.js";
export * from "./game-config.js";
