export * from "./types.gate.js";
export * from "./types.logging.js";
export * from "./types.telegram.js";
