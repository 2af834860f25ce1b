export * from "./types.js";
export * from "./effects.js";
export * from "./schemas.js";
