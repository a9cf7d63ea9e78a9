export * from "./types/index.js";
export * from "./config/index.js";
export * from "./prompts/index.js";
export * from "./services/index.js";
export * from "./utils/index.js";
