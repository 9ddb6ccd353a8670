export * from "./errors/index.js";
export * from "./schemas/index.js";
export * from "./config/index.js";
export { createLogger, createSilentLogger, type Logger } from "./logger/index.js";
export * from "./credentials/index.js";
export * from "./signing/index.js";
export * from "./http/index.js";
export * from "./storage/index.js";
