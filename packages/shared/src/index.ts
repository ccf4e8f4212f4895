export * from "./errors/index.js";
export * from "./logger/index.js";
export * from "./utils/index.js";
export type { Logger, LoggerFactory } from "./types/index.js";
