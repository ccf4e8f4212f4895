/**
 * Type definitions for the shared package.
 */
export type { Logger, LoggerFactory } from "./logger.js";
