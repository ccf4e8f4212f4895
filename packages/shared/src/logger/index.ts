export { LOG_LEVELS, type LogLevel, getCurrentLevel, isLogLevel, setLogLevel } from "./log-level.js";
export { LoggerImpl, type LoggerOptions, createLogger, createLoggerFactory } from "./logger-impl.js";
