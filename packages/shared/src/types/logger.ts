/**
 * Minimal logging contract used by every package.
 */
export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/**
 * Creates a logger whose lines carry the given prefix.
 */
export type LoggerFactory = (prefix: string) => Logger;
