// stdout belongs to MCP stdio clients, so everything goes to stderr.
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

function enabled(level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export const logger = {
	info: (...args: unknown[]) => enabled("info") && console.error("[INFO]", ...args),
	warn: (...args: unknown[]) => enabled("warn") && console.error("[WARN]", ...args),
	error: (...args: unknown[]) => enabled("error") && console.error("[ERROR]", ...args),
	debug: (...args: unknown[]) => enabled("debug") && console.error("[DEBUG]", ...args),
};
