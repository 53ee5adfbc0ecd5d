import type { Logger } from "./config.js"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch ((value ?? "").toLowerCase()) {
		case "debug":
			return "debug"
		case "warn":
		case "warning":
			return "warn"
		case "error":
			return "error"
		case "silent":
		case "off":
			return "silent"
		default:
			return "info"
	}
}

/**
 * Logger that writes to stderr (stdout is reserved for MCP protocol)
 */
export function createStderrLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const write = (tag: string, order: number, message: string, meta?: Record<string, unknown>) => {
		if (order < threshold) return
		if (meta && Object.keys(meta).length > 0) {
			console.error(`[${tag}]`, message, JSON.stringify(meta))
		} else {
			console.error(`[${tag}]`, message)
		}
	}
	return {
		debug: (message, meta) => write("DEBUG", LEVEL_ORDER.debug, message, meta),
		info: (message, meta) => write("INFO", LEVEL_ORDER.info, message, meta),
		warn: (message, meta) => write("WARN", LEVEL_ORDER.warn, message, meta),
		error: (message, meta) => write("ERROR", LEVEL_ORDER.error, message, meta),
	}
}

/** Logger that drops everything (tests, library use). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
