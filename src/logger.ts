/**
 * Structured logger that writes to stderr (stdout is reserved for the MCP protocol).
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFn = (message: string, meta?: Record<string, unknown>) => void

export interface Logger {
	info: LogFn
	warn: LogFn
	error: LogFn
	debug: LogFn
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	const normalized = (value ?? "").toLowerCase()
	if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
		return normalized
	}
	return "info"
}

export function createLogger(level: LogLevel = "info", write: (line: string) => void = (line) => console.error(line)): Logger {
	const emit = (entryLevel: LogLevel): LogFn => (message, meta) => {
		if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return
		const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ""
		write(`[${entryLevel.toUpperCase()}] ${message}${suffix}`)
	}

	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

/** Logger that drops everything (tests, dry runs). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
