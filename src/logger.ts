/**
 * Logging
 *
 * Services take a `Logger` so the host decides where lines go. The default
 * writes through `console`; the CLI swaps in a @clack/prompts-backed logger.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

function render(message: string, context?: LogContext): string {
	if (!context || Object.keys(context).length === 0) {
		return message;
	}
	return `${message} ${JSON.stringify(context, (_key, value: unknown) =>
		typeof value === "bigint" ? value.toString() : value,
	)}`;
}

/**
 * Console logger filtered by minimum level.
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): Logger {
	const enabled = (level: LogLevel) =>
		LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

	return {
		debug(message, context) {
			if (enabled("debug")) console.debug(render(message, context));
		},
		info(message, context) {
			if (enabled("info")) console.info(render(message, context));
		},
		warn(message, context) {
			if (enabled("warn")) console.warn(render(message, context));
		},
		error(message, context) {
			if (enabled("error")) console.error(render(message, context));
		},
	};
}

/** Logger that drops everything (tests, embedding) */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

export { render as formatLogLine };
