/**
 * Structured logging for archive sessions.
 *
 * A logger is passed to each {@link Archive} through its options; nothing here
 * keeps process-wide state.
 *
 * @example
 * ```typescript
 * import { Archive, createLogger } from 'ar-kit';
 *
 * const logger = createLogger({ component: 'packager', minLevel: 'debug' });
 * const archive = new Archive({ format: 'bsd', logger });
 * ```
 */

/** Log levels in order of severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Structured log entry handed to a {@link LoggerOptions.handler}.
 */
export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	message: string;
	component?: string;
	error?: {
		name: string;
		message: string;
		stack?: string;
	};
	data?: Record<string, unknown>;
}

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, error?: Error, data?: Record<string, unknown>): void;
	/** Create a logger that adds `context` to every entry. */
	child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
	component?: string;
	/** Minimum level to output. Defaults to `"info"`. */
	minLevel?: LogLevel;
	/** Context included in every entry. */
	context?: Record<string, unknown>;
	/** Receives each entry. Defaults to one JSON line on the console. */
	handler?: (entry: LogEntry) => void;
}

function defaultHandler(entry: LogEntry): void {
	const output = JSON.stringify(entry);

	switch (entry.level) {
		case "debug":
			console.debug(output);
			break;
		case "info":
			console.info(output);
			break;
		case "warn":
			console.warn(output);
			break;
		case "error":
			console.error(output);
			break;
	}
}

/**
 * Create a structured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: 'ar', minLevel: 'debug' });
 * logger.debug('Read member', { filename: 'alpha.o', offset: 68 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const {
		component,
		minLevel = "info",
		context = {},
		handler = defaultHandler,
	} = options;

	function log(
		level: LogLevel,
		message: string,
		error?: Error,
		data?: Record<string, unknown>,
	): void {
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
		};

		if (component) entry.component = component;

		if (error) {
			entry.error = {
				name: error.name,
				message: error.message,
				...(error.stack !== undefined && { stack: error.stack }),
			};
		}

		const mergedData = { ...context, ...data };
		if (Object.keys(mergedData).length > 0) entry.data = mergedData;

		handler(entry);
	}

	return {
		debug: (message, data) => log("debug", message, undefined, data),
		info: (message, data) => log("info", message, undefined, data),
		warn: (message, data) => log("warn", message, undefined, data),
		error: (message, error, data) => log("error", message, error, data),
		child: (childContext) =>
			createLogger({
				component,
				minLevel,
				context: { ...context, ...childContext },
				handler,
			}),
	};
}

/** Logger that discards all messages. */
export const noopLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => noopLogger,
};
