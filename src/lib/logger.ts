export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface LogEntry {
	level: LogLevel;
	target: string;
	message: string;
	fields?: LogFields;
	error?: unknown;
	timestamp: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, error?: unknown, fields?: LogFields): void;
	error(message: string, error?: unknown, fields?: LogFields): void;
	child(target: string): Logger;
}

function serializeError(error: unknown): unknown {
	if (error instanceof Error) {
		return { name: error.name, message: error.message };
	}
	return error;
}

export function consoleSink(entry: LogEntry): void {
	const line = JSON.stringify({ ...entry, error: serializeError(entry.error) });
	if (entry.level === "error") {
		console.error(line);
	} else if (entry.level === "warn") {
		console.warn(line);
	} else {
		console.log(line);
	}
}

/**
 * Create a logger that tags every entry with `target`.
 *
 * @example
 * ```ts
 * const log = createLogger("Database");
 * log.info("New Feed", { id: feed.id, len: feed.content.length });
 * ```
 */
export function createLogger(target: string, sink: LogSink = consoleSink): Logger {
	const log = (
		level: LogLevel,
		message: string,
		error?: unknown,
		fields?: LogFields,
	): void => {
		sink({
			level,
			target,
			message,
			fields,
			error,
			timestamp: new Date().toISOString(),
		});
	};

	return {
		debug: (message, fields) => log("debug", message, undefined, fields),
		info: (message, fields) => log("info", message, undefined, fields),
		warn: (message, error, fields) => log("warn", message, error, fields),
		error: (message, error, fields) => log("error", message, error, fields),
		child: (childTarget) => createLogger(childTarget, sink),
	};
}
