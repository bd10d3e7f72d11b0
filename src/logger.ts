export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

function isThreshold(value: string | undefined): value is LogLevel | "silent" {
	return value !== undefined && value in LEVEL_RANK;
}

let threshold: LogLevel | "silent" = isThreshold(process.env.LOG_LEVEL)
	? process.env.LOG_LEVEL
	: "info";

// Everything goes to stderr so stdout stays free for data output.
function write(level: LogLevel, message: string, fields?: LogFields): void {
	if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
	const prefix = `[${level.toUpperCase()}]`;
	if (fields && Object.keys(fields).length > 0) {
		console.error(prefix, message, fields);
	} else {
		console.error(prefix, message);
	}
}

export const logger = {
	log: write,
	info: (message: string, fields?: LogFields) => write("info", message, fields),
	warn: (message: string, fields?: LogFields) => write("warn", message, fields),
	error: (message: string, fields?: LogFields) => write("error", message, fields),
	debug: (message: string, fields?: LogFields) => write("debug", message, fields),
	setLevel: (level: LogLevel | "silent") => {
		threshold = level;
	},
	get level(): LogLevel | "silent" {
		return threshold;
	},
};

/** Flattens an unknown thrown value into a loggable message. */
export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
