// Error taxonomy shared by the fetch middleware and the persistence layer.

/** Connection reset, DNS failure, socket or per-attempt timeout. */
export class TransientNetworkError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = "TransientNetworkError";
	}
}

export class ApiError extends Error {
	constructor(
		public statusCode: number,
		message: string,
	) {
		super(message);
		this.name = "ApiError";
	}
}

/** 5xx from the target. Retried and counted toward the breaker. */
export class ServerError extends ApiError {
	constructor(statusCode: number) {
		super(statusCode, `Server error: ${statusCode}`);
		this.name = "ServerError";
	}
}

/** 4xx other than 429. Returned immediately, never retried. */
export class ClientError extends ApiError {
	constructor(statusCode: number) {
		super(statusCode, `Client error: ${statusCode}`);
		this.name = "ClientError";
	}
}

export class RateLimitError extends ApiError {
	constructor(public retryAfterMs?: number) {
		super(
			429,
			retryAfterMs === undefined
				? "Rate limited"
				: `Rate limited. Retry after ${retryAfterMs}ms`,
		);
		this.name = "RateLimitError";
	}
}

export class CircuitOpenError extends Error {
	constructor(
		public readonly target: string,
		public readonly retryAfterMs: number,
	) {
		super(`Circuit open for ${target}. Retry after ${retryAfterMs}ms`);
		this.name = "CircuitOpenError";
	}
}

export class ConfigurationError extends Error {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join(", ")}` : message);
		this.name = "ConfigurationError";
	}
}

export class PersistenceError extends Error {
	constructor(
		public readonly path: string,
		message: string,
		cause?: unknown,
	) {
		super(`${message} (${path})`, { cause });
		this.name = "PersistenceError";
	}
}

export class InvalidCheckpointError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidCheckpointError";
	}
}

export function isRetriable(err: unknown): boolean {
	return (
		err instanceof TransientNetworkError ||
		err instanceof RateLimitError ||
		err instanceof ServerError
	);
}

/**
 * Parses a Retry-After header given either as delta-seconds or an HTTP date.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
	if (!value) return undefined;
	const seconds = Number(value);
	if (Number.isFinite(seconds)) {
		return Math.max(0, Math.round(seconds * 1000));
	}
	const date = Date.parse(value);
	if (Number.isNaN(date)) return undefined;
	return Math.max(0, date - now);
}

/** Maps an HTTP status to the error it represents; undefined for success. */
export function classifyStatus(
	status: number,
	retryAfter?: string | null,
	now = Date.now(),
): ApiError | undefined {
	if (status === 429) return new RateLimitError(parseRetryAfter(retryAfter, now));
	if (status >= 500) return new ServerError(status);
	if (status >= 400) return new ClientError(status);
	return undefined;
}
