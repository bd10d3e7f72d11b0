import { pathToFileURL } from "node:url";
import { type Config, loadConfig } from "./config";
import { describeError, logger } from "./logger";
import { ConfigurationError } from "./resilience/errors";
import { createApp } from "./server";
import { CrawlSession } from "./session";

export { FetchMiddleware } from "./clients/fetch-middleware";
export type { FetchResponse, RequestOptions, StatsSnapshot } from "./clients/fetch-middleware";
export { UndiciTransport } from "./clients/http-transport";
export type { HttpTransport, TransportRequest, TransportResponse } from "./clients/http-transport";
export { PRESETS, loadConfig } from "./config";
export { CheckpointStore } from "./persistence/checkpoint-store";
export { CollectionStateStore } from "./persistence/collection-state";
export { FailedTaskQueue } from "./persistence/failed-task-queue";
export { CircuitBreaker, CircuitBreakerRegistry } from "./resilience/circuit-breaker";
export * from "./resilience/errors";
export { ProxyManager } from "./resilience/proxy-manager";
export { RateLimiter } from "./resilience/rate-limiter";
export { RetryPolicy } from "./resilience/retry-policy";
export { RetryScheduler, replayMetadata } from "./scheduler/retry-scheduler";
export type { RetryHandler, ScanResult } from "./scheduler/retry-scheduler";
export { createApp } from "./server";
export { CrawlSession } from "./session";
export type { FetchOutcome } from "./session";
export type * from "./types";

export async function main(): Promise<void> {
	let config: Config;
	try {
		config = loadConfig();
	} catch (err) {
		if (err instanceof ConfigurationError) {
			logger.error("Refusing to start", { issues: err.issues });
			process.exit(1);
		}
		throw err;
	}
	logger.setLevel(config.logLevel);

	const session = new CrawlSession(config);
	session.startRetryScheduler();

	const server = createApp(session).listen(config.port, () => {
		logger.info("crawlguard status server listening", { port: config.port, stateDir: config.stateDir });
	});

	let stopping = false;
	const shutdown = (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info("Shutting down", { signal });
		server.close();
		session
			.close()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error("Shutdown failed", { error: describeError(err) });
				process.exit(1);
			});
	};
	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
	main().catch((err: unknown) => {
		logger.error("Fatal error", { error: describeError(err) });
		process.exit(1);
	});
}
