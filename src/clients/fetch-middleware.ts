import {
	type RetryPolicy as CockatielRetryPolicy,
	TaskCancelledError,
	TimeoutStrategy,
	timeout,
} from "cockatiel";
import {
	type MiddlewareConfig,
	type MiddlewareConfigInput,
	MiddlewareConfigSchema,
	validateConfig,
} from "../config";
import { describeError, logger } from "../logger";
import { CircuitBreakerRegistry, type CircuitStateName } from "../resilience/circuit-breaker";
import {
	CircuitOpenError,
	ConfigurationError,
	TransientNetworkError,
	classifyStatus,
	isRetriable,
} from "../resilience/errors";
import { type ProxyPoolSnapshot, ProxyManager } from "../resilience/proxy-manager";
import { RateLimiter } from "../resilience/rate-limiter";
import { RetryPolicy } from "../resilience/retry-policy";
import { UserAgentRotator } from "../resilience/user-agents";
import type { Clock, JsonRecord } from "../types";
import {
	type HttpTransport,
	type TransportRequest,
	type TransportResponse,
	UndiciTransport,
} from "./http-transport";

export type RequestBody = string | Uint8Array | JsonRecord | unknown[];

export interface RequestOptions {
	/** Objects and arrays are sent as JSON. */
	body?: RequestBody;
	headers?: Record<string, string>;
	/** Deadline for the whole logical request, retries included. */
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface FetchResponse extends TransportResponse {
	/** Network attempts made, including the successful one. */
	attempts: number;
	proxy: string | null;
}

/** Per logical request: whether any attempt reached the transport. */
interface RequestTrace {
	sent: boolean;
}

interface Counters {
	totalRequests: number;
	successfulRequests: number;
	failedRequests: number;
	retriedRequests: number;
	circuitOpenRejections: number;
}

export interface StatsSnapshot extends Counters {
	activeConcurrency: number;
	queuedRequests: number;
	successRate: number;
	circuitState: CircuitStateName;
	targets: Readonly<Record<string, CircuitStateName>>;
	proxies: ProxyPoolSnapshot;
}

export interface FetchMiddlewareDeps {
	transport?: HttpTransport;
	now?: Clock;
	random?: () => number;
}

function emptyCounters(): Counters {
	return {
		totalRequests: 0,
		successfulRequests: 0,
		failedRequests: 0,
		retriedRequests: 0,
		circuitOpenRejections: 0,
	};
}

function headerValue(headers: Record<string, string>, name: string): string | undefined {
	const wanted = name.toLowerCase();
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() === wanted) return value;
	}
	return undefined;
}

/**
 * Wraps every outbound request in circuit breaking, rate limiting, proxy and
 * user-agent rotation, and retry with backoff. One instance is meant to be
 * shared by all concurrent callers so they see the same limits.
 */
export class FetchMiddleware {
	readonly config: MiddlewareConfig;
	private readonly limiter: RateLimiter;
	private readonly proxies: ProxyManager;
	private readonly breakers: CircuitBreakerRegistry;
	private readonly userAgents: UserAgentRotator;
	private readonly retryPolicy: RetryPolicy;
	private readonly policy: CockatielRetryPolicy;
	private readonly transport: HttpTransport;
	private readonly now: Clock;
	private counters = emptyCounters();

	constructor(config: MiddlewareConfigInput, deps: FetchMiddlewareDeps = {}) {
		this.config = validateConfig(MiddlewareConfigSchema, config, "middleware");
		this.now = deps.now ?? Date.now;
		this.limiter = new RateLimiter(this.config.rateLimit, this.now);
		this.proxies = new ProxyManager(this.config.proxy, this.now);
		this.breakers = new CircuitBreakerRegistry(this.config.circuitBreaker, {
			perTarget: this.config.perTargetBreakers,
			maxTargets: this.config.maxTrackedTargets,
			now: this.now,
		});
		this.userAgents = new UserAgentRotator(this.config.userAgents);
		this.retryPolicy = new RetryPolicy(this.config.retry, deps.random);
		this.policy = this.retryPolicy.toCockatiel();
		this.transport = deps.transport ?? new UndiciTransport();

		this.policy.onRetry((reason) => {
			logger.warn("[RETRY] backing off", {
				delayMs: reason.delay,
				error: "error" in reason ? reason.error.message : undefined,
			});
		});
	}

	get circuitBreakers(): CircuitBreakerRegistry {
		return this.breakers;
	}

	async request(method: string, url: string, options: RequestOptions = {}): Promise<FetchResponse> {
		this.counters.totalRequests++;
		const trace: RequestTrace = { sent: false };
		try {
			const response = await this.execute(method, url, options, trace);
			this.counters.successfulRequests++;
			return response;
		} catch (err) {
			// Rejected before any attempt went out: counted apart from failures.
			if (err instanceof CircuitOpenError && !trace.sent) {
				this.counters.circuitOpenRejections++;
			} else {
				this.counters.failedRequests++;
			}
			logger.warn("[FETCH] request failed", { method, url, error: describeError(err) });
			throw err;
		}
	}

	get(url: string, options: Omit<RequestOptions, "body"> = {}): Promise<FetchResponse> {
		return this.request("GET", url, options);
	}

	post(url: string, body: RequestBody, options: Omit<RequestOptions, "body"> = {}): Promise<FetchResponse> {
		return this.request("POST", url, { ...options, body });
	}

	getStats(): Readonly<StatsSnapshot> {
		const c = this.counters;
		return Object.freeze({
			...c,
			activeConcurrency: this.limiter.inFlight,
			queuedRequests: this.limiter.pending,
			successRate: (c.successfulRequests / Math.max(c.totalRequests, 1)) * 100,
			circuitState: this.breakers.worstState(),
			targets: Object.freeze(this.breakers.states()),
			proxies: this.proxies.snapshot(),
		});
	}

	resetStats(): void {
		this.counters = emptyCounters();
	}

	async close(): Promise<void> {
		await this.transport.close?.();
	}

	private execute(
		method: string,
		url: string,
		options: RequestOptions,
		trace: RequestTrace,
	): Promise<FetchResponse> {
		const run = (signal: AbortSignal | undefined) =>
			this.policy.execute(
				({ attempt, signal: attemptSignal }) =>
					this.attempt(method, url, options, attempt, attemptSignal, trace),
				signal,
			);

		if (options.timeoutMs === undefined) return run(options.signal);
		return timeout(options.timeoutMs, TimeoutStrategy.Aggressive).execute(
			({ signal }) => run(signal),
			options.signal,
		);
	}

	private async attempt(
		method: string,
		url: string,
		options: RequestOptions,
		attempt: number,
		signal: AbortSignal,
		trace: RequestTrace,
	): Promise<FetchResponse> {
		if (signal.aborted) throw new TaskCancelledError("Request cancelled");
		if (attempt > 0) {
			this.counters.retriedRequests++;
			logger.info("[RETRY] attempt", { method, url, attempt: attempt + 1 });
		}

		const breaker = this.breakers.forUrl(url);
		const permit = breaker.acquire();

		try {
			await this.limiter.acquire(signal);
		} catch (err) {
			breaker.abandon(permit);
			throw err;
		}

		const proxy = this.proxies.nextProxy();
		try {
			let response: TransportResponse;
			try {
				trace.sent = true;
				response = await this.transport.send(this.buildRequest(method, url, options, proxy, signal));
			} catch (err) {
				if (signal.aborted || err instanceof TaskCancelledError || err instanceof ConfigurationError) {
					breaker.abandon(permit);
					throw err instanceof Error ? err : new TaskCancelledError("Request cancelled");
				}
				const failure =
					err instanceof TransientNetworkError
						? err
						: new TransientNetworkError(`Network error: ${describeError(err)}`, err);
				breaker.recordFailure(permit);
				if (proxy) this.proxies.markFailed(proxy);
				throw failure;
			}

			const failure = classifyStatus(
				response.status,
				headerValue(response.headers, "retry-after"),
				this.now(),
			);
			if (failure && isRetriable(failure)) {
				breaker.recordFailure(permit);
				throw failure;
			}
			// The target answered, so it counts as healthy even on a 4xx.
			breaker.recordSuccess(permit);
			if (proxy) this.proxies.markSucceeded(proxy);
			if (failure) throw failure;
			return { ...response, attempts: attempt + 1, proxy };
		} finally {
			this.limiter.release();
		}
	}

	private buildRequest(
		method: string,
		url: string,
		options: RequestOptions,
		proxy: string | null,
		signal: AbortSignal,
	): TransportRequest {
		const headers: Record<string, string> = { ...options.headers };
		if (headerValue(headers, "user-agent") === undefined) {
			const agent = this.userAgents.next();
			if (agent) headers["User-Agent"] = agent;
		}

		let body: string | Uint8Array | undefined;
		if (typeof options.body === "string" || options.body instanceof Uint8Array) {
			body = options.body;
		} else if (options.body !== undefined) {
			body = JSON.stringify(options.body);
			if (headerValue(headers, "content-type") === undefined) {
				headers["Content-Type"] = "application/json";
			}
		}

		return {
			method,
			url,
			body,
			headers,
			proxy,
			timeoutMs: this.config.requestTimeoutMs,
			signal,
		};
	}
}
