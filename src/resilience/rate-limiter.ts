import { TaskCancelledError } from "cockatiel";
import {
	type RateLimitConfig,
	type RateLimitConfigInput,
	RateLimitConfigSchema,
	validateConfig,
} from "../config";
import { logger } from "../logger";
import type { Clock } from "../types";

export class TokenBucketRateLimiter {
	private tokens: number;
	private lastRefill: number;

	constructor(
		private readonly maxTokens: number,
		private readonly refillIntervalMs: number,
		private readonly now: Clock = Date.now,
	) {
		this.tokens = maxTokens;
		this.lastRefill = now();
	}

	/** Bucket that sustains `perSecond` tokens per second with room for `burst`. */
	static perSecond(perSecond: number, burst = 1, now: Clock = Date.now): TokenBucketRateLimiter {
		return new TokenBucketRateLimiter(burst, (burst * 1_000) / perSecond, now);
	}

	tryConsume(count = 1): boolean {
		this.refill();
		if (this.tokens >= count) {
			this.tokens -= count;
			return true;
		}
		return false;
	}

	msUntilNextToken(): number {
		this.refill();
		if (this.tokens >= 1) return 0;
		const msPerToken = this.refillIntervalMs / this.maxTokens;
		return Math.max(1, Math.ceil((1 - this.tokens) * msPerToken));
	}

	get remaining(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	private refill(): void {
		const now = this.now();
		const elapsed = now - this.lastRefill;
		if (elapsed <= 0) return;
		const tokensToAdd = (elapsed / this.refillIntervalMs) * this.maxTokens;
		this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
		this.lastRefill = now;
	}
}

interface Waiter {
	resolve: () => void;
	reject: (err: Error) => void;
	signal?: AbortSignal;
	onAbort?: () => void;
}

/**
 * Admits a caller once a concurrency permit is free and the token bucket has
 * a token. Excess demand queues in arrival order; nothing is dropped.
 */
export class RateLimiter {
	private readonly bucket: TokenBucketRateLimiter;
	private readonly waiters: Waiter[] = [];
	private readonly config: RateLimitConfig;
	private held = 0;
	private timer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: RateLimitConfigInput, now: Clock = Date.now) {
		this.config = validateConfig(RateLimitConfigSchema, config, "rate limit");
		this.bucket = TokenBucketRateLimiter.perSecond(
			this.config.maxRequestsPerSecond,
			this.config.burstSize,
			now,
		);
	}

	get inFlight(): number {
		return this.held;
	}

	get pending(): number {
		return this.waiters.length;
	}

	acquire(signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(new TaskCancelledError("Rate limiter wait cancelled"));
		}
		return new Promise<void>((resolve, reject) => {
			const waiter: Waiter = { resolve, reject, signal };
			if (signal) {
				waiter.onAbort = () => this.cancel(waiter);
				signal.addEventListener("abort", waiter.onAbort, { once: true });
			}
			this.waiters.push(waiter);
			this.pump();
		});
	}

	release(): void {
		if (this.held === 0) {
			logger.warn("[RATE] release() called without a held permit");
			return;
		}
		this.held--;
		this.pump();
	}

	/** Runs `fn` under a permit, releasing it however `fn` settles. */
	async schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		await this.acquire(signal);
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	private cancel(waiter: Waiter): void {
		const index = this.waiters.indexOf(waiter);
		if (index === -1) return;
		this.waiters.splice(index, 1);
		waiter.reject(new TaskCancelledError("Rate limiter wait cancelled"));
		// The head may have changed; reschedule against the new one.
		this.pump();
	}

	private pump(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		while (this.waiters.length > 0) {
			if (this.held >= this.config.maxConcurrent) return;
			if (!this.bucket.tryConsume()) {
				const wait = this.bucket.msUntilNextToken();
				logger.debug("[RATE] throttling", { waitMs: wait, queued: this.waiters.length });
				this.timer = setTimeout(() => {
					this.timer = null;
					this.pump();
				}, wait);
				return;
			}
			const waiter = this.waiters.shift();
			if (!waiter) return;
			if (waiter.signal && waiter.onAbort) {
				waiter.signal.removeEventListener("abort", waiter.onAbort);
			}
			this.held++;
			waiter.resolve();
		}
	}
}
