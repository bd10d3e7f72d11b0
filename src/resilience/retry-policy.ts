import {
	DelegateBackoff,
	type IRetryBackoffContext,
	type RetryPolicy as CockatielRetryPolicy,
	handleWhen,
	retry,
} from "cockatiel";
import { type RetryConfig, type RetryConfigInput, RetryConfigSchema, validateConfig } from "../config";
import { RateLimitError, isRetriable } from "./errors";

export class RetryPolicy {
	readonly config: RetryConfig;

	constructor(
		config: RetryConfigInput = {},
		private readonly random: () => number = Math.random,
	) {
		this.config = validateConfig(RetryConfigSchema, config, "retry");
	}

	/**
	 * Delay before retry number `attempt` (0-based):
	 * `baseDelayMs * backoffFactor^attempt`, capped at `maxDelayMs`. A
	 * server-supplied Retry-After raises the delay, still under the cap.
	 */
	delayFor(attempt: number, cause?: unknown): number {
		const { baseDelayMs, backoffFactor, maxDelayMs, jitter } = this.config;
		let delay = baseDelayMs * backoffFactor ** Math.max(0, attempt);
		if (jitter) {
			delay += this.random() * 0.1 * delay;
		}
		if (cause instanceof RateLimitError && cause.retryAfterMs !== undefined) {
			delay = Math.max(delay, cause.retryAfterMs);
		}
		return Math.min(delay, maxDelayMs);
	}

	/**
	 * A cockatiel retry policy that retries only retriable errors, up to
	 * `maxRetries` times, sleeping `delayFor()` between attempts.
	 */
	toCockatiel(): CockatielRetryPolicy {
		return retry(
			handleWhen((err) => isRetriable(err)),
			{
				maxAttempts: this.config.maxRetries,
				// cockatiel numbers retries from 1
				backoff: new DelegateBackoff((context: IRetryBackoffContext<unknown>) =>
					this.delayFor(
						context.attempt - 1,
						"error" in context.result ? context.result.error : undefined,
					),
				),
			},
		);
	}
}
