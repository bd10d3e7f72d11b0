import { LRUCache } from "lru-cache";
import {
	type CircuitBreakerConfig,
	type CircuitBreakerConfigInput,
	CircuitBreakerConfigSchema,
	validateConfig,
} from "../config";
import { logger } from "../logger";
import type { Clock } from "../types";
import { CircuitOpenError } from "./errors";

export type CircuitState =
	| { kind: "CLOSED"; consecutiveFailures: number }
	| { kind: "OPEN"; openedAt: number }
	| { kind: "HALF_OPEN"; consecutiveSuccesses: number; inFlight: number };

export type CircuitStateName = CircuitState["kind"];

export type CircuitEvent =
	| { type: "probe"; at: number }
	| { type: "admit" }
	| { type: "success"; trial: boolean }
	| { type: "failure"; trial: boolean; at: number }
	| { type: "abandon"; trial: boolean };

export const INITIAL_STATE: CircuitState = { kind: "CLOSED", consecutiveFailures: 0 };

/**
 * Pure transition function. `probe` moves OPEN to HALF_OPEN once the recovery
 * timeout has elapsed; `admit` reserves a trial slot in HALF_OPEN. Outcomes of
 * non-trial calls are ignored while HALF_OPEN.
 */
export function transition(
	state: CircuitState,
	event: CircuitEvent,
	config: CircuitBreakerConfig,
): CircuitState {
	switch (state.kind) {
		case "CLOSED":
			if (event.type === "success") {
				return state.consecutiveFailures === 0 ? state : INITIAL_STATE;
			}
			if (event.type === "failure") {
				const failures = state.consecutiveFailures + 1;
				return failures >= config.failureThreshold
					? { kind: "OPEN", openedAt: event.at }
					: { kind: "CLOSED", consecutiveFailures: failures };
			}
			return state;

		case "OPEN":
			if (event.type === "probe" && event.at - state.openedAt >= config.recoveryTimeoutMs) {
				return { kind: "HALF_OPEN", consecutiveSuccesses: 0, inFlight: 0 };
			}
			return state;

		case "HALF_OPEN":
			switch (event.type) {
				case "admit":
					return { ...state, inFlight: state.inFlight + 1 };
				case "success": {
					if (!event.trial) return state;
					const successes = state.consecutiveSuccesses + 1;
					if (successes >= config.successThreshold) return INITIAL_STATE;
					return {
						kind: "HALF_OPEN",
						consecutiveSuccesses: successes,
						inFlight: Math.max(0, state.inFlight - 1),
					};
				}
				case "failure":
					return event.trial ? { kind: "OPEN", openedAt: event.at } : state;
				case "abandon":
					return event.trial ? { ...state, inFlight: Math.max(0, state.inFlight - 1) } : state;
				default:
					return state;
			}
	}
}

/** Handed out on admission; outcomes are reported against it. */
export interface BreakerPermit {
	readonly trial: boolean;
	readonly generation: number;
}

export interface CircuitSnapshot {
	target: string;
	state: CircuitStateName;
	consecutiveFailures: number;
	consecutiveSuccesses: number;
	openedAt: string | null;
}

export type StateChangeListener = (target: string, from: CircuitStateName, to: CircuitStateName) => void;

export class CircuitBreaker {
	private current: CircuitState = INITIAL_STATE;
	// Bumped on every change of state kind so late outcomes from an earlier
	// phase cannot move the current one.
	private generation = 0;
	private readonly config: CircuitBreakerConfig;
	private readonly listeners = new Set<StateChangeListener>();

	constructor(
		readonly target: string,
		config: CircuitBreakerConfigInput = {},
		private readonly now: Clock = Date.now,
	) {
		this.config = validateConfig(CircuitBreakerConfigSchema, config, "circuit breaker");
	}

	get state(): CircuitStateName {
		this.apply({ type: "probe", at: this.now() });
		return this.current.kind;
	}

	/** Admits a call or throws CircuitOpenError without touching the network. */
	acquire(): BreakerPermit {
		const now = this.now();
		this.apply({ type: "probe", at: now });
		const state = this.current;

		if (state.kind === "OPEN") {
			const retryAfterMs = Math.max(0, state.openedAt + this.config.recoveryTimeoutMs - now);
			throw new CircuitOpenError(this.target, retryAfterMs);
		}
		if (state.kind === "HALF_OPEN") {
			if (state.inFlight >= this.config.halfOpenMaxCalls) {
				throw new CircuitOpenError(this.target, 0);
			}
			this.apply({ type: "admit" });
			return { trial: true, generation: this.generation };
		}
		return { trial: false, generation: this.generation };
	}

	recordSuccess(permit: BreakerPermit): void {
		if (permit.generation !== this.generation) return;
		this.apply({ type: "success", trial: permit.trial });
	}

	recordFailure(permit: BreakerPermit): void {
		if (permit.generation !== this.generation) return;
		this.apply({ type: "failure", trial: permit.trial, at: this.now() });
	}

	/** Releases a trial slot for a call that never completed. */
	abandon(permit: BreakerPermit): void {
		if (permit.generation !== this.generation) return;
		this.apply({ type: "abandon", trial: permit.trial });
	}

	onStateChange(listener: StateChangeListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	snapshot(): CircuitSnapshot {
		const kind = this.state;
		const s = this.current;
		return {
			target: this.target,
			state: kind,
			consecutiveFailures: s.kind === "CLOSED" ? s.consecutiveFailures : 0,
			consecutiveSuccesses: s.kind === "HALF_OPEN" ? s.consecutiveSuccesses : 0,
			openedAt: s.kind === "OPEN" ? new Date(s.openedAt).toISOString() : null,
		};
	}

	private apply(event: CircuitEvent): void {
		const from = this.current.kind;
		this.current = transition(this.current, event, this.config);
		const to = this.current.kind;
		if (from === to) return;

		this.generation++;
		if (to === "OPEN") {
			logger.error(`[CIRCUIT] ${this.target} circuit breaker OPENED`, { from });
		} else if (to === "HALF_OPEN") {
			logger.info(`[CIRCUIT] ${this.target} circuit breaker HALF-OPEN`);
		} else {
			logger.info(`[CIRCUIT] ${this.target} circuit breaker CLOSED`);
		}
		for (const listener of this.listeners) listener(this.target, from, to);
	}
}

const SEVERITY: Record<CircuitStateName, number> = { CLOSED: 0, HALF_OPEN: 1, OPEN: 2 };

export const GLOBAL_TARGET = "*";

export interface CircuitBreakerRegistryOptions {
	perTarget?: boolean;
	maxTargets?: number;
	now?: Clock;
}

/**
 * One breaker per target host, or a single shared breaker when `perTarget`
 * is off. Least recently used targets are forgotten past `maxTargets`.
 */
export class CircuitBreakerRegistry {
	private readonly breakers: LRUCache<string, CircuitBreaker>;
	private readonly listeners = new Set<StateChangeListener>();
	private readonly perTarget: boolean;
	private readonly now: Clock;

	constructor(
		private readonly config: CircuitBreakerConfigInput = {},
		options: CircuitBreakerRegistryOptions = {},
	) {
		// Fail at construction rather than on the first request.
		validateConfig(CircuitBreakerConfigSchema, config, "circuit breaker");
		this.perTarget = options.perTarget ?? true;
		this.now = options.now ?? Date.now;
		this.breakers = new LRUCache<string, CircuitBreaker>({ max: options.maxTargets ?? 500 });
	}

	static targetOf(url: string): string {
		try {
			return new URL(url).host || url;
		} catch {
			return url;
		}
	}

	forUrl(url: string): CircuitBreaker {
		return this.get(this.perTarget ? CircuitBreakerRegistry.targetOf(url) : GLOBAL_TARGET);
	}

	get(target: string): CircuitBreaker {
		let breaker = this.breakers.get(target);
		if (!breaker) {
			breaker = new CircuitBreaker(target, this.config, this.now);
			breaker.onStateChange((t, from, to) => {
				for (const listener of this.listeners) listener(t, from, to);
			});
			this.breakers.set(target, breaker);
		}
		return breaker;
	}

	onStateChange(listener: StateChangeListener): () => void {
		this.listeners.add(listener);
		return () => this.listeners.delete(listener);
	}

	states(): Record<string, CircuitStateName> {
		const out: Record<string, CircuitStateName> = {};
		for (const [target, breaker] of this.breakers.entries()) {
			out[target] = breaker.state;
		}
		return out;
	}

	/** The most severe state across tracked targets; CLOSED when none. */
	worstState(): CircuitStateName {
		let worst: CircuitStateName = "CLOSED";
		for (const state of Object.values(this.states())) {
			if (SEVERITY[state] > SEVERITY[worst]) worst = state;
		}
		return worst;
	}

	snapshots(): CircuitSnapshot[] {
		return [...this.breakers.values()].map((b) => b.snapshot());
	}
}
