import { describe, expect, it } from "vitest";
import { CircuitBreakerConfigSchema } from "../../config.js";
import {
	CircuitBreaker,
	CircuitBreakerRegistry,
	INITIAL_STATE,
	transition,
} from "../circuit-breaker.js";
import { CircuitOpenError } from "../errors.js";

function setup(overrides: { failureThreshold?: number; successThreshold?: number } = {}) {
	let t = 0;
	const breaker = new CircuitBreaker(
		"api.example.test",
		{ failureThreshold: 3, recoveryTimeoutMs: 1_000, successThreshold: 2, ...overrides },
		() => t,
	);
	return {
		breaker,
		setTime: (ms: number) => {
			t = ms;
		},
		fail: (times = 1) => {
			for (let i = 0; i < times; i++) breaker.recordFailure(breaker.acquire());
		},
	};
}

function rejection(fn: () => unknown): CircuitOpenError {
	try {
		fn();
	} catch (err) {
		if (err instanceof CircuitOpenError) return err;
		throw err;
	}
	throw new Error("expected CircuitOpenError");
}

describe("transition", () => {
	const config = CircuitBreakerConfigSchema.parse({ failureThreshold: 1, recoveryTimeoutMs: 100 });

	it("opens on the threshold failure", () => {
		expect(transition(INITIAL_STATE, { type: "failure", trial: false, at: 5 }, config)).toEqual({
			kind: "OPEN",
			openedAt: 5,
		});
	});

	it("stays open until the recovery timeout has elapsed", () => {
		const open = { kind: "OPEN" as const, openedAt: 0 };
		expect(transition(open, { type: "probe", at: 99 }, config)).toBe(open);
		expect(transition(open, { type: "probe", at: 100 }, config)).toEqual({
			kind: "HALF_OPEN",
			consecutiveSuccesses: 0,
			inFlight: 0,
		});
	});
});

describe("CircuitBreaker", () => {
	it("opens after consecutive failures reach the threshold", () => {
		const { breaker, fail } = setup();
		fail(2);
		expect(breaker.state).toBe("CLOSED");
		fail();
		expect(breaker.state).toBe("OPEN");
	});

	it("a success resets the failure count", () => {
		const { breaker, fail } = setup();
		fail(2);
		breaker.recordSuccess(breaker.acquire());
		fail(2);
		expect(breaker.state).toBe("CLOSED");
		expect(breaker.snapshot().consecutiveFailures).toBe(2);
	});

	it("rejects while open with the time left until recovery", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		expect(rejection(() => breaker.acquire()).retryAfterMs).toBe(1_000);

		setTime(400);
		const err = rejection(() => breaker.acquire());
		expect(err.retryAfterMs).toBe(600);
		expect(err.target).toBe("api.example.test");
	});

	it("moves to half-open once the recovery timeout elapses", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		setTime(999);
		expect(breaker.state).toBe("OPEN");
		setTime(1_000);
		expect(breaker.state).toBe("HALF_OPEN");
	});

	it("limits concurrent trial calls in half-open", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		setTime(1_000);
		breaker.acquire();
		breaker.acquire();
		expect(rejection(() => breaker.acquire()).retryAfterMs).toBe(0);
	});

	it("closes after enough trial successes", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		setTime(1_000);
		const first = breaker.acquire();
		const second = breaker.acquire();
		breaker.recordSuccess(first);
		expect(breaker.state).toBe("HALF_OPEN");
		breaker.recordSuccess(second);
		expect(breaker.state).toBe("CLOSED");
	});

	it("a trial failure re-opens with a fresh recovery window", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		setTime(1_000);
		breaker.recordFailure(breaker.acquire());
		expect(breaker.state).toBe("OPEN");

		setTime(1_500);
		expect(rejection(() => breaker.acquire()).retryAfterMs).toBe(500);
	});

	it("ignores outcomes of calls admitted before the state changed", () => {
		const { breaker, fail, setTime } = setup();
		const stale = breaker.acquire();
		fail(3);

		breaker.recordSuccess(stale);
		expect(breaker.state).toBe("OPEN");

		setTime(1_000);
		expect(breaker.state).toBe("HALF_OPEN");
		breaker.recordSuccess(stale);
		breaker.recordFailure(stale);
		expect(breaker.state).toBe("HALF_OPEN");
		expect(breaker.snapshot().consecutiveSuccesses).toBe(0);
	});

	it("abandoning a trial frees its slot", () => {
		const { breaker, fail, setTime } = setup();
		fail(3);
		setTime(1_000);
		const first = breaker.acquire();
		breaker.acquire();
		breaker.abandon(first);
		expect(breaker.acquire().trial).toBe(true);
	});

	it("notifies listeners of each state change", () => {
		const { breaker, fail, setTime } = setup({ successThreshold: 1 });
		const changes: string[] = [];
		breaker.onStateChange((target, from, to) => changes.push(`${target}:${from}->${to}`));

		fail(3);
		setTime(1_000);
		breaker.recordSuccess(breaker.acquire());

		expect(changes).toEqual([
			"api.example.test:CLOSED->OPEN",
			"api.example.test:OPEN->HALF_OPEN",
			"api.example.test:HALF_OPEN->CLOSED",
		]);
	});

	it("snapshot reports when the circuit opened", () => {
		const { breaker, fail, setTime } = setup();
		setTime(Date.parse("2024-03-01T12:00:00.000Z"));
		fail(3);
		expect(breaker.snapshot()).toEqual({
			target: "api.example.test",
			state: "OPEN",
			consecutiveFailures: 0,
			consecutiveSuccesses: 0,
			openedAt: "2024-03-01T12:00:00.000Z",
		});
	});
});

describe("CircuitBreakerRegistry", () => {
	it("keys breakers by host", () => {
		const registry = new CircuitBreakerRegistry({ failureThreshold: 1 });
		const a = registry.forUrl("https://a.example.test/page/1");
		expect(registry.forUrl("https://a.example.test/page/2")).toBe(a);
		expect(registry.forUrl("https://b.example.test/page/1")).not.toBe(a);
		expect(a.target).toBe("a.example.test");
	});

	it("shares one breaker when per-target breakers are off", () => {
		const registry = new CircuitBreakerRegistry({}, { perTarget: false });
		const a = registry.forUrl("https://a.example.test/");
		expect(registry.forUrl("https://b.example.test/")).toBe(a);
		expect(a.target).toBe("*");
	});

	it("reports per-target states and the worst of them", () => {
		const registry = new CircuitBreakerRegistry({ failureThreshold: 1 });
		const a = registry.forUrl("https://a.example.test/");
		registry.forUrl("https://b.example.test/");
		expect(registry.worstState()).toBe("CLOSED");

		a.recordFailure(a.acquire());
		expect(registry.states()).toEqual({ "a.example.test": "OPEN", "b.example.test": "CLOSED" });
		expect(registry.worstState()).toBe("OPEN");
	});

	it("forwards state changes from every breaker", () => {
		const registry = new CircuitBreakerRegistry({ failureThreshold: 1 });
		const seen: string[] = [];
		registry.onStateChange((target, _from, to) => seen.push(`${target}:${to}`));
		const b = registry.forUrl("https://b.example.test/");
		b.recordFailure(b.acquire());
		expect(seen).toEqual(["b.example.test:OPEN"]);
	});

	it("falls back to the raw string for unparseable URLs", () => {
		expect(CircuitBreakerRegistry.targetOf("not a url")).toBe("not a url");
		expect(CircuitBreakerRegistry.targetOf("http://host.test:8080/x")).toBe("host.test:8080");
	});
});
