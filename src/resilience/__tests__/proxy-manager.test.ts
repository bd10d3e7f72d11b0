import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { ProxyManager } from "../proxy-manager.js";

const A = "http://proxy-a.test:8080";
const B = "http://proxy-b.test:8080";
const C = "https://proxy-c.test:8443";

function pool(proxies: string[], cooldownMs = 1_000) {
	let t = 0;
	const manager = new ProxyManager({ enabled: true, proxies, cooldownMs }, () => t);
	return {
		manager,
		setTime: (ms: number) => {
			t = ms;
		},
	};
}

describe("ProxyManager", () => {
	it("hands out null when disabled or empty", () => {
		expect(new ProxyManager({ enabled: false, proxies: [A] }).nextProxy()).toBeNull();
		expect(new ProxyManager({ enabled: true, proxies: [] }).nextProxy()).toBeNull();
	});

	it("rotates round-robin", () => {
		const { manager } = pool([A, B, C]);
		expect([1, 2, 3, 4].map(() => manager.nextProxy())).toEqual([A, B, C, A]);
	});

	it("spreads selections evenly over a healthy pool", () => {
		const { manager } = pool([A, B, C]);
		const counts = new Map<string, number>();
		for (let i = 0; i < 7; i++) {
			const proxy = manager.nextProxy();
			if (proxy) counts.set(proxy, (counts.get(proxy) ?? 0) + 1);
		}
		expect(Object.fromEntries(counts)).toEqual({ [A]: 3, [B]: 2, [C]: 2 });
	});

	it("drops duplicate entries", () => {
		const { manager } = pool([A, A, B]);
		expect(manager.snapshot().total).toBe(2);
	});

	it("skips a failed proxy", () => {
		const { manager } = pool([A, B, C]);
		expect(manager.nextProxy()).toBe(A);
		manager.markFailed(B);
		expect([1, 2, 3].map(() => manager.nextProxy())).toEqual([C, A, C]);
	});

	it("restores a failed proxy after the cooldown", () => {
		const { manager, setTime } = pool([A, B]);
		manager.markFailed(A);
		setTime(999);
		expect(manager.snapshot().excluded).toHaveLength(1);
		setTime(1_000);
		expect(manager.snapshot().excluded).toEqual([]);
	});

	it("falls back to the longest-excluded proxy when all are excluded", () => {
		const { manager, setTime } = pool([A, B], 60_000);
		manager.markFailed(A);
		setTime(10);
		manager.markFailed(B);
		expect(manager.nextProxy()).toBe(A);
	});

	it("reinstates a proxy on success", () => {
		const { manager } = pool([A, B]);
		manager.markFailed(A);
		manager.markSucceeded(A);
		expect(manager.snapshot()).toEqual({ total: 2, excluded: [] });
	});

	it("reports exclusion times", () => {
		const { manager } = pool([A]);
		manager.markFailed(A);
		expect(manager.snapshot().excluded).toEqual([
			{ proxy: A, excludedAt: "1970-01-01T00:00:00.000Z" },
		]);
	});

	it("ignores proxies outside the pool", () => {
		const { manager } = pool([A]);
		manager.markFailed("http://stranger.test:1");
		expect(manager.snapshot().excluded).toEqual([]);
	});

	it("rejects unsupported schemes", () => {
		expect(() => new ProxyManager({ enabled: true, proxies: ["ftp://proxy.test"] })).toThrow(
			ConfigurationError,
		);
	});
});
