import { type ProxyConfig, type ProxyConfigInput, ProxyConfigSchema, validateConfig } from "../config";
import { logger } from "../logger";
import type { Clock } from "../types";

export interface ProxyPoolSnapshot {
	total: number;
	excluded: Array<{ proxy: string; excludedAt: string }>;
}

/**
 * Round-robin egress proxy pool. Failed proxies sit out a cooldown window;
 * when every proxy is excluded the one excluded longest ago is handed out so
 * the pool never starves.
 */
export class ProxyManager {
	private readonly config: ProxyConfig;
	private readonly pool: readonly string[];
	private readonly excluded = new Map<string, number>();
	private cursor = 0;

	constructor(
		config: ProxyConfigInput = {},
		private readonly now: Clock = Date.now,
	) {
		this.config = validateConfig(ProxyConfigSchema, config, "proxy");
		this.pool = [...new Set(this.config.proxies)];
	}

	get enabled(): boolean {
		return this.config.enabled && this.pool.length > 0;
	}

	/** Next proxy URL, or null for a direct connection. */
	nextProxy(): string | null {
		if (!this.enabled) return null;
		this.expireExclusions();

		for (let i = 0; i < this.pool.length; i++) {
			const index = (this.cursor + i) % this.pool.length;
			const proxy = this.pool[index];
			if (proxy !== undefined && !this.excluded.has(proxy)) {
				this.cursor = (index + 1) % this.pool.length;
				return proxy;
			}
		}

		let oldest: string | null = null;
		let oldestAt = Number.POSITIVE_INFINITY;
		for (const [proxy, at] of this.excluded) {
			if (at < oldestAt) {
				oldest = proxy;
				oldestAt = at;
			}
		}
		return oldest;
	}

	markFailed(proxy: string): void {
		if (!this.pool.includes(proxy)) return;
		this.excluded.set(proxy, this.now());
		logger.warn("[PROXY] excluded", { proxy, cooldownMs: this.config.cooldownMs });
	}

	markSucceeded(proxy: string): void {
		if (this.excluded.delete(proxy)) {
			logger.info("[PROXY] reinstated", { proxy });
		}
	}

	snapshot(): ProxyPoolSnapshot {
		this.expireExclusions();
		return {
			total: this.pool.length,
			excluded: [...this.excluded].map(([proxy, at]) => ({
				proxy,
				excludedAt: new Date(at).toISOString(),
			})),
		};
	}

	private expireExclusions(): void {
		const cutoff = this.now() - this.config.cooldownMs;
		for (const [proxy, at] of this.excluded) {
			if (at <= cutoff) this.excluded.delete(proxy);
		}
	}
}
