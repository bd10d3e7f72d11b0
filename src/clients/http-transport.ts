import { TaskCancelledError } from "cockatiel";
import { ProxyAgent, fetch } from "undici";
import { describeError } from "../logger";
import { ConfigurationError, TransientNetworkError } from "../resilience/errors";

export interface TransportRequest {
	method: string;
	url: string;
	body?: string | Uint8Array;
	headers: Record<string, string>;
	/** Proxy URL, or null for a direct connection. */
	proxy: string | null;
	/** Applies to this single attempt. */
	timeoutMs: number;
	signal?: AbortSignal;
}

export interface TransportResponse {
	status: number;
	headers: Record<string, string>;
	body: string;
	url: string;
}

/**
 * Performs one network attempt. Any failure to obtain a response surfaces as
 * TransientNetworkError; a caller abort surfaces as TaskCancelledError.
 */
export interface HttpTransport {
	send(request: TransportRequest): Promise<TransportResponse>;
	close?(): Promise<void>;
}

export class UndiciTransport implements HttpTransport {
	private readonly agents = new Map<string, ProxyAgent>();

	async send(request: TransportRequest): Promise<TransportResponse> {
		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, request.timeoutMs);
		const onAbort = () => controller.abort();
		request.signal?.addEventListener("abort", onAbort, { once: true });

		try {
			const dispatcher = request.proxy ? this.agentFor(request.proxy) : undefined;
			const response = await fetch(request.url, {
				method: request.method,
				headers: request.headers,
				body: request.body,
				signal: controller.signal,
				dispatcher,
			});
			const body = await response.text();
			return {
				status: response.status,
				headers: Object.fromEntries(response.headers),
				body,
				url: response.url || request.url,
			};
		} catch (err) {
			if (err instanceof ConfigurationError) throw err;
			if (request.signal?.aborted) {
				throw new TaskCancelledError("Request cancelled");
			}
			if (timedOut) {
				throw new TransientNetworkError(`Request timed out after ${request.timeoutMs}ms`, err);
			}
			throw new TransientNetworkError(`Network error: ${describeError(err)}`, err);
		} finally {
			clearTimeout(timer);
			request.signal?.removeEventListener("abort", onAbort);
		}
	}

	async close(): Promise<void> {
		const agents = [...this.agents.values()];
		this.agents.clear();
		await Promise.all(agents.map((agent) => agent.close()));
	}

	private agentFor(proxy: string): ProxyAgent {
		let agent = this.agents.get(proxy);
		if (!agent) {
			if (!proxy.startsWith("http://") && !proxy.startsWith("https://")) {
				throw new ConfigurationError(`Unsupported proxy scheme for ${proxy}`, [
					"UndiciTransport handles http:// and https:// proxies",
				]);
			}
			agent = new ProxyAgent(proxy);
			this.agents.set(proxy, agent);
		}
		return agent;
	}
}
