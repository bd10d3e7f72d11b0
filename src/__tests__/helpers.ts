import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TaskCancelledError } from "cockatiel";
import type { HttpTransport, TransportRequest, TransportResponse } from "../clients/http-transport";

export type ScriptStep = Partial<TransportResponse> | Error | "hang";

/**
 * In-process stand-in for the network. Each send() consumes the next scripted
 * step; once the script runs out every call answers 200. "hang" never settles
 * until the request's signal aborts.
 */
export class FakeTransport implements HttpTransport {
	readonly requests: TransportRequest[] = [];
	closed = false;

	constructor(private readonly script: ScriptStep[] = []) {}

	push(...steps: ScriptStep[]): void {
		this.script.push(...steps);
	}

	async send(request: TransportRequest): Promise<TransportResponse> {
		this.requests.push(request);
		const step = this.script.shift() ?? {};
		if (step instanceof Error) throw step;
		if (step === "hang") {
			return new Promise<TransportResponse>((_resolve, reject) => {
				const cancel = () => reject(new TaskCancelledError("Request cancelled"));
				if (request.signal?.aborted) cancel();
				request.signal?.addEventListener("abort", cancel, { once: true });
			});
		}
		return { status: 200, headers: {}, body: "", url: request.url, ...step };
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

export async function makeTempDir(): Promise<string> {
	return mkdtemp(join(tmpdir(), "crawlguard-"));
}

export async function removeDir(dir: string): Promise<void> {
	await rm(dir, { recursive: true, force: true });
}

/** A settable clock for injecting into stores. */
export function manualClock(start = Date.parse("2024-01-01T00:00:00.000Z")) {
	let current = start;
	return {
		now: () => current,
		set: (ms: number) => {
			current = ms;
		},
		advance: (ms: number) => {
			current += ms;
		},
	};
}
