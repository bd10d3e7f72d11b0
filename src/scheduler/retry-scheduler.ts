import { TaskCancelledError } from "cockatiel";
import { z } from "zod";
import type { FetchMiddleware, RequestBody, RequestOptions } from "../clients/fetch-middleware";
import {
	type RetrySchedulerConfig,
	type RetrySchedulerConfigInput,
	RetrySchedulerConfigSchema,
	validateConfig,
} from "../config";
import { describeError, logger } from "../logger";
import type { FailedTaskQueue } from "../persistence/failed-task-queue";
import { CircuitOpenError } from "../resilience/errors";
import type { FailedTask, JsonRecord } from "../types";

/** Re-runs one failed task. Resolving means success; throwing counts as a failed retry. */
export type RetryHandler = (task: FailedTask, signal: AbortSignal) => Promise<void>;

export interface ScanResult {
	due: number;
	resolved: number;
	failed: number;
	exhausted: number;
	/** Pushed back without using an attempt because the target's circuit was open. */
	deferred: number;
	/** Left untouched because the scheduler was stopping. */
	skipped: number;
}

const ReplaySchema = z.object({
	method: z.string().default("GET"),
	body: z.union([z.string(), z.array(z.unknown()), z.record(z.unknown())]).optional(),
	bodyBase64: z.string().optional(),
	headers: z.record(z.string()).optional(),
});

/** Task metadata that lets the default handler re-send the original request. */
export function replayMetadata(method: string, options: RequestOptions = {}): JsonRecord {
	const metadata: JsonRecord = { method };
	if (options.body instanceof Uint8Array) {
		metadata.bodyBase64 = Buffer.from(options.body).toString("base64");
	} else if (options.body !== undefined) {
		metadata.body = structuredClone(options.body);
	}
	if (options.headers) metadata.headers = { ...options.headers };
	return metadata;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) return resolve();
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Background loop that drains due failed tasks through per-task-type
 * handlers, with at most `maxWorkers` retries in flight.
 */
export class RetryScheduler {
	readonly config: RetrySchedulerConfig;
	private readonly handlers = new Map<string, RetryHandler>();
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private scanning: Promise<ScanResult> | null = null;

	constructor(
		private readonly queue: FailedTaskQueue,
		private readonly middleware: FetchMiddleware,
		config: RetrySchedulerConfigInput = {},
	) {
		this.config = validateConfig(RetrySchedulerConfigSchema, config, "retry scheduler");
	}

	get running(): boolean {
		return this.loop !== null;
	}

	registerHandler(taskType: string, handler: RetryHandler): void {
		this.handlers.set(taskType, handler);
	}

	start(): void {
		if (this.loop) return;
		const controller = new AbortController();
		this.controller = controller;
		logger.info("[SCHEDULER] started", {
			intervalMs: this.config.checkIntervalMs,
			maxWorkers: this.config.maxWorkers,
		});
		this.loop = this.run(controller.signal);
	}

	/** Resolves once the current scan and its writes have finished. */
	async stop(): Promise<void> {
		const loop = this.loop;
		if (!loop) return;
		this.controller?.abort();
		try {
			await loop;
		} finally {
			this.loop = null;
			this.controller = null;
			logger.info("[SCHEDULER] stopped");
		}
	}

	/**
	 * One scan: retries every task due right now. A call made while a scan is
	 * already running joins that scan instead of starting another.
	 */
	runOnce(signal: AbortSignal = new AbortController().signal): Promise<ScanResult> {
		if (this.scanning) return this.scanning;
		const scan = this.scan(signal).finally(() => {
			this.scanning = null;
		});
		this.scanning = scan;
		return scan;
	}

	private async scan(signal: AbortSignal): Promise<ScanResult> {
		const due = await this.queue.dueTasks();
		const result: ScanResult = {
			due: due.length,
			resolved: 0,
			failed: 0,
			exhausted: 0,
			deferred: 0,
			skipped: 0,
		};
		if (due.length === 0) return result;
		logger.info("[SCHEDULER] retrying due tasks", { due: due.length });

		let next = 0;
		const worker = async () => {
			while (next < due.length) {
				const task = due[next++];
				if (!task) break;
				if (signal.aborted) {
					result.skipped++;
					continue;
				}
				await this.retry(task, signal, result);
			}
		};
		const workers = Array.from({ length: Math.min(this.config.maxWorkers, due.length) }, worker);
		const settled = await Promise.allSettled(workers);
		for (const outcome of settled) {
			if (outcome.status === "rejected") throw outcome.reason;
		}
		return result;
	}

	private async retry(task: FailedTask, signal: AbortSignal, result: ScanResult): Promise<void> {
		const handler = this.handlers.get(task.taskType) ?? this.defaultHandler;
		try {
			await handler(task, signal);
		} catch (err) {
			if (signal.aborted && err instanceof TaskCancelledError) {
				result.skipped++;
				return;
			}
			if (err instanceof CircuitOpenError) {
				await this.queue.defer(task.taskId, err.retryAfterMs, describeError(err));
				result.deferred++;
				logger.info("[SCHEDULER] circuit open, deferring", {
					taskId: task.taskId,
					retryAfterMs: err.retryAfterMs,
				});
				return;
			}
			const updated = await this.queue.markFailed(task.taskId, describeError(err));
			if (updated.status === "EXHAUSTED") {
				result.exhausted++;
			} else {
				result.failed++;
			}
			logger.warn("[SCHEDULER] retry failed", {
				taskId: task.taskId,
				attempt: updated.attemptCount,
				error: describeError(err),
			});
			return;
		}
		await this.queue.markResolved(task.taskId);
		result.resolved++;
	}

	/** Re-sends the request recorded in the task's metadata; a plain GET when none was. */
	private readonly defaultHandler: RetryHandler = async (task, signal) => {
		const parsed = ReplaySchema.safeParse(task.metadata);
		if (!parsed.success) {
			logger.warn("[SCHEDULER] unreadable replay metadata, sending GET", { taskId: task.taskId });
		}
		const replay: z.output<typeof ReplaySchema> = parsed.success ? parsed.data : { method: "GET" };
		let body: RequestBody | undefined = replay.body;
		if (body === undefined && replay.bodyBase64 !== undefined) {
			body = new Uint8Array(Buffer.from(replay.bodyBase64, "base64"));
		}
		await this.middleware.request(replay.method, task.target, {
			body,
			headers: replay.headers,
			signal,
		});
	};

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.runOnce(signal);
			} catch (err) {
				logger.error("[SCHEDULER] scan failed", { error: describeError(err) });
			}
			await sleep(this.config.checkIntervalMs, signal);
		}
	}
}
