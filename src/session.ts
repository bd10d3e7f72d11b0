import { TaskCancelledError } from "cockatiel";
import type { HttpTransport } from "./clients/http-transport";
import {
	type FetchResponse,
	FetchMiddleware,
	type RequestOptions,
	type StatsSnapshot,
} from "./clients/fetch-middleware";
import type { MiddlewareConfigInput, RetrySchedulerConfigInput } from "./config";
import { describeError, logger } from "./logger";
import { CheckpointStore, type ResumePosition } from "./persistence/checkpoint-store";
import { CollectionStateStore, type ProgressDelta } from "./persistence/collection-state";
import { FailedTaskQueue } from "./persistence/failed-task-queue";
import { CircuitOpenError, isRetriable } from "./resilience/errors";
import {
	type RetryHandler,
	RetryScheduler,
	type ScanResult,
	replayMetadata,
} from "./scheduler/retry-scheduler";
import type {
	Clock,
	CollectionState,
	FailedTask,
	FailedTaskStatus,
	JsonRecord,
	ResumePoint,
	RunStatus,
} from "./types";

export interface CrawlSessionConfig {
	stateDir: string;
	middleware: MiddlewareConfigInput;
	scheduler?: RetrySchedulerConfigInput;
}

export interface CrawlSessionDeps {
	transport?: HttpTransport;
	now?: Clock;
	random?: () => number;
	newRunId?: () => string;
}

export type FetchOutcome =
	| { status: "ok"; response: FetchResponse }
	| { status: "queued"; taskId: string; error: Error }
	| { status: "error"; error: Error };

/**
 * The surface a crawl loop talks to: one shared middleware, the resume point
 * and failed-task stores, run bookkeeping and the background retry scheduler.
 */
export class CrawlSession {
	readonly middleware: FetchMiddleware;
	readonly checkpoints: CheckpointStore;
	readonly failedTasks: FailedTaskQueue;
	readonly runs: CollectionStateStore;
	readonly scheduler: RetryScheduler;

	constructor(config: CrawlSessionConfig, deps: CrawlSessionDeps = {}) {
		const now = deps.now ?? Date.now;
		this.middleware = new FetchMiddleware(config.middleware, {
			transport: deps.transport,
			now,
			random: deps.random,
		});
		this.checkpoints = new CheckpointStore(config.stateDir, now);
		this.failedTasks = new FailedTaskQueue(config.stateDir, config.scheduler, now);
		this.runs = new CollectionStateStore(config.stateDir, now, deps.newRunId);
		this.scheduler = new RetryScheduler(this.failedTasks, this.middleware, config.scheduler);
	}

	request(method: string, url: string, options?: RequestOptions): Promise<FetchResponse> {
		return this.middleware.request(method, url, options);
	}

	getStats(): Readonly<StatsSnapshot> {
		return this.middleware.getStats();
	}

	saveCheckpoint(
		taskType: string,
		currentPage: number,
		totalProcessed: number,
		metadata?: JsonRecord,
		position?: ResumePosition,
	): Promise<ResumePoint> {
		return this.checkpoints.save(taskType, currentPage, totalProcessed, metadata, position);
	}

	loadCheckpoint(taskType: string): Promise<ResumePoint | undefined> {
		return this.checkpoints.load(taskType);
	}

	addFailedTask(
		taskType: string,
		target: string,
		errorMessage: string,
		metadata?: JsonRecord,
	): Promise<string> {
		return this.failedTasks.add(taskType, target, errorMessage, metadata);
	}

	dueTasks(): Promise<FailedTask[]> {
		return this.failedTasks.dueTasks();
	}

	listFailedTasks(status?: FailedTaskStatus): Promise<FailedTask[]> {
		return this.failedTasks.list(status);
	}

	requeueFailedTask(taskId: string): Promise<FailedTask> {
		return this.failedTasks.requeue(taskId);
	}

	registerRetryHandler(taskType: string, handler: RetryHandler): void {
		this.scheduler.registerHandler(taskType, handler);
	}

	startRetryScheduler(): void {
		this.scheduler.start();
	}

	stopRetryScheduler(): Promise<void> {
		return this.scheduler.stop();
	}

	runRetryScan(): Promise<ScanResult> {
		return this.scheduler.runOnce();
	}

	/**
	 * Fetches `url`; when the request fails with something a later retry could
	 * fix (retries exhausted, the circuit open or the request timed out),
	 * records the target as a failed task instead of throwing. Client errors
	 * and caller aborts come back as plain errors.
	 */
	async fetchOrEnqueue(
		taskType: string,
		method: string,
		url: string,
		options?: RequestOptions,
	): Promise<FetchOutcome> {
		try {
			return { status: "ok", response: await this.request(method, url, options) };
		} catch (err) {
			const error = err instanceof Error ? err : new Error(describeError(err));
			// A cancellation the caller did not ask for is the whole-request timeout.
			const timedOut = error instanceof TaskCancelledError && !options?.signal?.aborted;
			if (!(isRetriable(error) || error instanceof CircuitOpenError || timedOut)) {
				return { status: "error", error };
			}
			const taskId = await this.addFailedTask(
				taskType,
				url,
				error.message,
				replayMetadata(method, options),
			);
			logger.warn("[SESSION] queued for retry", { taskId, url, error: error.message });
			return { status: "queued", taskId, error };
		}
	}

	startRun(taskType: string, totalItems?: number): Promise<CollectionState> {
		return this.runs.start(taskType, totalItems);
	}

	recordProgress(runId: string, delta: ProgressDelta): Promise<CollectionState> {
		return this.runs.recordProgress(runId, delta);
	}

	finishRun(runId: string, status: Exclude<RunStatus, "RUNNING">): Promise<CollectionState> {
		return this.runs.finish(runId, status);
	}

	getRun(runId: string): Promise<CollectionState | undefined> {
		return this.runs.get(runId);
	}

	async close(): Promise<void> {
		await this.scheduler.stop();
		await this.middleware.close();
	}
}
