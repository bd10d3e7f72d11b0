import { createHash } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import {
	type RetrySchedulerConfig,
	type RetrySchedulerConfigInput,
	RetrySchedulerConfigSchema,
	validateConfig,
} from "../config";
import { logger } from "../logger";
import {
	type Clock,
	FAILED_TASK_STATUSES,
	type FailedTask,
	type FailedTaskStatus,
	type JsonRecord,
} from "../types";
import { JsonFile } from "./atomic-file";

const FailedTaskSchema = z.object({
	taskId: z.string(),
	taskType: z.string(),
	target: z.string(),
	errorMessage: z.string(),
	attemptCount: z.number().int().nonnegative(),
	nextRetryAt: z.string(),
	createdAt: z.string(),
	updatedAt: z.string(),
	status: z.enum(FAILED_TASK_STATUSES),
	metadata: z.record(z.unknown()).default({}),
	resolvedAt: z.string().nullable().default(null),
});

const FailedTasksFileSchema = z.array(FailedTaskSchema);

export const FAILED_TASKS_FILE = "failed_tasks.json";

export type QueueConfig = Pick<
	RetrySchedulerConfig,
	"baseDelayMs" | "backoffFactor" | "maxDelayMs" | "maxAttempts" | "resolvedRetentionMs"
>;

/** `<taskType>_<first 8 hex chars of md5(target)>`; stable across restarts. */
export function failedTaskId(taskType: string, target: string): string {
	return `${taskType}_${createHash("md5").update(target).digest("hex").slice(0, 8)}`;
}

function isLive(task: FailedTask): boolean {
	return task.status === "PENDING" || task.status === "RETRYING";
}

export class UnknownTaskError extends Error {
	constructor(public readonly taskId: string) {
		super(`Unknown failed task: ${taskId}`);
		this.name = "UnknownTaskError";
	}
}

export class TaskStateError extends Error {
	constructor(
		public readonly taskId: string,
		public readonly status: FailedTaskStatus,
		action: string,
	) {
		super(`Cannot ${action} task ${taskId} in status ${status}`);
		this.name = "TaskStateError";
	}
}

/**
 * Persistent queue of work items that exhausted their inline retries. Tasks
 * move PENDING -> RETRYING -> (RESOLVED | EXHAUSTED); resolved tasks stay in
 * the file until pruned.
 */
export class FailedTaskQueue {
	readonly config: QueueConfig;
	private readonly file: JsonFile<typeof FailedTasksFileSchema>;

	constructor(
		stateDir: string,
		config: RetrySchedulerConfigInput = {},
		private readonly now: Clock = Date.now,
	) {
		this.config = validateConfig(RetrySchedulerConfigSchema, config, "retry scheduler");
		this.file = new JsonFile(join(stateDir, FAILED_TASKS_FILE), FailedTasksFileSchema, () => []);
	}

	/** Delay before the retry that follows `attemptCount` failed retries. */
	backoffFor(attemptCount: number): number {
		const { baseDelayMs, backoffFactor, maxDelayMs } = this.config;
		return Math.min(baseDelayMs * backoffFactor ** Math.max(0, attemptCount - 1), maxDelayMs);
	}

	async add(
		taskType: string,
		target: string,
		errorMessage: string,
		metadata: JsonRecord = {},
	): Promise<string> {
		const taskId = failedTaskId(taskType, target);
		await this.file.update((tasks) => {
			const at = this.now();
			const stamp = new Date(at).toISOString();
			const existing = tasks.find((t) => t.taskId === taskId);

			if (existing && isLive(existing)) {
				existing.errorMessage = errorMessage;
				existing.metadata = { ...existing.metadata, ...structuredClone(metadata) };
				existing.updatedAt = stamp;
				logger.debug("[QUEUE] refreshed live task", { taskId });
				return;
			}

			const task: FailedTask = {
				taskId,
				taskType,
				target,
				errorMessage,
				attemptCount: 0,
				nextRetryAt: new Date(at + this.config.baseDelayMs).toISOString(),
				createdAt: stamp,
				updatedAt: stamp,
				status: "PENDING",
				metadata: structuredClone(metadata),
				resolvedAt: null,
			};
			if (existing) {
				tasks.splice(tasks.indexOf(existing), 1, task);
				logger.info("[QUEUE] reopened task", { taskId, previous: existing.status });
			} else {
				tasks.push(task);
				logger.info("[QUEUE] added failed task", { taskId, taskType, target });
			}
		});
		return taskId;
	}

	/** Live tasks whose retry time has come, earliest first. */
	async dueTasks(): Promise<FailedTask[]> {
		const now = this.now();
		const tasks = await this.file.read();
		return tasks
			.filter((t) => isLive(t) && Date.parse(t.nextRetryAt) <= now)
			.sort((a, b) => Date.parse(a.nextRetryAt) - Date.parse(b.nextRetryAt));
	}

	async list(status?: FailedTaskStatus): Promise<FailedTask[]> {
		const tasks = await this.file.read();
		return status === undefined ? tasks : tasks.filter((t) => t.status === status);
	}

	async get(taskId: string): Promise<FailedTask | undefined> {
		const tasks = await this.file.read();
		return tasks.find((t) => t.taskId === taskId);
	}

	async markResolved(taskId: string): Promise<FailedTask> {
		return this.mutate(taskId, "resolve", (task, stamp) => {
			task.status = "RESOLVED";
			task.resolvedAt = stamp;
			logger.info("[QUEUE] resolved", { taskId });
		});
	}

	async markFailed(taskId: string, errorMessage: string): Promise<FailedTask> {
		return this.mutate(taskId, "fail", (task, _stamp, at) => {
			task.attemptCount += 1;
			task.errorMessage = errorMessage;
			if (task.attemptCount > this.config.maxAttempts) {
				task.status = "EXHAUSTED";
				logger.warn("[QUEUE] retries exhausted", { taskId, attempts: task.attemptCount });
				return;
			}
			task.status = "RETRYING";
			task.nextRetryAt = new Date(at + this.backoffFor(task.attemptCount)).toISOString();
		});
	}

	/**
	 * Pushes a live task's next retry back by `delayMs` without counting an
	 * attempt; used when the target refused the call before any network work.
	 */
	async defer(taskId: string, delayMs: number, errorMessage?: string): Promise<FailedTask> {
		return this.mutate(taskId, "defer", (task, _stamp, at) => {
			if (errorMessage !== undefined) task.errorMessage = errorMessage;
			task.nextRetryAt = new Date(at + Math.max(0, delayMs)).toISOString();
		});
	}

	/** Operator action: gives an EXHAUSTED task a fresh set of attempts. */
	async requeue(taskId: string): Promise<FailedTask> {
		return this.mutate(taskId, "requeue", (task, stamp) => {
			if (task.status !== "EXHAUSTED") {
				throw new TaskStateError(taskId, task.status, "requeue");
			}
			task.status = "PENDING";
			task.attemptCount = 0;
			task.nextRetryAt = stamp;
			logger.info("[QUEUE] requeued", { taskId });
		});
	}

	/** Drops resolved tasks older than the retention window; returns how many. */
	async pruneResolved(): Promise<number> {
		const cutoff = this.now() - this.config.resolvedRetentionMs;
		return this.file.update((tasks) => {
			const before = tasks.length;
			const kept = tasks.filter(
				(t) => t.status !== "RESOLVED" || t.resolvedAt === null || Date.parse(t.resolvedAt) > cutoff,
			);
			tasks.splice(0, tasks.length, ...kept);
			const pruned = before - kept.length;
			if (pruned > 0) logger.info("[QUEUE] pruned resolved tasks", { pruned });
			return pruned;
		});
	}

	private mutate(
		taskId: string,
		action: string,
		fn: (task: FailedTask, stamp: string, at: number) => void,
	): Promise<FailedTask> {
		return this.file.update((tasks) => {
			const task = tasks.find((t) => t.taskId === taskId);
			if (!task) throw new UnknownTaskError(taskId);
			// Only live tasks take outcomes; requeue does its own status check.
			if (action !== "requeue" && !isLive(task)) {
				throw new TaskStateError(taskId, task.status, action);
			}
			const at = this.now();
			const stamp = new Date(at).toISOString();
			fn(task, stamp, at);
			task.updatedAt = stamp;
			return structuredClone(task);
		});
	}
}
