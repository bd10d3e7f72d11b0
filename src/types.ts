/** Milliseconds since the epoch; injectable so time-driven behaviour is testable. */
export type Clock = () => number;

export type JsonRecord = Record<string, unknown>;

export interface ResumePoint {
	taskType: string;
	currentPage: number;
	totalProcessed: number;
	lastCursor: string | null;
	lastSlug: string | null;
	metadata: JsonRecord;
	updatedAt: string;
}

export const FAILED_TASK_STATUSES = ["PENDING", "RETRYING", "EXHAUSTED", "RESOLVED"] as const;
export type FailedTaskStatus = (typeof FAILED_TASK_STATUSES)[number];

export interface FailedTask {
	taskId: string;
	taskType: string;
	/** Opaque work-item identifier: a URL, page number or slug. */
	target: string;
	errorMessage: string;
	attemptCount: number;
	nextRetryAt: string;
	createdAt: string;
	updatedAt: string;
	status: FailedTaskStatus;
	metadata: JsonRecord;
	resolvedAt: string | null;
}

export const RUN_STATUSES = ["RUNNING", "COMPLETED", "FAILED", "STOPPED"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export interface CollectionState {
	runId: string;
	taskType: string;
	status: RunStatus;
	startedAt: string;
	updatedAt: string;
	totalItems: number;
	processedItems: number;
	failedItems: number;
}
