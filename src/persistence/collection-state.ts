import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import { logger } from "../logger";
import { type Clock, type CollectionState, RUN_STATUSES, type RunStatus } from "../types";
import { JsonFile } from "./atomic-file";

const CollectionStateSchema = z.object({
	runId: z.string(),
	taskType: z.string(),
	status: z.enum(RUN_STATUSES),
	startedAt: z.string(),
	updatedAt: z.string(),
	totalItems: z.number().int().nonnegative(),
	processedItems: z.number().int().nonnegative(),
	failedItems: z.number().int().nonnegative(),
});

const CollectionStateFileSchema = z.record(CollectionStateSchema);

export const COLLECTION_STATE_FILE = "collection_state.json";

export interface ProgressDelta {
	processed?: number;
	failed?: number;
	/** Replaces the expected total when the source reports one. */
	totalItems?: number;
}

export class UnknownRunError extends Error {
	constructor(public readonly runId: string) {
		super(`Unknown collection run: ${runId}`);
		this.name = "UnknownRunError";
	}
}

/** Per-run progress counters, keyed by run id in `collection_state.json`. */
export class CollectionStateStore {
	private readonly file: JsonFile<typeof CollectionStateFileSchema>;

	constructor(
		stateDir: string,
		private readonly now: Clock = Date.now,
		private readonly newId: () => string = randomUUID,
	) {
		this.file = new JsonFile(join(stateDir, COLLECTION_STATE_FILE), CollectionStateFileSchema, () => ({}));
	}

	async start(taskType: string, totalItems = 0): Promise<CollectionState> {
		const runId = this.newId();
		return this.file.update((runs) => {
			const stamp = new Date(this.now()).toISOString();
			const run: CollectionState = {
				runId,
				taskType,
				status: "RUNNING",
				startedAt: stamp,
				updatedAt: stamp,
				totalItems,
				processedItems: 0,
				failedItems: 0,
			};
			runs[runId] = run;
			logger.info("[RUN] started", { runId, taskType });
			return { ...run };
		});
	}

	async recordProgress(runId: string, delta: ProgressDelta): Promise<CollectionState> {
		return this.change(runId, (run) => {
			run.processedItems += Math.max(0, delta.processed ?? 0);
			run.failedItems += Math.max(0, delta.failed ?? 0);
			if (delta.totalItems !== undefined) run.totalItems = Math.max(0, delta.totalItems);
		});
	}

	async finish(runId: string, status: Exclude<RunStatus, "RUNNING">): Promise<CollectionState> {
		return this.change(runId, (run) => {
			run.status = status;
			logger.info("[RUN] finished", {
				runId,
				status,
				processed: run.processedItems,
				failed: run.failedItems,
			});
		});
	}

	async get(runId: string): Promise<CollectionState | undefined> {
		const runs = await this.file.read();
		return runs[runId];
	}

	async list(taskType?: string): Promise<CollectionState[]> {
		const runs = Object.values(await this.file.read());
		return taskType === undefined ? runs : runs.filter((r) => r.taskType === taskType);
	}

	private change(runId: string, fn: (run: CollectionState) => void): Promise<CollectionState> {
		return this.file.update((runs) => {
			const run = runs[runId];
			if (!run) throw new UnknownRunError(runId);
			fn(run);
			run.updatedAt = new Date(this.now()).toISOString();
			return { ...run };
		});
	}
}
