import { join } from "node:path";
import { z } from "zod";
import { logger } from "../logger";
import { InvalidCheckpointError } from "../resilience/errors";
import type { Clock, JsonRecord, ResumePoint } from "../types";
import { JsonFile } from "./atomic-file";

const ResumePointSchema = z.object({
	taskType: z.string(),
	currentPage: z.number().int().nonnegative(),
	totalProcessed: z.number().int().nonnegative(),
	lastCursor: z.string().nullable().default(null),
	lastSlug: z.string().nullable().default(null),
	metadata: z.record(z.unknown()).default({}),
	updatedAt: z.string(),
});

const ResumePointsFileSchema = z.record(ResumePointSchema);

export const RESUME_POINTS_FILE = "resume_points.json";

export interface ResumePosition {
	lastCursor?: string | null;
	lastSlug?: string | null;
}

function assertCount(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new InvalidCheckpointError(`${name} must be a non-negative integer, got ${value}`);
	}
}

/** Resume points keyed by task type, persisted in `resume_points.json`. */
export class CheckpointStore {
	private readonly file: JsonFile<typeof ResumePointsFileSchema>;

	constructor(
		stateDir: string,
		private readonly now: Clock = Date.now,
	) {
		this.file = new JsonFile(join(stateDir, RESUME_POINTS_FILE), ResumePointsFileSchema, () => ({}));
	}

	async save(
		taskType: string,
		currentPage: number,
		totalProcessed: number,
		metadata: JsonRecord = {},
		position: ResumePosition = {},
	): Promise<ResumePoint> {
		assertCount("currentPage", currentPage);
		assertCount("totalProcessed", totalProcessed);

		return this.file.update((points) => {
			const previous = points[taskType];
			if (previous && totalProcessed < previous.totalProcessed) {
				logger.warn("[CHECKPOINT] processed count went backwards", {
					taskType,
					previous: previous.totalProcessed,
					next: totalProcessed,
				});
			}
			const point: ResumePoint = {
				taskType,
				currentPage,
				totalProcessed,
				lastCursor: position.lastCursor ?? null,
				lastSlug: position.lastSlug ?? null,
				metadata: structuredClone(metadata),
				updatedAt: new Date(this.now()).toISOString(),
			};
			points[taskType] = point;
			logger.debug("[CHECKPOINT] saved", { taskType, currentPage, totalProcessed });
			return structuredClone(point);
		});
	}

	async load(taskType: string): Promise<ResumePoint | undefined> {
		const points = await this.file.read();
		return points[taskType];
	}

	async list(): Promise<ResumePoint[]> {
		return Object.values(await this.file.read());
	}

	/** Returns whether a resume point existed. */
	async clear(taskType: string): Promise<boolean> {
		return this.file.update((points) => {
			if (!(taskType in points)) return false;
			delete points[taskType];
			return true;
		});
	}
}
