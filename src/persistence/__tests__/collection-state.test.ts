import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, manualClock, removeDir } from "../../__tests__/helpers.js";
import { CollectionStateStore, UnknownRunError } from "../collection-state.js";

let dir: string;

beforeEach(async () => {
	dir = await makeTempDir();
});

afterEach(async () => {
	await removeDir(dir);
});

function store() {
	const clock = manualClock();
	let n = 0;
	const runs = new CollectionStateStore(dir, clock.now, () => `run-${++n}`);
	return { runs, clock };
}

describe("CollectionStateStore", () => {
	it("starts a run with zeroed counters", async () => {
		const { runs } = store();
		expect(await runs.start("listings", 500)).toEqual({
			runId: "run-1",
			taskType: "listings",
			status: "RUNNING",
			startedAt: "2024-01-01T00:00:00.000Z",
			updatedAt: "2024-01-01T00:00:00.000Z",
			totalItems: 500,
			processedItems: 0,
			failedItems: 0,
		});
	});

	it("accumulates progress", async () => {
		const { runs, clock } = store();
		const { runId } = await runs.start("listings");
		await runs.recordProgress(runId, { processed: 20, failed: 1 });
		clock.advance(1_000);
		const state = await runs.recordProgress(runId, { processed: 5, totalItems: 90 });

		expect(state.processedItems).toBe(25);
		expect(state.failedItems).toBe(1);
		expect(state.totalItems).toBe(90);
		expect(state.updatedAt).toBe("2024-01-01T00:00:01.000Z");
	});

	it("finishes a run with a final status", async () => {
		const { runs } = store();
		const { runId } = await runs.start("details");
		await runs.finish(runId, "COMPLETED");
		expect((await runs.get(runId))?.status).toBe("COMPLETED");
	});

	it("rejects unknown run ids", async () => {
		const { runs } = store();
		await expect(runs.recordProgress("run-404", { processed: 1 })).rejects.toBeInstanceOf(
			UnknownRunError,
		);
		expect(await runs.get("run-404")).toBeUndefined();
	});

	it("lists runs, optionally by task type", async () => {
		const { runs } = store();
		await runs.start("listings");
		await runs.start("details");
		expect(await runs.list()).toHaveLength(2);
		expect((await runs.list("details")).map((r) => r.runId)).toEqual(["run-2"]);
	});
});
