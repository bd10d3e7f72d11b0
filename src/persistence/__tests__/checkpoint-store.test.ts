import { access } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, manualClock, removeDir } from "../../__tests__/helpers.js";
import { InvalidCheckpointError } from "../../resilience/errors.js";
import { CheckpointStore, RESUME_POINTS_FILE } from "../checkpoint-store.js";

let dir: string;

beforeEach(async () => {
	dir = await makeTempDir();
});

afterEach(async () => {
	await removeDir(dir);
});

describe("CheckpointStore", () => {
	it("saves and loads a resume point", async () => {
		const clock = manualClock();
		const store = new CheckpointStore(dir, clock.now);

		const saved = await store.save("listings", 4, 120, { sort: "newest" }, { lastCursor: "c-40" });
		expect(saved).toEqual({
			taskType: "listings",
			currentPage: 4,
			totalProcessed: 120,
			lastCursor: "c-40",
			lastSlug: null,
			metadata: { sort: "newest" },
			updatedAt: "2024-01-01T00:00:00.000Z",
		});
		expect(await store.load("listings")).toEqual(saved);
		expect(await store.load("details")).toBeUndefined();
	});

	it("returns exactly what was saved", async () => {
		const store = new CheckpointStore(dir);
		await store.save("LIST_COLLECTION", 5, 120, {});
		const point = await store.load("LIST_COLLECTION");
		expect(point?.currentPage).toBe(5);
		expect(point?.totalProcessed).toBe(120);
	});

	it("survives a restart", async () => {
		await new CheckpointStore(dir).save("details", 9, 300, {}, { lastSlug: "item-300" });
		const reloaded = await new CheckpointStore(dir).load("details");
		expect(reloaded?.currentPage).toBe(9);
		expect(reloaded?.lastSlug).toBe("item-300");
	});

	it("overwrites the previous point for the same task type", async () => {
		const clock = manualClock();
		const store = new CheckpointStore(dir, clock.now);
		await store.save("listings", 1, 10);
		clock.advance(60_000);
		await store.save("listings", 2, 20);

		const point = await store.load("listings");
		expect(point?.currentPage).toBe(2);
		expect(point?.updatedAt).toBe("2024-01-01T00:01:00.000Z");
		expect(await store.list()).toHaveLength(1);
	});

	it("accepts a lower processed count", async () => {
		const store = new CheckpointStore(dir);
		await store.save("listings", 5, 50);
		await store.save("listings", 0, 0);
		expect((await store.load("listings"))?.totalProcessed).toBe(0);
	});

	it("rejects negative or fractional values before writing", async () => {
		const store = new CheckpointStore(dir);
		await expect(store.save("listings", -1, 0)).rejects.toBeInstanceOf(InvalidCheckpointError);
		await expect(store.save("listings", 1, 2.5)).rejects.toBeInstanceOf(InvalidCheckpointError);
		await expect(access(join(dir, RESUME_POINTS_FILE))).rejects.toThrow();
	});

	it("stores a copy of the metadata", async () => {
		const store = new CheckpointStore(dir);
		const metadata = { filters: ["a"] };
		await store.save("listings", 1, 1, metadata);
		metadata.filters.push("b");
		expect((await store.load("listings"))?.metadata).toEqual({ filters: ["a"] });
	});

	it("lists and clears resume points", async () => {
		const store = new CheckpointStore(dir);
		await store.save("listings", 1, 1);
		await store.save("details", 2, 2);
		expect((await store.list()).map((p) => p.taskType).sort()).toEqual(["details", "listings"]);

		expect(await store.clear("listings")).toBe(true);
		expect(await store.clear("listings")).toBe(false);
		expect(await store.load("listings")).toBeUndefined();
	});
});
