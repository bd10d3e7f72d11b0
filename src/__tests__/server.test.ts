import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createApp } from "../server.js";
import { CrawlSession } from "../session.js";
import { FakeTransport, makeTempDir, removeDir } from "./helpers.js";

let server: Server;
let baseUrl: string;
let dir: string;
let session: CrawlSession;
let exhaustedId: string;
let pendingId: string;
let runId: string;

beforeAll(async () => {
	dir = await makeTempDir();
	session = new CrawlSession(
		{
			stateDir: dir,
			middleware: {
				rateLimit: { maxRequestsPerSecond: 100, maxConcurrent: 2 },
				userAgents: { enabled: false },
			},
			scheduler: { maxAttempts: 0 },
		},
		{ transport: new FakeTransport() },
	);

	pendingId = await session.addFailedTask("listing", "page-1", "Server error: 503");
	exhaustedId = await session.addFailedTask("detail", "slug-9", "Server error: 500");
	await session.failedTasks.markFailed(exhaustedId, "Server error: 500");
	await session.saveCheckpoint("listing", 2, 40);
	runId = (await session.startRun("listing")).runId;

	const app = createApp(session);
	await new Promise<void>((resolve) => {
		server = app.listen(0, () => {
			const addr = server.address();
			if (addr && typeof addr === "object") {
				baseUrl = `http://localhost:${addr.port}`;
			}
			resolve();
		});
	});
});

afterAll(async () => {
	await new Promise<void>((resolve) => {
		server.close(() => resolve());
	});
	await session.close();
	await removeDir(dir);
});

describe("status server", () => {
	it("GET /health returns 200 with status ok", async () => {
		const res = await fetch(`${baseUrl}/health`);
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok" });
	});

	it("GET /stats returns the middleware snapshot", async () => {
		const res = await fetch(`${baseUrl}/stats`);
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({
			totalRequests: 0,
			circuitState: "CLOSED",
			proxies: { total: 0, excluded: [] },
		});
	});

	it("GET /failed-tasks filters by status", async () => {
		const all = await fetch(`${baseUrl}/failed-tasks`);
		expect(all.status).toBe(200);
		expect(await all.json()).toHaveLength(2);

		const exhausted = await fetch(`${baseUrl}/failed-tasks?status=EXHAUSTED`);
		expect(await exhausted.json()).toMatchObject([{ taskId: exhaustedId, status: "EXHAUSTED" }]);
	});

	it("GET /failed-tasks rejects an unknown status", async () => {
		const res = await fetch(`${baseUrl}/failed-tasks?status=LOST`);
		expect(res.status).toBe(400);
	});

	it("POST /failed-tasks/:id/requeue answers 404 and 409 where it cannot requeue", async () => {
		const missing = await fetch(`${baseUrl}/failed-tasks/nope/requeue`, { method: "POST" });
		expect(missing.status).toBe(404);

		const live = await fetch(`${baseUrl}/failed-tasks/${pendingId}/requeue`, { method: "POST" });
		expect(live.status).toBe(409);
	});

	it("POST /failed-tasks/:id/requeue revives an exhausted task", async () => {
		const res = await fetch(`${baseUrl}/failed-tasks/${exhaustedId}/requeue`, { method: "POST" });
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ taskId: exhaustedId, status: "PENDING", attemptCount: 0 });
	});

	it("GET /checkpoints/:taskType returns the resume point or 404", async () => {
		const found = await fetch(`${baseUrl}/checkpoints/listing`);
		expect(found.status).toBe(200);
		expect(await found.json()).toMatchObject({ taskType: "listing", currentPage: 2, totalProcessed: 40 });

		const missing = await fetch(`${baseUrl}/checkpoints/detail`);
		expect(missing.status).toBe(404);
	});

	it("GET /runs/:runId returns the run or 404", async () => {
		const found = await fetch(`${baseUrl}/runs/${runId}`);
		expect(found.status).toBe(200);
		expect(await found.json()).toMatchObject({ runId, status: "RUNNING" });

		const missing = await fetch(`${baseUrl}/runs/unknown`);
		expect(missing.status).toBe(404);
	});
});
