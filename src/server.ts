import express, { type NextFunction, type Request, type Response } from "express";
import { describeError, logger } from "./logger";
import { TaskStateError, UnknownTaskError } from "./persistence/failed-task-queue";
import type { CrawlSession } from "./session";
import { FAILED_TASK_STATUSES, type FailedTaskStatus } from "./types";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function isFailedTaskStatus(value: unknown): value is FailedTaskStatus {
	return typeof value === "string" && FAILED_TASK_STATUSES.some((s) => s === value);
}

// Express 4 does not forward rejected promises to the error handler.
function route(handler: AsyncHandler) {
	return (req: Request, res: Response, next: NextFunction) => {
		handler(req, res).catch(next);
	};
}

/** Operator-facing status endpoints over a running crawl session. */
export function createApp(session: CrawlSession) {
	const app = express();
	app.use(express.json());

	app.get("/health", (_req: Request, res: Response) => {
		res.status(200).json({ status: "ok" });
	});

	app.get("/stats", (_req: Request, res: Response) => {
		res.status(200).json(session.getStats());
	});

	app.get(
		"/failed-tasks",
		route(async (req, res) => {
			const { status } = req.query;
			if (status !== undefined && !isFailedTaskStatus(status)) {
				res.status(400).json({
					error: `Unknown status. Expected one of ${FAILED_TASK_STATUSES.join(", ")}`,
				});
				return;
			}
			res.status(200).json(await session.listFailedTasks(status));
		}),
	);

	app.post(
		"/failed-tasks/:taskId/requeue",
		route(async (req, res) => {
			try {
				res.status(200).json(await session.requeueFailedTask(req.params.taskId));
			} catch (err) {
				if (err instanceof UnknownTaskError) {
					res.status(404).json({ error: err.message });
				} else if (err instanceof TaskStateError) {
					res.status(409).json({ error: err.message });
				} else {
					throw err;
				}
			}
		}),
	);

	app.get(
		"/checkpoints/:taskType",
		route(async (req, res) => {
			const point = await session.loadCheckpoint(req.params.taskType);
			if (!point) {
				res.status(404).json({ error: `No checkpoint for ${req.params.taskType}` });
				return;
			}
			res.status(200).json(point);
		}),
	);

	app.get(
		"/runs/:runId",
		route(async (req, res) => {
			const run = await session.getRun(req.params.runId);
			if (!run) {
				res.status(404).json({ error: `Unknown run ${req.params.runId}` });
				return;
			}
			res.status(200).json(run);
		}),
	);

	app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
		logger.error("[SERVER] request failed", { error: describeError(err) });
		if (!res.headersSent) {
			res.status(500).json({ error: "Internal server error" });
		}
	});

	return app;
}
