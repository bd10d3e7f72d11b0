import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { Mutex } from "async-mutex";
import type { z } from "zod";
import { describeError, logger } from "../logger";
import { PersistenceError } from "../resilience/errors";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * A JSON document on disk, validated by a zod schema on every read. Writers
 * are serialised through a mutex and replace the file by temp-file rename, so
 * a reader never observes a partial write.
 */
export class JsonFile<S extends z.ZodTypeAny> {
	private readonly mutex = new Mutex();

	constructor(
		readonly path: string,
		private readonly schema: S,
		private readonly empty: () => z.output<S>,
	) {}

	/** Current contents; the empty value when the file does not exist yet. */
	async read(): Promise<z.output<S>> {
		let raw: string;
		try {
			raw = await readFile(this.path, "utf-8");
		} catch (err) {
			if (isMissingFile(err)) return this.empty();
			throw new PersistenceError(this.path, "Failed to read state file", err);
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (err) {
			throw new PersistenceError(this.path, "State file is not valid JSON", err);
		}
		const result = this.schema.safeParse(json);
		if (!result.success) {
			throw new PersistenceError(
				this.path,
				`State file failed validation: ${result.error.issues[0]?.message ?? "unknown issue"}`,
			);
		}
		return result.data;
	}

	/**
	 * Reads the document, lets `fn` mutate it, and writes it back. Nothing is
	 * written when `fn` throws.
	 */
	update<R>(fn: (data: z.output<S>) => R): Promise<R> {
		return this.mutex.runExclusive(async () => {
			const data = await this.read();
			const result = fn(data);
			await this.write(data);
			return result;
		});
	}

	private async write(data: z.output<S>): Promise<void> {
		const tmp = `${this.path}.${randomUUID()}.tmp`;
		try {
			await mkdir(dirname(this.path), { recursive: true });
			const handle = await open(tmp, "w");
			try {
				await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, "utf-8");
				await handle.sync();
			} finally {
				await handle.close();
			}
			await rename(tmp, this.path);
		} catch (err) {
			await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
				logger.warn("[STATE] could not remove temp file", { tmp, error: describeError(cleanupErr) });
			});
			throw new PersistenceError(this.path, "Failed to write state file", err);
		}
	}
}
