import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type IKVStore, type ILogger, noopLogger } from "@homeserver-loadgen/core";

/**
 * Key-value store persisted as one JSON object in a file, so counters survive between runs.
 * Writes go through a temporary file and a rename. A file that is not valid JSON
 * reads as empty and is replaced by the next write.
 */
export class FileKVStore implements IKVStore {
	private queue: Promise<unknown> = Promise.resolve();

	constructor(
		private readonly file: string,
		private readonly logger: ILogger = noopLogger,
	) {}

	async get(key: string): Promise<string | null> {
		const entries = await this.read();
		return entries[key] ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		await this.update((entries) => {
			entries[key] = value;
		});
	}

	async delete(key: string): Promise<void> {
		await this.update((entries) => {
			delete entries[key];
		});
	}

	private update(change: (entries: Record<string, string>) => void): Promise<void> {
		const next = this.queue.then(async () => {
			const entries = await this.read();
			change(entries);
			await fs.mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
			const temp = `${this.file}.tmp`;
			await fs.writeFile(temp, JSON.stringify(entries, null, 2));
			await fs.rename(temp, this.file);
		});
		this.queue = next.catch(() => undefined);
		return next;
	}

	private async read(): Promise<Record<string, string>> {
		let raw: string;
		try {
			raw = await fs.readFile(this.file, "utf-8");
		} catch (error) {
			if (isNotFound(error)) return {};
			throw error;
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (error) {
			this.logger.warn(`Ignoring unreadable ${this.file}: ${error instanceof Error ? error.message : String(error)}`);
			return {};
		}
		const entries: Record<string, string> = {};
		if (typeof data === "object" && data !== null && !Array.isArray(data)) {
			for (const [key, value] of Object.entries(data)) {
				if (typeof value === "string") entries[key] = value;
			}
		}
		return entries;
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
