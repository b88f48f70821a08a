import type { IKVStore } from "../domain/kv-store.js";

/**
 * Non-persistent store backed by a Map. Used by tests and by runs that keep no counters.
 */
export class InMemoryKVStore implements IKVStore {
	private readonly entries = new Map<string, string>();

	async get(key: string): Promise<string | null> {
		return this.entries.get(key) ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		this.entries.set(key, value);
	}

	async delete(key: string): Promise<void> {
		this.entries.delete(key);
	}

	/** Keys currently stored, in insertion order. */
	keys(): string[] {
		return [...this.entries.keys()];
	}
}
