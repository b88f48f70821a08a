import type { IKVStore } from "../domain/kv-store.js";

/**
 * What one execution left behind on a homeserver.
 */
export type UsersEntry = {
	executionId: number;
	homeserverUrl: string;
	/** Users brought up so far. */
	users: number;
	friendships: number;
	/** ISO timestamp of the last update. */
	updatedAt: string;
};

/**
 * Keeps per-execution user counters across runs, so later runs can tell
 * how many accounts earlier ones created on a server.
 */
export class UsersStore {
	private static readonly ENTRY_PREFIX = "users:";
	private static readonly MASTER_LIST_KEY = "users:master-list";

	constructor(private readonly kvstore: IKVStore) {}

	/**
	 * Creates or replaces the entry of `entry.executionId`.
	 */
	async record(entry: UsersEntry): Promise<void> {
		await this.kvstore.set(this.getEntryKey(entry.executionId), JSON.stringify(entry));
		await this.addToMasterList(entry.executionId);
	}

	/**
	 * @returns The entry, or null when missing or unreadable.
	 */
	async get(executionId: number): Promise<UsersEntry | null> {
		const raw = await this.kvstore.get(this.getEntryKey(executionId));
		if (!raw) return null;
		const data = parseJson(raw);
		return isUsersEntry(data) ? data : null;
	}

	async list(): Promise<UsersEntry[]> {
		const entries: UsersEntry[] = [];
		for (const id of await this.getMasterList()) {
			const entry = await this.get(id);
			if (entry) entries.push(entry);
		}
		return entries;
	}

	/**
	 * Users created on `homeserverUrl` by every recorded execution.
	 */
	async totalUsers(homeserverUrl: string): Promise<number> {
		const entries = await this.list();
		return entries.filter((entry) => entry.homeserverUrl === homeserverUrl).reduce((sum, entry) => sum + entry.users, 0);
	}

	async delete(executionId: number): Promise<void> {
		await this.kvstore.delete(this.getEntryKey(executionId));
		const list = await this.getMasterList();
		await this.kvstore.set(UsersStore.MASTER_LIST_KEY, JSON.stringify(list.filter((id) => id !== executionId)));
	}

	private getEntryKey(executionId: number): string {
		return `${UsersStore.ENTRY_PREFIX}${executionId}`;
	}

	private async getMasterList(): Promise<number[]> {
		const raw = await this.kvstore.get(UsersStore.MASTER_LIST_KEY);
		if (!raw) return [];
		const data = parseJson(raw);
		return Array.isArray(data) ? data.filter((id): id is number => typeof id === "number") : [];
	}

	private async addToMasterList(executionId: number): Promise<void> {
		const list = await this.getMasterList();
		if (!list.includes(executionId)) {
			list.push(executionId);
			await this.kvstore.set(UsersStore.MASTER_LIST_KEY, JSON.stringify(list));
		}
	}
}

function parseJson(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}

function isUsersEntry(value: unknown): value is UsersEntry {
	if (typeof value !== "object" || value === null) return false;
	const entry: Record<string, unknown> = { ...value };
	return (
		typeof entry.executionId === "number" &&
		typeof entry.homeserverUrl === "string" &&
		typeof entry.users === "number" &&
		typeof entry.friendships === "number" &&
		typeof entry.updatedAt === "string"
	);
}
