import pMap from "p-map";
import { type Friendship, friendshipKey, targetFriendships, toFriendship } from "../domain/friendship.js";
import { type ILogger, noopLogger } from "../domain/logger.js";
import { defaultRng, randomIndex, type Rng, shuffle } from "../utils/random.js";

/** Share of all possible pairs above which missing pairs are enumerated rather than sampled. */
export const DEFAULT_ENUMERATION_THRESHOLD = 0.75;

export interface FriendshipGraphOptions {
	/** Maximum number of connect operations in flight. */
	concurrency: number;
	enumerationThreshold?: number;
	rng?: Rng;
	logger?: ILogger;
}

export interface ExtendResult {
	target: number;
	added: number;
	failed: number;
}

/** Materializes a friendship, typically by making both users share a room. */
export type ConnectFn<U> = (first: U, second: U) => Promise<boolean>;

export type ProgressFn = (done: number, total: number) => void;

/**
 * The set of friendships between simulated users. Only `extend` mutates it,
 * and a pair is only inserted once connecting it succeeded.
 */
export class FriendshipGraph<U extends { readonly id: string }> {
	private readonly friendships = new Map<string, Friendship>();
	private readonly concurrency: number;
	private readonly enumerationThreshold: number;
	private readonly rng: Rng;
	private readonly logger: ILogger;

	constructor(options: FriendshipGraphOptions) {
		this.concurrency = Math.max(1, options.concurrency);
		this.enumerationThreshold = options.enumerationThreshold ?? DEFAULT_ENUMERATION_THRESHOLD;
		this.rng = options.rng ?? defaultRng;
		this.logger = options.logger ?? noopLogger;
	}

	get size(): number {
		return this.friendships.size;
	}

	has(a: string, b: string): boolean {
		return a !== b && this.friendships.has(friendshipKey(toFriendship(a, b)));
	}

	/** All friendships in canonical order. */
	list(): Friendship[] {
		return [...this.friendships.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, friendship]) => friendship);
	}

	/**
	 * Adds random new friendships until the graph holds `ceil(ratio * n(n-1)/2)` pairs
	 * for the `n` given users. Pairs whose connection fails are left out.
	 *
	 * @throws RangeError if the ratio is outside (0, 1] or two users share an id.
	 */
	async extend(users: readonly U[], ratio: number, connect: ConnectFn<U>, onProgress?: ProgressFn): Promise<ExtendResult> {
		if (!(ratio > 0 && ratio <= 1)) throw new RangeError(`Friendship ratio must be in (0, 1], got ${ratio}`);
		const ids = new Set(users.map((user) => user.id));
		if (ids.size !== users.length) throw new RangeError(`Users must have distinct ids, got ${users.length - ids.size} repeated`);

		const target = targetFriendships(users.length, ratio);
		const needed = target - this.friendships.size;
		if (needed <= 0) return { target, added: 0, failed: 0 };

		const maxPairs = (users.length * (users.length - 1)) / 2;
		const pairs =
			target / maxPairs > this.enumerationThreshold ? this.enumerateMissing(users, needed) : this.sampleMissing(users, needed);
		this.logger.debug(`Connecting ${pairs.length} new pair(s) towards ${target} friendships`);

		let done = 0;
		let added = 0;
		onProgress?.(done, pairs.length);
		await pMap(
			pairs,
			async ([first, second]) => {
				if (await connect(first, second)) {
					const friendship = toFriendship(first.id, second.id);
					this.friendships.set(friendshipKey(friendship), friendship);
					added++;
				} else {
					this.logger.warn(`Could not connect ${first.id} and ${second.id}`);
				}
				onProgress?.(++done, pairs.length);
			},
			{ concurrency: this.concurrency },
		);

		return { target, added, failed: pairs.length - added };
	}

	/**
	 * Rejection sampling: two independent uniform draws until the pair is new.
	 */
	private sampleMissing(users: readonly U[], needed: number): Array<[U, U]> {
		const drawn = new Set<string>();
		const pairs: Array<[U, U]> = [];
		while (pairs.length < needed) {
			const first = users[randomIndex(users.length, this.rng)];
			const second = users[randomIndex(users.length, this.rng)];
			if (first.id === second.id) continue;

			const key = friendshipKey(toFriendship(first.id, second.id));
			if (this.friendships.has(key) || drawn.has(key)) continue;

			drawn.add(key);
			pairs.push([first, second]);
		}
		return pairs;
	}

	/**
	 * Lists every missing pair and keeps a random `needed` of them.
	 */
	private enumerateMissing(users: readonly U[], needed: number): Array<[U, U]> {
		const missing: Array<[U, U]> = [];
		for (let i = 0; i < users.length; i++) {
			for (let j = i + 1; j < users.length; j++) {
				const first = users[i];
				const second = users[j];
				if (!this.friendships.has(friendshipKey(toFriendship(first.id, second.id)))) missing.push([first, second]);
			}
		}
		return shuffle(missing, this.rng).slice(0, needed);
	}
}
