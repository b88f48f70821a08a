/**
 * An unordered pair of user ids, stored in canonical order (`first < second`).
 */
export interface Friendship {
	readonly first: string;
	readonly second: string;
}

/**
 * Builds the canonical form of a pair. Throws on a self-pair.
 */
export function toFriendship(a: string, b: string): Friendship {
	if (a === b) throw new RangeError(`A user cannot befriend itself: ${a}`);
	return a < b ? { first: a, second: b } : { first: b, second: a };
}

export function friendshipKey(friendship: Friendship): string {
	return `${friendship.first}|${friendship.second}`;
}

/**
 * Number of friendships a population of `users` should hold for `ratio`.
 */
export function targetFriendships(users: number, ratio: number): number {
	if (users < 2) return 0;
	const maxFriendships = (users * (users - 1)) / 2;
	// 1e-9 absorbs float noise such as 0.7 * 10 = 7.000000000000001
	return Math.min(maxFriendships, Math.ceil(maxFriendships * ratio - 1e-9));
}
