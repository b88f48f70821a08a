/**
 * Source of uniform numbers in [0, 1). Injected so tests can be deterministic.
 */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Uniform integer in [0, max).
 */
export function randomIndex(max: number, rng: Rng = defaultRng): number {
	return Math.min(max - 1, Math.floor(rng() * max));
}

export function pickRandom<T>(items: readonly T[], rng: Rng = defaultRng): T | undefined {
	if (items.length === 0) return undefined;
	return items[randomIndex(items.length, rng)];
}

/**
 * Up to `count` distinct items, each equally likely (partial Fisher-Yates).
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, rng: Rng = defaultRng): T[] {
	const pool = [...items];
	const take = Math.max(0, Math.min(count, pool.length));
	for (let i = 0; i < take; i++) {
		const j = i + randomIndex(pool.length - i, rng);
		[pool[i], pool[j]] = [pool[j], pool[i]];
	}
	return pool.slice(0, take);
}

export function shuffle<T>(items: readonly T[], rng: Rng = defaultRng): T[] {
	return sampleWithoutReplacement(items, items.length, rng);
}

export function bernoulli(probability: number, rng: Rng = defaultRng): boolean {
	return rng() < probability;
}

const ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export function randomText(length = 16, rng: Rng = defaultRng): string {
	let text = "";
	for (let i = 0; i < length; i++) {
		text += ALPHABET[randomIndex(ALPHABET.length, rng)];
	}
	return text;
}
