export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

/**
 * Milliseconds elapsed since `start` (a `performance.now()` reading).
 */
export function elapsedSince(start: number): number {
	return performance.now() - start;
}
