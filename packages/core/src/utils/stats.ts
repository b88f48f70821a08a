import type { LatencyStats } from "../domain/report.js";

/**
 * Latency statistics for a series of measurements in milliseconds.
 * Returns null if the series is empty.
 */
export function calculateLatencyStats(times: readonly number[]): LatencyStats | null {
	if (times.length === 0) return null;
	const sorted = [...times].sort((a, b) => a - b);
	const at = (q: number) => sorted[Math.floor((sorted.length - 1) * q)] ?? 0;
	// Sorted ascending: min and max are the ends. No spread into Math.min (large arrays overflow the stack).
	return {
		min: Math.round(sorted[0] ?? 0),
		max: Math.round(sorted[sorted.length - 1] ?? 0),
		avg: Math.round(sorted.reduce((a, b) => a + b, 0) / sorted.length),
		p50: Math.round(at(0.5)),
		p95: Math.round(at(0.95)),
		p99: Math.round(at(0.99)),
	};
}
