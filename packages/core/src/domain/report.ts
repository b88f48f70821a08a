import type { ActionKind } from "./action.js";

/**
 * Latency statistics in milliseconds, rounded.
 */
export interface LatencyStats {
	min: number;
	max: number;
	avg: number;
	p50: number;
	p95: number;
	p99: number;
}

export interface ActionMetrics {
	requests: number;
	errors: number;
	latency: LatencyStats | null;
	/** Distinct error messages with their counts, most frequent first. */
	errorSamples: Array<{ message: string; count: number }>;
}

export interface MetricsReport {
	actions: Partial<Record<ActionKind, ActionMetrics>>;
	messages: {
		sent: number;
		received: number;
		/** Sent but never seen by another user. */
		pending: number;
		/** Seen by a user but never reported as sent. */
		orphaned: number;
	};
	allMessagesSent: boolean;
}

export interface TickStats {
	ticks: number;
	completed: number;
	timedOut: number;
	skipped: number;
	failed: number;
}

/**
 * Snapshot handed to the reporting collaborator at the end of a step.
 */
export interface StepReport {
	executionId: number;
	step: number;
	timestamp: string;
	homeserver: string;
	stepUsers: number;
	stepFriendships: number;
	ticks: TickStats;
	metrics: MetricsReport;
}

/**
 * Persists step reports. Resolves with where the report went.
 */
export interface IReportSink {
	persist(report: StepReport): Promise<string>;
}
