import type { ActionKind } from "../domain/action.js";
import { ChannelClosedError } from "../domain/errors.js";
import type { SimulationEvent } from "../domain/event.js";
import type { ActionMetrics, MetricsReport } from "../domain/report.js";
import type { EventChannel } from "../events/channel.js";
import { calculateLatencyStats } from "../utils/stats.js";

/** Distinct error messages kept per action kind. */
const MAX_ERROR_SAMPLES = 10;

interface ActionSeries {
	durations: number[];
	errors: number;
	errorMessages: Map<string, number>;
}

/**
 * Sole consumer of the event channel for one step. Producers only send;
 * every mutation of the aggregate state happens in `handle`.
 */
export class MetricsAggregator {
	private readonly series = new Map<ActionKind, ActionSeries>();
	/** Sent ids still waiting for a receipt. */
	private readonly outstanding = new Set<string>();
	private readonly delivered = new Set<string>();
	/** Receipts for ids nobody reported as sent (yet). */
	private readonly orphans = new Set<string>();
	private sent = 0;
	private allSent = false;
	private finished = false;

	constructor(private readonly channel: EventChannel<SimulationEvent>) {}

	/**
	 * Consumes events until `finish` and resolves with the step's report.
	 * @throws ChannelClosedError if the channel closes before `finish`.
	 */
	async run(): Promise<MetricsReport> {
		while (!this.finished) {
			const event = await this.channel.recv();
			if (event === undefined) {
				throw new ChannelClosedError("Event channel closed before the step finished");
			}
			this.handle(event);
		}
		return this.report();
	}

	/**
	 * Applies one event to the aggregate state.
	 */
	handle(event: SimulationEvent): void {
		switch (event.type) {
			case "request-duration":
				this.seriesFor(event.action).durations.push(event.durationMs);
				break;
			case "error": {
				const series = this.seriesFor(event.action);
				series.errors++;
				const message = event.cause.message || event.cause.name;
				const known = series.errorMessages.get(message);
				if (known !== undefined) {
					series.errorMessages.set(message, known + 1);
				} else if (series.errorMessages.size < MAX_ERROR_SAMPLES) {
					series.errorMessages.set(message, 1);
				}
				break;
			}
			case "message-sent":
				this.sent++;
				if (this.orphans.delete(event.id)) {
					this.delivered.add(event.id);
				} else {
					this.outstanding.add(event.id);
				}
				break;
			case "message-received":
				if (this.outstanding.delete(event.id)) {
					this.delivered.add(event.id);
				} else if (!this.delivered.has(event.id)) {
					this.orphans.add(event.id);
				}
				break;
			case "all-messages-sent":
				this.allSent = true;
				break;
			case "finish":
				this.finished = true;
				break;
		}
	}

	/**
	 * True iff the send phase is over and every sent message has been received.
	 */
	allMessagesReceived(): boolean {
		return this.allSent && this.outstanding.size === 0;
	}

	get isFinished(): boolean {
		return this.finished;
	}

	report(): MetricsReport {
		const actions: MetricsReport["actions"] = {};
		for (const [action, series] of this.series) {
			actions[action] = toActionMetrics(series);
		}
		return {
			actions,
			messages: {
				sent: this.sent,
				received: this.delivered.size,
				pending: this.outstanding.size,
				orphaned: this.orphans.size,
			},
			allMessagesSent: this.allSent,
		};
	}

	private seriesFor(action: ActionKind): ActionSeries {
		let series = this.series.get(action);
		if (!series) {
			series = { durations: [], errors: 0, errorMessages: new Map() };
			this.series.set(action, series);
		}
		return series;
	}
}

function toActionMetrics(series: ActionSeries): ActionMetrics {
	return {
		requests: series.durations.length + series.errors,
		errors: series.errors,
		latency: calculateLatencyStats(series.durations),
		errorSamples: [...series.errorMessages]
			.map(([message, count]) => ({ message, count }))
			.sort((a, b) => b.count - a.count),
	};
}
